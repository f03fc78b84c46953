import type { Config } from './pattern.type.js';

/**
 * reasonable default values for a Pattern config.  
 * Pattern.init() and new Pattern() overload these with their {options}
 */
export const Default = {
	/** grammar version, unless a 'version' directive overrides */		version: 1,
	/** nesting limit for optional / first groups */								depth: 32,
	/** unconsumed input after a parse is an error */								trailing: 'prohibit',
	/** log to console */																					debug: false,
	/** catch or throw Errors */																		catch: false,
} as const satisfies Config

/**
 * commonly-used format-descriptions.  
 * each is compiled (and frozen) the first time Pattern.layout() asks for it
 */
export const Layout = {
	/** calendar date */																					date: '[year]-[month]-[day]',
	/** wall-clock time */																				time: '[hour]:[minute]:[second]',
	/** ISO-8601 date and time, with optional fraction */						dateTime: 'version = 2, [year]-[month]-[day]T[hour]:[minute]:[second][optional [.[subsecond]]]',
	/** RFC-3339 style timestamp with offset */											rfc3339: 'version = 2, [year]-[month]-[day]T[hour]:[minute]:[second][optional [.[subsecond]]][offset_hour sign:mandatory]:[offset_minute]',
	/** ISO week date */																					weekDate: '[year base:iso_week]-W[week_number]-[weekday repr:monday]',
	/** ordinal date */																						ordinalDate: '[year]-[ordinal]',
	/** 12-hour clock */																					clock: '[hour repr:12 padding:none]:[minute] [period]',
	/** HTTP-date style (RFC 7231) */																httpDate: '[weekday repr:short], [day] [month repr:short] [year] [hour]:[minute]:[second] GMT',
	/** seconds since the epoch */																	unix: '[unix_timestamp]',
} as const

export type Layout = keyof typeof Layout
