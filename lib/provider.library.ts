import { Temporal } from '@js-temporal/polyfill';

import { isObject, isString } from './type.library.js';

/**
 * The render interpreter reads field values through a Provider.  
 * Each group is present only when the value being rendered carries it:
 * a PlainDate has no {time}, a PlainTime no {date}.
 */
export interface Provider {
	readonly date?: DateFields;
	readonly time?: TimeFields;
	readonly offset?: OffsetFields;
	readonly timestamp?: TimestampFields;
}

export interface DateFields {
	readonly year: number;
	readonly month: number;
	readonly day: number;
	/** day of the year, 1-366 */															readonly ordinal: number;
	/** 1 (Monday) through 7 (Sunday) */												readonly weekday: number;
	/** the year that owns the ISO week */											readonly isoYear: number;
	/** ISO-8601 week, 1-53 */																	readonly isoWeek: number;
	/** week of year, counting from the first Sunday, 0-53 */		readonly sundayWeek: number;
	/** week of year, counting from the first Monday, 0-53 */		readonly mondayWeek: number;
}

export interface TimeFields {
	readonly hour: number;
	readonly minute: number;
	readonly second: number;
	/** fraction of the second, 0-999_999_999 */								readonly nanosecond: number;
}

export interface OffsetFields {
	/** signed offset from UTC */																readonly seconds: number;
}

export interface TimestampFields {
	readonly epochNanoseconds: bigint;
}

/** an offset as seconds, or as '±HH:MM[:SS]' */
export type OffsetLike = OffsetFields | string

export type Providable =
	| Temporal.PlainDate
	| Temporal.PlainTime
	| Temporal.PlainDateTime
	| Temporal.ZonedDateTime
	| Temporal.Instant
	| OffsetLike
	| Provider

const Match = {
	/** '+05:30', '-0800', '+05:30:15', 'Z' */									offset: /^(?:(?<sign>[+-])(?<hh>\d{2}):?(?<mi>\d{2})?(?::?(?<ss>\d{2}))?|Z)$/i,
} as const

/** wrap a Temporal value (or an offset) as a Provider */
export function provide(value: Providable): Provider {
	switch (true) {
		case value instanceof Temporal.PlainDate:
			return { date: dateFields(value) };

		case value instanceof Temporal.PlainTime:
			return { time: timeFields(value) };

		case value instanceof Temporal.PlainDateTime:
			return { date: dateFields(value), time: timeFields(value) };

		case value instanceof Temporal.ZonedDateTime:
			return {
				date: dateFields(value),
				time: timeFields(value),
				offset: { seconds: value.offsetNanoseconds / 1e9 },
				timestamp: { epochNanoseconds: value.epochNanoseconds },
			}

		case value instanceof Temporal.Instant:											// rendered as UTC
			return provide(value.toZonedDateTimeISO('UTC'));

		case isString(value):
			return { offset: { seconds: offsetSeconds(value) } };

		case isOffset(value):
			return { offset: value };

		default:
			return value;
	}
}

const isOffset = (value: unknown): value is OffsetFields =>
	isObject(value) && Object.keys(value).length === 1 && typeof value['seconds'] === 'number';

/** seconds east of UTC, from a '±HH:MM[:SS]' string */
export function offsetSeconds(text: string) {
	const groups = text.trim().match(Match.offset)?.groups;
	if (!groups)
		throw new RangeError(`Cannot interpret "${text}" as a UTC offset`);

	const seconds = Number(groups['hh'] ?? 0) * 3600 + Number(groups['mi'] ?? 0) * 60 + Number(groups['ss'] ?? 0);
	return groups['sign'] === '-' ? -seconds : seconds;
}

type DateLike = Temporal.PlainDate | Temporal.PlainDateTime | Temporal.ZonedDateTime
type TimeLike = Temporal.PlainTime | Temporal.PlainDateTime | Temporal.ZonedDateTime

/** calendar fields, with the week numbers derived from day-of-year and day-of-week */
export function dateFields(date: DateLike): DateFields {
	const { year, month, day, dayOfYear: ordinal, dayOfWeek: weekday, weekOfYear: isoWeek } = date;

	const isoYear = month === 1 && isoWeek >= 52
		? year - 1																							// early January, in the last week of the prior year
		: month === 12 && isoWeek === 1
			? year + 1																						// late December, in the first week of the next year
			: year;

	return {
		year, month, day, ordinal, weekday, isoYear, isoWeek,
		sundayWeek: Math.floor((ordinal - (weekday % 7) + 6) / 7),
		mondayWeek: Math.floor((ordinal - weekday + 7) / 7),
	}
}

export function timeFields(time: TimeLike): TimeFields {
	const { hour, minute, second, millisecond, microsecond, nanosecond } = time;

	return { hour, minute, second, nanosecond: millisecond * 1_000_000 + microsecond * 1_000 + nanosecond };
}
