import { enumify } from '../enumerate.library.js';
import type { Enum } from '../enumerate.library.js';

/**
 * Various enumerations used throughout the Pattern library.  
 * These are exported and added as static getters of the Pattern class.  
 * Usage example:	
 ```javascript
			const names = Pattern.COMPONENT.values();	// ['day', 'month', 'ordinal', ...]
 ```
 */

/** the component names a format-description may use inside brackets */
export const COMPONENT = enumify({
	Day: 'day',
	Month: 'month',
	Ordinal: 'ordinal',
	Weekday: 'weekday',
	WeekNumber: 'week_number',
	Year: 'year',
	Hour: 'hour',
	Minute: 'minute',
	Period: 'period',
	Second: 'second',
	Subsecond: 'subsecond',
	OffsetHour: 'offset_hour',
	OffsetMinute: 'offset_minute',
	OffsetSecond: 'offset_second',
	Ignore: 'ignore',
	UnixTimestamp: 'unix_timestamp',
	End: 'end',
});
export type COMPONENT = Enum.keys<typeof COMPONENT>
export type Component = Enum.values<typeof COMPONENT>

/** the two grammar versions; 2 adds nesting keywords and backslash escapes */
export const VERSION = enumify({ One: 1, Two: 2 });
export type Version = Enum.values<typeof VERSION>

/** nesting keywords (grammar version 2 only) */
export const KEYWORD = enumify({ Optional: 'optional', First: 'first' });
export type Keyword = Enum.values<typeof KEYWORD>

/** ASCII name tables, in calendar order */
export const MONTHS = enumify(['January', 'February', 'March', 'April', 'May', 'June', 'July', 'August', 'September', 'October', 'November', 'December']);
export const WEEKDAYS = enumify(['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']);
export type MONTHS = Enum.keys<typeof MONTHS>
export type WEEKDAYS = Enum.keys<typeof WEEKDAYS>

/** morning / afternoon markers, upper-case form */
export const PERIOD = enumify({ Am: 'AM', Pm: 'PM' });
export type PERIOD = Enum.values<typeof PERIOD>

// #region modifier values ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
// the first entry of each list is the value used when the modifier is omitted

export const PADDING = ['zero', 'space', 'none'] as const;
export const SIGN = ['automatic', 'mandatory'] as const;
export const MONTH_REPR = ['numerical', 'long', 'short'] as const;
export const WEEKDAY_REPR = ['long', 'short', 'sunday', 'monday'] as const;
export const WEEK_NUMBER_REPR = ['iso', 'sunday', 'monday'] as const;
export const YEAR_REPR = ['full', 'century', 'last_two'] as const;
export const YEAR_RANGE = ['extended', 'standard'] as const;
export const YEAR_BASE = ['calendar', 'iso_week'] as const;
export const HOUR_REPR = ['24', '12'] as const;
export const PERIOD_CASE = ['upper', 'lower'] as const;
export const DIGITS = ['1+', '1', '2', '3', '4', '5', '6', '7', '8', '9'] as const;
export const PRECISION = ['second', 'millisecond', 'microsecond', 'nanosecond'] as const;
export const TRAILING = ['prohibit', 'discard'] as const;
export const BOOLEAN = ['true', 'false'] as const;

export type Padding = typeof PADDING[number]
export type Sign = typeof SIGN[number]
export type MonthRepr = typeof MONTH_REPR[number]
export type WeekdayRepr = typeof WEEKDAY_REPR[number]
export type WeekNumberRepr = typeof WEEK_NUMBER_REPR[number]
export type YearRepr = typeof YEAR_REPR[number]
export type YearRange = typeof YEAR_RANGE[number]
export type YearBase = typeof YEAR_BASE[number]
export type HourRepr = typeof HOUR_REPR[number]
export type PeriodCase = typeof PERIOD_CASE[number]
export type Digits = typeof DIGITS[number]
export type Precision = typeof PRECISION[number]
export type Trailing = typeof TRAILING[number]

// #endregion
