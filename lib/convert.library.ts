import { Temporal } from '@js-temporal/polyfill';

import { TryFromParsedError, CONVERT } from './error.library.js';
import { dateFields } from './provider.library.js';
import { pad } from './string.library.js';
import { isDefined, isUndefined } from './type.library.js';

import type { Parsed } from './parsed.class.js';

/**
 * Turn a Parsed into Temporal values.  
 * A date needs one of: year-month-day, year-ordinal, ISO year-week-weekday,
 * or year with a Sunday / Monday based week and a weekday.  
 * Throws TryFromParsedError.
 */

function insufficient(component: string): never {
	throw new TryFromParsedError(CONVERT.InsufficientInformation, component, 'not enough fields were parsed');
}

function outOfRange(component: string, detail = 'value is out of range'): never {
	throw new TryFromParsedError(CONVERT.ComponentRange, component, detail);
}

/** a year from its full value, or from century and last-two digits */
function yearOf(full?: number, century?: number, lastTwo?: number, negative?: boolean) {
	if (isDefined(full))
		return full;
	if (isUndefined(century) || isUndefined(lastTwo))
		return undefined;

	const size = Math.abs(century) * 100 + lastTwo;
	return (negative ?? century < 0) ? 0 - size : size;
}

export function toPlainDate(parsed: Parsed): Temporal.PlainDate {
	const year = yearOf(parsed.get('year'), parsed.get('yearCentury'), parsed.get('yearLastTwo'), parsed.get('yearCenturyIsNegative'));
	const isoYear = yearOf(parsed.get('isoYear'), parsed.get('isoYearCentury'), parsed.get('isoYearLastTwo'), parsed.get('isoYearCenturyIsNegative'));
	const month = parsed.get('month');
	const day = parsed.get('day');
	const ordinal = parsed.get('ordinal');
	const weekday = parsed.get('weekday');
	const isoWeek = parsed.get('isoWeekNumber');
	const sundayWeek = parsed.get('sundayWeekNumber');
	const mondayWeek = parsed.get('mondayWeekNumber');

	let date: Temporal.PlainDate;

	switch (true) {
		case isDefined(year) && isDefined(month) && isDefined(day):
			date = build(() => Temporal.PlainDate.from({ year, month, day }, { overflow: 'reject' }), 'day');
			break;

		case isDefined(year) && isDefined(ordinal): {
			const jan1 = build(() => Temporal.PlainDate.from({ year, month: 1, day: 1 }), 'year');
			if (ordinal > jan1.daysInYear)
				outOfRange('ordinal', `${year} has ${jan1.daysInYear} days`);
			date = jan1.add({ days: ordinal - 1 });
			break;
		}

		case isDefined(isoYear) && isDefined(isoWeek) && isDefined(weekday): {
			const jan4 = build(() => Temporal.PlainDate.from({ year: isoYear, month: 1, day: 4 }), 'isoYear');
			date = jan4.subtract({ days: jan4.dayOfWeek - 1 }).add({ days: (isoWeek - 1) * 7 + weekday - 1 });
			if (dateFields(date).isoWeek !== isoWeek)
				outOfRange('isoWeekNumber', `${isoYear} has no week ${isoWeek}`);
			break;
		}

		case isDefined(year) && isDefined(mondayWeek) && isDefined(weekday):
			date = fromWeek(year, mondayWeek, weekday, 'monday');
			break;

		case isDefined(year) && isDefined(sundayWeek) && isDefined(weekday):
			date = fromWeek(year, sundayWeek, weekday, 'sunday');
			break;

		default:
			return insufficient('date');
	}

	if (isDefined(weekday) && date.dayOfWeek !== weekday)
		outOfRange('weekday', `${date.toString()} is not weekday ${weekday}`);

	return date;
}

/** a date from a week of the year, where weeks start on {start} */
function fromWeek(year: number, week: number, weekday: number, start: 'sunday' | 'monday') {
	const jan1 = build(() => Temporal.PlainDate.from({ year, month: 1, day: 1 }), 'year');
	const first = start === 'monday'
		? ((8 - jan1.dayOfWeek) % 7) + 1															// ordinal of the first Monday
		: ((7 - jan1.dayOfWeek) % 7) + 1;															// ordinal of the first Sunday
	const offset = start === 'monday' ? weekday - 1 : weekday % 7;
	const ordinal = first + (week - 1) * 7 + offset;

	if (ordinal < 1 || ordinal > jan1.daysInYear)
		outOfRange(start === 'monday' ? 'mondayWeekNumber' : 'sundayWeekNumber', `${year} has no such week`);

	return jan1.add({ days: ordinal - 1 });
}

export function toPlainTime(parsed: Parsed): Temporal.PlainTime {
	const hour24 = parsed.get('hour24');
	const hour12 = parsed.get('hour12');
	const isPm = parsed.get('hour12IsPm');

	const from12 = isDefined(hour12) && isDefined(isPm)
		? (hour12 % 12) + (isPm ? 12 : 0)
		: undefined;

	if (isDefined(hour24) && isDefined(from12) && hour24 !== from12)
		outOfRange('hour', `${hour24} disagrees with the 12-hour clock`);

	const hour = hour24 ?? from12 ?? insufficient(isDefined(hour12) ? 'period' : 'hour');
	const minute = parsed.get('minute') ?? insufficient('minute');
	const second = parsed.get('second') ?? 0;
	const subsecond = parsed.get('subsecond') ?? 0;

	return build(() => Temporal.PlainTime.from({
		hour, minute, second,
		millisecond: Math.trunc(subsecond / 1_000_000),
		microsecond: Math.trunc(subsecond / 1_000) % 1_000,
		nanosecond: subsecond % 1_000,
	}, { overflow: 'reject' }), 'time');
}

export function toPlainDateTime(parsed: Parsed): Temporal.PlainDateTime {
	return toPlainDate(parsed).toPlainDateTime(toPlainTime(parsed));
}

/** the parsed UTC offset as '±HH:MM' (or '±HH:MM:SS') */
export function toOffset(parsed: Parsed): string {
	const hour = parsed.get('offsetHour') ?? insufficient('offsetHour');
	const minute = parsed.get('offsetMinute') ?? 0;
	const second = parsed.get('offsetSecond') ?? 0;
	const negative = parsed.get('offsetIsNegative') ?? hour < 0;

	const seconds = Math.abs(hour) * 3600 + minute * 60 + second;
	if (seconds >= 86_400)
		outOfRange('offsetHour', 'an offset must be less than 24 hours');

	return (negative ? '-' : '+') + [Math.abs(hour), minute, ...(second ? [second] : [])]
		.map(nbr => pad(nbr, 2))
		.join(':');
}

/** a ZonedDateTime in the parsed fixed offset (UTC when only a timestamp was parsed) */
export function toZonedDateTime(parsed: Parsed): Temporal.ZonedDateTime {
	return fromTimestamp(parsed)
		?? toPlainDateTime(parsed).toZonedDateTime(toOffset(parsed));
}

export function toInstant(parsed: Parsed): Temporal.Instant {
	return fromTimestamp(parsed)?.toInstant()
		?? toZonedDateTime(parsed).toInstant();
}

/**
 * the parsed unix timestamp in the parsed offset (or UTC).  
 * any date or time fields parsed beside it must name the same moment.
 */
function fromTimestamp(parsed: Parsed) {
	const timestamp = parsed.get('unixTimestampNanos');
	if (isUndefined(timestamp))
		return undefined;

	const zoned = Temporal.Instant.fromEpochNanoseconds(timestamp)
		.toZonedDateTimeISO(parsed.has('offsetHour') ? toOffset(parsed) : 'UTC');

	const hasDate = (['day', 'ordinal', 'isoWeekNumber', 'sundayWeekNumber', 'mondayWeekNumber'] as const)
		.some(field => parsed.has(field));
	if (hasDate && !toPlainDate(parsed).equals(zoned.toPlainDate()))
		outOfRange('unixTimestampNanos', 'the timestamp disagrees with the parsed date');

	if (parsed.has('hour24') || parsed.has('hour12')) {
		const time = toPlainTime(parsed);
		const agrees = time.hour === zoned.hour && time.minute === zoned.minute
			&& (!parsed.has('second') || time.second === zoned.second)
			&& (!parsed.has('subsecond') || parsed.get('subsecond') === subsecondOf(zoned));

		if (!agrees)
			outOfRange('unixTimestampNanos', 'the timestamp disagrees with the parsed time');
	}

	return zoned;
}

/** nanoseconds past the second */
function subsecondOf(zoned: Temporal.ZonedDateTime) {
	return zoned.millisecond * 1_000_000 + zoned.microsecond * 1_000 + zoned.nanosecond;
}

/** run a Temporal constructor, reporting its RangeError against {component} */
function build<T>(fn: () => T, component: string): T {
	try {
		return fn();
	} catch (err) {
		if (err instanceof RangeError)
			return outOfRange(component, err.message);
		throw err;
	}
}
