import { Cursor, isDigit, toBytes } from './cursor.class.js';
import { Parsed } from './parsed.class.js';
import { ParseFromDescriptionError, PARSE } from './error.library.js';
import { MONTHS, WEEKDAYS, PERIOD } from './pattern.config/pattern.enum.js';
import { assertNever, isUndefined } from './type.library.js';

import type { Field, Fields } from './parsed.class.js';
import type { Padding, Sign } from './pattern.config/pattern.enum.js';
import type { ComponentSpec, FormatItems, Spec } from './pattern.config/pattern.type.js';

/**
 * The parse interpreter.  
 * Walks the FormatItems against input text, filling a Parsed.  
 * Trailing input is left for the caller to judge.
 */

const Byte = { Plus: 0x2b, Minus: 0x2d, Space: 0x20 } as const

/** name tables, pre-encoded */
const MonthNames = MONTHS.keys().map(name => ({ long: toBytes(name), short: toBytes(name.slice(0, 3)) }));
const WeekdayNames = WEEKDAYS.keys().map(name => ({ long: toBytes(name), short: toBytes(name.slice(0, 3)) }));
const PeriodNames = PERIOD.values().map(name => ({ upper: toBytes(name), lower: toBytes(name.toLowerCase()) }));

/** digits for each unix_timestamp precision, and the scale to nanoseconds */
const Timestamp = {
	second: { digits: 14, scale: 1_000_000_000n },
	millisecond: { digits: 17, scale: 1_000_000n },
	microsecond: { digits: 20, scale: 1_000n },
	nanosecond: { digits: 23, scale: 1n },
} as const

/** parse {input} against a compiled description */
export function parse(items: FormatItems, input: string | Uint8Array) {
	return parsePrefix(items, input).parsed;
}

/** parse, and report how many bytes of {input} were consumed */
export function parsePrefix(items: FormatItems, input: string | Uint8Array) {
	const cursor = new Cursor(input);
	const parsed = new Parsed();

	parseInto(items, cursor, parsed);
	return { parsed, consumed: cursor.offset, remaining: cursor.remaining };
}

/** parse from the {cursor}'s offset, adding to {parsed}; the cursor is left after the last match */
export function parseInto(items: FormatItems, cursor: Cursor, parsed: Parsed): void {
	for (const item of items) {
		switch (item.type) {
			case 'literal': {
				const bytes = toBytes(item.value);
				if (!cursor.startsWith(bytes))
					throw new ParseFromDescriptionError(PARSE.InvalidLiteral, cursor.offset);

				cursor.advance(bytes.length);
				break;
			}

			case 'component':
				component(item.component, cursor, parsed);
				break;

			case 'optional': {
				const mark = cursor.snapshot();
				const trial = parsed.clone();

				try {
					parseInto(item.items, cursor, trial);
					parsed.assign(trial);
				} catch (err) {
					if (!(err instanceof ParseFromDescriptionError))
						throw err;
					cursor.restore(mark);														// as though the group were absent
				}
				break;
			}

			case 'first':
				first(item.alternatives, cursor, parsed);
				break;

			default:
				assertNever(item);
		}
	}
}

/** the first alternative that matches wins; if none match, the last one's error */
function first(alternatives: ReadonlyArray<FormatItems>, cursor: Cursor, parsed: Parsed) {
	const mark = cursor.snapshot();
	let error: ParseFromDescriptionError | undefined;

	for (const alternative of alternatives) {
		const trial = parsed.clone();

		try {
			parseInto(alternative, cursor.restore(mark), trial);
			parsed.assign(trial);
			return;
		} catch (err) {
			if (!(err instanceof ParseFromDescriptionError))
				throw err;
			error = err;
		}
	}

	cursor.restore(mark);
	if (error)
		throw error;
}

// #region components ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

function component(spec: ComponentSpec, cursor: Cursor, parsed: Parsed) {
	const start = cursor.offset;

	/** fail at the start of this component */
	const invalid = (): never => {
		cursor.restore(start);
		throw new ParseFromDescriptionError(PARSE.InvalidComponentValue, start, spec.kind);
	}
	/** range-check, then store */
	const store = (field: NumericField, value: number | undefined, min: number, max: number) => {
		if (isUndefined(value) || value < min || value > max)
			return invalid();
		parsed.set(field, value, start);
	}

	switch (spec.kind) {
		case 'day':
			return store('day', numeric(cursor, 2, spec.padding), 1, 31);

		case 'ordinal':
			return store('ordinal', numeric(cursor, 3, spec.padding), 1, 366);

		case 'minute':
			return store('minute', numeric(cursor, 2, spec.padding), 0, 59);

		case 'second':
			return store('second', numeric(cursor, 2, spec.padding), 0, 59);

		case 'offset_minute':
			return store('offsetMinute', numeric(cursor, 2, spec.padding), 0, 59);

		case 'offset_second':
			return store('offsetSecond', numeric(cursor, 2, spec.padding), 0, 59);

		case 'month': {
			const repr = spec.repr;
			const value = repr === 'numerical'
				? numeric(cursor, 2, spec.padding)
				: lookup(cursor, MonthNames.map(name => name[repr]), spec.caseSensitive);
			return store('month', value, 1, 12);
		}

		case 'weekday':
			return store('weekday', weekday(spec, cursor), 1, 7);

		case 'week_number': {
			const value = numeric(cursor, 2, spec.padding);
			const repr = spec.repr;
			switch (repr) {
				case 'iso': return store('isoWeekNumber', value, 1, 53);
				case 'sunday': return store('sundayWeekNumber', value, 0, 53);
				case 'monday': return store('mondayWeekNumber', value, 0, 53);
				default: return assertNever(repr);
			}
		}

		case 'year':
			return year(spec, cursor, parsed, invalid);

		case 'hour':
			return spec.repr === '24'
				? store('hour24', numeric(cursor, 2, spec.padding), 0, 23)
				: store('hour12', numeric(cursor, 2, spec.padding), 1, 12);

		case 'period': {
			const upper = spec.case === 'upper';
			const names = PeriodNames.map(name => upper ? name.upper : name.lower);
			const value = lookup(cursor, names, spec.caseSensitive);
			if (isUndefined(value))
				return invalid();
			parsed.set('hour12IsPm', value === 2, start);
			return;
		}

		case 'subsecond': {
			const width = spec.digits === '1+' ? Infinity : Number(spec.digits);
			const count = cursor.take(isDigit, width);
			if (count === 0 || (width !== Infinity && count !== width))
				return invalid();

			const digits = cursor.slice(start, start + Math.min(count, 9));
			parsed.set('subsecond', Number(digits.padEnd(9, '0')), start);
			return;
		}

		case 'offset_hour': {
			const sign = signOf(cursor, spec.sign);
			if (isUndefined(sign))
				return invalid();

			const value = numeric(cursor, 2, spec.padding);
			if (isUndefined(value) || value > 25)
				return invalid();

			parsed.set('offsetHour', sign === '-' ? 0 - value : value, start);
			parsed.set('offsetIsNegative', sign === '-', start);
			return;
		}

		case 'unix_timestamp': {
			const sign = signOf(cursor, spec.sign);
			if (isUndefined(sign))
				return invalid();

			const { digits, scale } = Timestamp[spec.precision];
			const from = cursor.offset;
			if (cursor.take(isDigit, digits) === 0)
				return invalid();

			const value = BigInt(cursor.slice(from, cursor.offset)) * scale;
			parsed.set('unixTimestampNanos', sign === '-' ? -value : value, start);
			return;
		}

		case 'ignore':
			if (cursor.remaining < spec.count)
				return invalid();
			cursor.advance(spec.count);
			return;

		case 'end':
			if (cursor.done)
				return;
			if (spec.trailingInput === 'discard') {
				cursor.advance(cursor.remaining);
				return;
			}
			throw new ParseFromDescriptionError(PARSE.UnexpectedTrailingCharacters, start);

		default:
			return assertNever(spec);
	}
}

type NumericField = { [K in Field]: Fields[K] extends number ? K : never }[Field]

/** a year-like value, into the calendar or ISO-week fields */
function year(spec: Spec.Year, cursor: Cursor, parsed: Parsed, invalid: () => never) {
	const start = cursor.offset;
	const iso = spec.base === 'iso_week';

	if (spec.repr === 'last_two') {
		const value = numeric(cursor, 2, spec.padding);
		if (isUndefined(value))
			return invalid();
		parsed.set(iso ? 'isoYearLastTwo' : 'yearLastTwo', value, start);
		return;
	}

	const sign = signOf(cursor, spec.sign);
	if (isUndefined(sign))
		return invalid();

	const width = spec.repr === 'full' ? 4 : 2;
	const extra = sign && spec.range === 'extended' ? 2 : 0;		// a signed year may run to six digits
	const value = numeric(cursor, width, spec.padding, extra);
	if (isUndefined(value))
		return invalid();

	const signed = sign === '-' ? 0 - value : value;				// '-0000' is zero, not negative zero
	if (spec.repr === 'full') {
		parsed.set(iso ? 'isoYear' : 'year', signed, start);
		return;
	}

	parsed.set(iso ? 'isoYearCentury' : 'yearCentury', signed, start);
	parsed.set(iso ? 'isoYearCenturyIsNegative' : 'yearCenturyIsNegative', sign === '-', start);
}

/** a weekday name or number, as 1 (Monday) through 7 (Sunday) */
function weekday(spec: Spec.Weekday, cursor: Cursor) {
	const repr = spec.repr;

	switch (repr) {
		case 'long':
		case 'short':
			return lookup(cursor, WeekdayNames.map(name => name[repr]), spec.caseSensitive);

		case 'monday':
		case 'sunday': {
			const digit = numeric(cursor, 1, 'none');
			if (isUndefined(digit))
				return undefined;

			const index = digit - (spec.oneIndexed ? 1 : 0);		// zero-based, from the first day of the week
			if (index < 0 || index > 6)
				return undefined;

			return repr === 'monday'
				? index + 1
				: index === 0 ? 7 : index;
		}

		default:
			return assertNever(repr);
	}
}

// #endregion

// #region matchers ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/**
 * an unsigned number of {width} digits (plus up to {extra} more) under a padding rule:  
 * 'zero' needs every digit, 'space' allows leading spaces in place of digits, 'none' takes one or more
 */
export function numeric(cursor: Cursor, width: number, padding: Padding, extra = 0): number | undefined {
	const start = cursor.offset;
	let need = width;

	switch (padding) {
		case 'none':
			need = 1;
			break;

		case 'space':
			need = width - cursor.take(byte => byte === Byte.Space, width - 1);
			break;

		case 'zero':
			break;

		default:
			return assertNever(padding);
	}

	const from = cursor.offset;
	const count = cursor.take(isDigit, padding === 'space' ? need : width + extra);

	if (count < need) {
		cursor.restore(start);
		return undefined;
	}

	return Number(cursor.slice(from, cursor.offset));
}

/** an optional '+' / '-'; '' when absent, undefined when a mandatory sign is missing */
function signOf(cursor: Cursor, sign: Sign): '+' | '-' | '' | undefined {
	if (cursor.eat(Byte.Plus))
		return '+';
	if (cursor.eat(Byte.Minus))
		return '-';

	return sign === 'mandatory' ? undefined : '';
}

/** match one of {names}; returns its one-based position */
function lookup(cursor: Cursor, names: Uint8Array[], caseSensitive: boolean) {
	const index = names.findIndex(name => cursor.startsWith(name, caseSensitive));
	if (index === -1)
		return undefined;

	cursor.advance(names[index]?.length ?? 0);
	return index + 1;
}

// #endregion
