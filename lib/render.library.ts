import { byteLength } from './cursor.class.js';
import { FormattingError, FORMAT } from './error.library.js';
import { MONTHS, WEEKDAYS, PERIOD } from './pattern.config/pattern.enum.js';
import { assertNever, isUndefined } from './type.library.js';
import { pad } from './string.library.js';

import type { Padding, Sign } from './pattern.config/pattern.enum.js';
import type { ComponentSpec, FormatItems, Spec } from './pattern.config/pattern.type.js';
import type { Provider, DateFields, TimeFields, OffsetFields, TimestampFields } from './provider.library.js';

/** where rendered text is written */
export interface Sink {
	write(text: string): void;
}

const MonthNames = MONTHS.keys();
const WeekdayNames = WEEKDAYS.keys();

/** divisor from nanoseconds, per unix_timestamp precision */
const Scale = {
	second: 1_000_000_000n,
	millisecond: 1_000_000n,
	microsecond: 1_000n,
	nanosecond: 1n,
} as const

/**
 * render a compiled description to {sink}.  
 * returns the count of UTF-8 bytes written; throws FormattingError
 */
export function render(items: FormatItems, provider: Provider, sink: Sink) {
	let bytes = 0;

	emit(items, provider, text => {
		bytes += byteLength(text);
		sink.write(text);
	});

	return bytes;
}

/** render a compiled description to a string */
export function format(items: FormatItems, provider: Provider) {
	const out: string[] = [];

	render(items, provider, { write: text => out.push(text) });
	return out.join('');
}

function emit(items: FormatItems, provider: Provider, write: (text: string) => void) {
	for (const item of items) {
		switch (item.type) {
			case 'literal':
				write(item.value);
				break;

			case 'component':
				write(component(item.component, provider));
				break;

			case 'optional': {
				const scratch = attempt(item.items, provider);
				if (!(scratch instanceof FormattingError))
					scratch.forEach(write);
				break;																						// a failed group is skipped whole
			}

			case 'first': {
				let result: string[] | FormattingError | undefined;

				for (const alternative of item.alternatives) {
					result = attempt(alternative, provider);
					if (!(result instanceof FormattingError))
						break;
				}

				if (result instanceof FormattingError)
					throw result;
				result?.forEach(write);
				break;
			}

			default:
				assertNever(item);
		}
	}
}

/** render into a scratch buffer, returning the FormattingError (rather than throwing) on failure */
function attempt(items: FormatItems, provider: Provider) {
	const scratch: string[] = [];

	try {
		emit(items, provider, text => scratch.push(text));
		return scratch;
	} catch (err) {
		if (err instanceof FormattingError)
			return err;
		throw err;
	}
}

// #region components ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

function component(spec: ComponentSpec, provider: Provider): string {
	switch (spec.kind) {
		case 'day':
			return padded(need(spec, provider.date).day, 2, spec.padding);

		case 'month': {
			const { month } = need(spec, provider.date);
			const repr = spec.repr;
			switch (repr) {
				case 'numerical': return padded(month, 2, spec.padding);
				case 'long': return name(MonthNames, month);
				case 'short': return name(MonthNames, month).slice(0, 3);
				default: return assertNever(repr);
			}
		}

		case 'ordinal':
			return padded(need(spec, provider.date).ordinal, 3, spec.padding);

		case 'weekday':
			return weekday(spec, need(spec, provider.date));

		case 'week_number': {
			const date = need(spec, provider.date);
			const week = spec.repr === 'iso' ? date.isoWeek : spec.repr === 'sunday' ? date.sundayWeek : date.mondayWeek;
			return padded(week, 2, spec.padding);
		}

		case 'year':
			return year(spec, need(spec, provider.date));

		case 'hour': {
			const { hour } = need(spec, provider.time);
			return padded(spec.repr === '24' ? hour : (hour % 12) || 12, 2, spec.padding);
		}

		case 'minute':
			return padded(need(spec, provider.time).minute, 2, spec.padding);

		case 'second':
			return padded(need(spec, provider.time).second, 2, spec.padding);

		case 'period': {
			const text = need(spec, provider.time).hour < 12 ? PERIOD.Am : PERIOD.Pm;
			return spec.case === 'upper' ? text : text.toLowerCase();
		}

		case 'subsecond': {
			const digits = pad(need(spec, provider.time).nanosecond, 9);
			return spec.digits === '1+'
				? digits.replace(/(?<=\d)0+$/, '')								// trailing zeros, keeping one digit
				: digits.slice(0, Number(spec.digits));
		}

		case 'offset_hour': {
			const { seconds } = need(spec, provider.offset);
			return signed(seconds < 0, spec.sign) + padded(Math.trunc(Math.abs(seconds) / 3600), 2, spec.padding);
		}

		case 'offset_minute':
			return padded(Math.trunc(Math.abs(need(spec, provider.offset).seconds) / 60) % 60, 2, spec.padding);

		case 'offset_second':
			return padded(Math.abs(need(spec, provider.offset).seconds) % 60, 2, spec.padding);

		case 'unix_timestamp': {
			const value = need(spec, provider.timestamp).epochNanoseconds / Scale[spec.precision];
			return signed(value < 0n, spec.sign) + (value < 0n ? -value : value).toString();
		}

		case 'ignore':
		case 'end':
			return '';

		default:
			return assertNever(spec);
	}
}

type Group = DateFields | TimeFields | OffsetFields | TimestampFields

/** the provider's field group, or UnsupportedComponent */
function need<T extends Group>(spec: ComponentSpec, group: T | undefined): T {
	if (isUndefined(group))
		throw new FormattingError(FORMAT.UnsupportedComponent, spec.kind, 'the value does not carry this field');

	return group;
}

function year(spec: Spec.Year, date: DateFields) {
	const value = spec.base === 'iso_week' ? date.isoYear : date.year;
	const size = Math.abs(value);

	if (spec.range === 'standard' && size > 9999)
		throw new FormattingError(FORMAT.InvalidComponentValue, spec.kind, `${value} is outside the standard range`);

	switch (spec.repr) {
		case 'last_two':
			return padded(size % 100, 2, spec.padding);

		case 'century':
			return signed(value < 0, spec.sign, size > 9999) + padded(Math.trunc(size / 100), 2, spec.padding);

		case 'full':
			return signed(value < 0, spec.sign, size > 9999) + padded(size, 4, spec.padding);

		default:
			return assertNever(spec.repr);
	}
}

function weekday(spec: Spec.Weekday, date: DateFields) {
	const base = spec.oneIndexed ? 1 : 0;

	switch (spec.repr) {
		case 'long': return name(WeekdayNames, date.weekday);
		case 'short': return name(WeekdayNames, date.weekday).slice(0, 3);
		case 'sunday': return String((date.weekday % 7) + base);
		case 'monday': return String(date.weekday - 1 + base);
		default: return assertNever(spec.repr);
	}
}

/** one-based lookup into a name table */
const name = (names: string[], index: number) =>
	names[index - 1] ?? String(index);

/** pad a non-negative number to {width} */
function padded(nbr: number, width: number, padding: Padding) {
	switch (padding) {
		case 'zero': return pad(nbr, width);
		case 'space': return pad(nbr, width, ' ');
		case 'none': return String(nbr);
		default: return assertNever(padding);
	}
}

/** the sign to write: '-' for negatives, '+' when mandatory (or {force}d) */
const signed = (negative: boolean, sign: Sign, force = false) =>
	negative ? '-' : sign === 'mandatory' || force ? '+' : '';

// #endregion
