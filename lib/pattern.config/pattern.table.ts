import { isNumber, isOneOf, assertNever } from '../type.library.js';
import { COMPONENT, PADDING, SIGN, MONTH_REPR, WEEKDAY_REPR, WEEK_NUMBER_REPR, YEAR_REPR, YEAR_RANGE, YEAR_BASE, HOUR_REPR, PERIOD_CASE, DIGITS, PRECISION, TRAILING, BOOLEAN } from './pattern.enum.js';
import type { Component } from './pattern.enum.js';
import type { ComponentSpec } from './pattern.type.js';

/**
 * The Component / Modifier table.  
 * For each component, the modifier keys it accepts, and the values each key accepts.  
 * A 'choice' lists its legal values (the first is the default);
 * a 'count' is an integer within [min, max].  
 * A rule marked {required} has no default, and must be given.
 */
export type Rule =
	| { readonly type: 'choice', readonly values: ReadonlyArray<string>, readonly required: false }
	| { readonly type: 'count', readonly min: number, readonly max: number, readonly required: boolean }

/** a modifier value, after validation */
export type ModifierValue = string | number

const choice = (values: ReadonlyArray<string>) => ({ type: 'choice', values, required: false }) as const;
const count = (min: number, max: number, required: boolean) => ({ type: 'count', min, max, required }) as const;

const padding = choice(PADDING);
const sign = choice(SIGN);
const caseSensitive = choice(BOOLEAN);

export const Table = {
	day: { padding },
	month: { padding, repr: choice(MONTH_REPR), case_sensitive: caseSensitive },
	ordinal: { padding },
	weekday: { repr: choice(WEEKDAY_REPR), one_indexed: choice(BOOLEAN), case_sensitive: caseSensitive },
	week_number: { padding, repr: choice(WEEK_NUMBER_REPR) },
	year: { padding, repr: choice(YEAR_REPR), range: choice(YEAR_RANGE), base: choice(YEAR_BASE), sign },
	hour: { padding, repr: choice(HOUR_REPR) },
	minute: { padding },
	period: { case: choice(PERIOD_CASE), case_sensitive: caseSensitive },
	second: { padding },
	subsecond: { digits: choice(DIGITS) },
	offset_hour: { sign, padding },
	offset_minute: { padding },
	offset_second: { padding },
	ignore: { count: count(1, 65_535, true) },
	unix_timestamp: { precision: choice(PRECISION), sign },
	end: { trailing_input: choice(TRAILING) },
} as const satisfies Record<Component, Record<string, Rule>>

/** test for a known component name (already lower-cased) */
export const isComponent = (name: string): name is Component =>
	COMPONENT.includes(name);

/** the Rule for a component's modifier key, if the key is legal */
export function lookupModifier(kind: Component, key: string): Rule | undefined {
	const rules: Readonly<Record<string, Rule>> = Table[kind];

	return Object.hasOwn(rules, key) ? rules[key] : undefined;
}

/** validate (and normalize) a modifier value against its Rule */
export function parseModifierValue(rule: Rule, value: string): ModifierValue | undefined {
	switch (rule.type) {
		case 'choice': {
			const lower = value.toLowerCase();
			return rule.values.includes(lower) ? lower : undefined;
		}

		case 'count': {
			if (!/^[0-9]+$/.test(value))
				return undefined;
			const nbr = Number(value);
			return nbr >= rule.min && nbr <= rule.max ? nbr : undefined;
		}

		default:
			return assertNever(rule);
	}
}

/** modifier keys that have no default, and so must be given */
export const requiredModifiers = (kind: Component) =>
	Object.entries<Rule>(Table[kind])
		.filter(([, rule]) => rule.required)
		.map(([key]) => key);

/** the value used when a modifier is omitted */
export const defaultModifier = (rule: Rule) =>
	rule.type === 'choice' ? rule.values[0] : undefined;

/**
 * build a resolved ComponentSpec from validated modifiers.  
 * omitted modifiers take the Table's default.
 */
export function resolveModifiers(kind: Component, given: ReadonlyMap<string, ModifierValue> = new Map()): ComponentSpec {
	const pick = <const V extends readonly [string, ...string[]]>(key: string, values: V): V[number] => {
		const val = given.get(key);
		return isOneOf(values, val) ? val : values[0];
	}
	const flag = (key: string) => pick(key, BOOLEAN) === 'true';
	const num = (key: string) => {
		const val = given.get(key);
		return isNumber(val) ? val : 0;
	}

	switch (kind) {
		case 'day':
		case 'ordinal':
		case 'minute':
		case 'second':
		case 'offset_minute':
		case 'offset_second':
			return { kind, padding: pick('padding', PADDING) };
		case 'month':
			return { kind, padding: pick('padding', PADDING), repr: pick('repr', MONTH_REPR), caseSensitive: flag('case_sensitive') };
		case 'weekday':
			return { kind, repr: pick('repr', WEEKDAY_REPR), oneIndexed: flag('one_indexed'), caseSensitive: flag('case_sensitive') };
		case 'week_number':
			return { kind, padding: pick('padding', PADDING), repr: pick('repr', WEEK_NUMBER_REPR) };
		case 'year':
			return {
				kind,
				padding: pick('padding', PADDING),
				repr: pick('repr', YEAR_REPR),
				range: pick('range', YEAR_RANGE),
				base: pick('base', YEAR_BASE),
				sign: pick('sign', SIGN),
			}
		case 'hour':
			return { kind, padding: pick('padding', PADDING), repr: pick('repr', HOUR_REPR) };
		case 'period':
			return { kind, case: pick('case', PERIOD_CASE), caseSensitive: flag('case_sensitive') };
		case 'subsecond':
			return { kind, digits: pick('digits', DIGITS) };
		case 'offset_hour':
			return { kind, sign: pick('sign', SIGN), padding: pick('padding', PADDING) };
		case 'ignore':
			return { kind, count: num('count') };
		case 'unix_timestamp':
			return { kind, precision: pick('precision', PRECISION), sign: pick('sign', SIGN) };
		case 'end':
			return { kind, trailingInput: pick('trailing_input', TRAILING) };

		default:
			return assertNever(kind);
	}
}
