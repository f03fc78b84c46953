import type { Padding, Sign, MonthRepr, WeekdayRepr, WeekNumberRepr, YearRepr, YearRange, YearBase, HourRepr, PeriodCase, Digits, Precision, Trailing, Version } from './pattern.enum.js';

/**
 * A compiled format-description is an ordered list of FormatItems.  
 * The tree is frozen after compilation and may be shared between calls.
 */
export type FormatItem =
	| Literal
	| Component
	| Optional
	| First

export type FormatItems = ReadonlyArray<FormatItem>

/** text copied verbatim (render) or matched exactly (parse) */
export interface Literal {
	readonly type: 'literal';
	readonly value: string;
}

/** a date-time field, with its modifiers resolved */
export interface Component {
	readonly type: 'component';
	readonly component: ComponentSpec;
}

/** a group that may be absent */
export interface Optional {
	readonly type: 'optional';
	readonly items: FormatItems;
}

/** alternatives, tried in order */
export interface First {
	readonly type: 'first';
	readonly alternatives: ReadonlyArray<FormatItems>;
}

// #region Component specifications ~~~~~~~~~~~~~~~~~~~~~~~~~~~

export type ComponentSpec =
	| Spec.Day
	| Spec.Month
	| Spec.Ordinal
	| Spec.Weekday
	| Spec.WeekNumber
	| Spec.Year
	| Spec.Hour
	| Spec.Minute
	| Spec.Period
	| Spec.Second
	| Spec.Subsecond
	| Spec.OffsetHour
	| Spec.OffsetMinute
	| Spec.OffsetSecond
	| Spec.Ignore
	| Spec.UnixTimestamp
	| Spec.End

export namespace Spec {
	export interface Day { readonly kind: 'day'; readonly padding: Padding }
	export interface Month { readonly kind: 'month'; readonly padding: Padding; readonly repr: MonthRepr; readonly caseSensitive: boolean }
	export interface Ordinal { readonly kind: 'ordinal'; readonly padding: Padding }
	export interface Weekday { readonly kind: 'weekday'; readonly repr: WeekdayRepr; readonly oneIndexed: boolean; readonly caseSensitive: boolean }
	export interface WeekNumber { readonly kind: 'week_number'; readonly padding: Padding; readonly repr: WeekNumberRepr }
	export interface Year {
		readonly kind: 'year';
		readonly padding: Padding;
		readonly repr: YearRepr;
		readonly range: YearRange;
		readonly base: YearBase;
		readonly sign: Sign;
	}
	export interface Hour { readonly kind: 'hour'; readonly padding: Padding; readonly repr: HourRepr }
	export interface Minute { readonly kind: 'minute'; readonly padding: Padding }
	export interface Period { readonly kind: 'period'; readonly case: PeriodCase; readonly caseSensitive: boolean }
	export interface Second { readonly kind: 'second'; readonly padding: Padding }
	export interface Subsecond { readonly kind: 'subsecond'; readonly digits: Digits }
	export interface OffsetHour { readonly kind: 'offset_hour'; readonly sign: Sign; readonly padding: Padding }
	export interface OffsetMinute { readonly kind: 'offset_minute'; readonly padding: Padding }
	export interface OffsetSecond { readonly kind: 'offset_second'; readonly padding: Padding }
	export interface Ignore { readonly kind: 'ignore'; readonly count: number }
	export interface UnixTimestamp { readonly kind: 'unix_timestamp'; readonly precision: Precision; readonly sign: Sign }
	export interface End { readonly kind: 'end'; readonly trailingInput: Trailing }
}

// #endregion

/** options accepted by Pattern.init() and new Pattern() */
export interface Options {
	/** grammar version when the description has no 'version' directive */	version?: Version;
	/** maximum nesting of optional / first groups */							depth?: number;
	/** unconsumed input after a parse: error or ignore */				trailing?: Trailing;
	/** write diagnostics to the console */												debug?: boolean;
	/** report errors as warnings, and return undefined */				catch?: boolean;
}

export type Config = Required<Options>
