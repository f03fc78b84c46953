import { ParseFromDescriptionError, PARSE } from './error.library.js';
import { isUndefined } from './type.library.js';

/**
 * The fields a parse can decode.  
 * weekday is 1 (Monday) through 7 (Sunday); subsecond is in nanoseconds.  
 * a century of '-00' is zero, so its sign is kept apart (as is the offset's).
 */
export interface Fields {
	year: number;
	yearCentury: number;
	yearCenturyIsNegative: boolean;
	yearLastTwo: number;
	isoYear: number;
	isoYearCentury: number;
	isoYearCenturyIsNegative: boolean;
	isoYearLastTwo: number;
	month: number;
	day: number;
	ordinal: number;
	weekday: number;
	isoWeekNumber: number;
	sundayWeekNumber: number;
	mondayWeekNumber: number;
	hour24: number;
	hour12: number;
	hour12IsPm: boolean;
	minute: number;
	second: number;
	subsecond: number;
	offsetHour: number;
	offsetMinute: number;
	offsetSecond: number;
	offsetIsNegative: boolean;
	unixTimestampNanos: bigint;
}

export type Field = keyof Fields

/**
 * A conflict-checked accumulator of decoded fields.  
 * A field may be set more than once only with the same value.
 */
export class Parsed {
	#fields: Partial<Fields> = {};

	/** read a field, if it was set */
	get<K extends Field>(field: K): Fields[K] | undefined {
		return this.#fields[field];
	}

	has(field: Field) {
		return !isUndefined(this.#fields[field]);
	}

	/**
	 * set a field; re-setting it to a different value is an InconsistentParsedField error.  
	 * {offset} is the input position reported with that error
	 */
	set<K extends Field>(field: K, value: Fields[K], offset = 0) {
		const prev = this.#fields[field];

		if (!isUndefined(prev) && prev !== value)
			throw new ParseFromDescriptionError(PARSE.InconsistentParsedField, offset, field);

		this.#fields[field] = value;
		return this;
	}

	/** a copy, so a failed alternative can be discarded */
	clone() {
		const copy = new Parsed();
		copy.#fields = { ...this.#fields };
		return copy;
	}

	/** adopt the fields of {other} (used when an alternative succeeds) */
	assign(other: Parsed) {
		this.#fields = { ...other.#fields };
		return this;
	}

	/** a plain copy of the fields that were set */
	toObject(): Partial<Fields> {
		return { ...this.#fields };
	}

	get [Symbol.toStringTag]() {
		return 'Parsed';
	}
}
