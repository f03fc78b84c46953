// #region library modules~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

import { Logify } from './logify.class.js';
import { compileWithVersion } from './grammar.library.js';
import { describe } from './embed.library.js';
import { format, render } from './render.library.js';
import { parsePrefix } from './parse.library.js';
import { provide } from './provider.library.js';
import { toPlainDate, toPlainTime, toPlainDateTime, toZonedDateTime, toInstant, toOffset } from './convert.library.js';
import { ParseFromDescriptionError, PARSE } from './error.library.js';
import { isString } from './type.library.js';

import { Default, Layout } from './pattern.config/pattern.default.js';
import { COMPONENT, KEYWORD, MONTHS, WEEKDAYS } from './pattern.config/pattern.enum.js';
import { Table } from './pattern.config/pattern.table.js';

import type { Parsed } from './parsed.class.js';
import type { Sink } from './render.library.js';
import type { Providable } from './provider.library.js';
import type { Version } from './pattern.config/pattern.enum.js';
import type { Config, FormatItems, Options } from './pattern.config/pattern.type.js';
import type { Temporal } from '@js-temporal/polyfill';

// #endregion

/**
 * # Pattern
 * A compiled format-description, used to format Temporal values to text
 * and to parse text back into fields (or Temporal values).
 *
 * ```javascript
 * const iso = new Pattern('[year]-[month]-[day]');
 * iso.format(Temporal.PlainDate.from('2024-03-07'));		// '2024-03-07'
 * iso.parse('2024-03-07')?.get('month');								// 3
 * ```
 */
export class Pattern {
	// #region Static private properties~~~~~~~~~~~~~~~~~~~~~

	static #global: Config = { ...Default };

	/** pre-compiled {layout}s */
	static #layout = new Map<Layout, Pattern>();

	// #endregion

	// #region Static public methods~~~~~~~~~~~~~~~~~~~~~~~~~~

	/**
	 * set a default configuration for subsequent 'new Pattern()' instances to inherit.
	 * no {options} resets to the defaults
	 */
	static init = (options: Options = {}) => {
		Pattern.#global = Object.keys(options).length === 0
			? { ...Default }
			: merge(Pattern.#global, options);
		Pattern.#layout.clear();										// layouts hold the config they were built with

		new Logify('Pattern', Pattern.#global).info('init', Pattern.#global);
		return Pattern.config;
	}

	/** compile a description, following the {catch} policy (undefined when caught) */
	static compile(description: string, options: Options = {}) {
		const pattern = new Pattern(description, options);

		return pattern.#valid ? pattern : undefined;
	}

	/** one of the pre-compiled {layout}s */
	static layout(name: Layout) {
		let pattern = Pattern.#layout.get(name);

		if (!pattern) {
			pattern = new Pattern(describe(Layout[name]));
			Pattern.#layout.set(name, pattern);
		}

		return pattern;
	}

	// #endregion

	// #region Static getters~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** Pattern global config settings */
	static get config(): Config {
		return { ...Pattern.#global };
	}

	/** Pattern initial default settings */
	static get default(): Config {
		return { ...Default };
	}

	/** the descriptions behind Pattern.layout() */
	static get LAYOUT() {
		return Layout;
	}

	/** component names */
	static get COMPONENT() {
		return COMPONENT;
	}

	/** nesting keywords */
	static get KEYWORD() {
		return KEYWORD;
	}

	/** the modifiers each component accepts */
	static get TABLE() {
		return Table;
	}

	static get MONTHS() {
		return MONTHS;
	}

	static get WEEKDAYS() {
		return WEEKDAYS;
	}

	// #endregion

	// #region Instance properties~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** instance config */																			#local: Config;
	/** instance logger */																			#logify: Logify;
	/** the description, as given */														#source: string;
	/** compiled items */																				#items: FormatItems = [];
	/** the grammar version that compiled */										#version: Version;
	/** false when compile failed under {catch} */							#valid = false;

	// #endregion

	/**
	 * compile {description} (a string, or items from describe()).
	 * an invalid description throws InvalidFormatDescription, or (with {catch}) leaves an empty Pattern
	 */
	constructor(description: string | FormatItems, options: Options = {}) {
		this.#local = merge(Pattern.#global, options);
		this.#logify = new Logify('Pattern', this.#local);
		this.#version = this.#local.version;

		if (!isString(description)) {
			this.#source = '';
			this.#items = description;
			this.#valid = true;
			return;
		}

		this.#source = description;
		try {
			const { items, version } = compileWithVersion(description, this.#local.version, { depth: this.#local.depth });
			this.#items = items;
			this.#version = version;
			this.#valid = true;
			this.#logify.debug('compiled', description, `(version ${version})`);
		} catch (err) {
			this.#logify.catch(err, `Cannot compile "${description}"`);
		}
	}

	// #region Instance getters~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** the compiled items */
	get items() {
		return this.#items;
	}

	/** grammar version used to compile */
	get version() {
		return this.#version;
	}

	/** the description, as given */
	get source() {
		return this.#source;
	}

	/** instance config */
	get config(): Config {
		return { ...this.#local };
	}

	// #endregion

	// #region Instance public methods~~~~~~~~~~~~~~~~~~~~~~~~

	/** render {value} as text */
	format(value: Providable): string | undefined {
		return this.#try(() => format(this.#items, provide(value)), 'format');
	}

	/** render {value} into {sink}, returning the bytes written */
	render(value: Providable, sink: Sink): number | undefined {
		return this.#try(() => render(this.#items, provide(value), sink), 'render');
	}

	/** decode {text} into fields; unconsumed input follows the {trailing} config */
	parse(text: string | Uint8Array): Parsed | undefined {
		return this.#try(() => this.parseOrThrow(text), 'parse');
	}

	/** as parse(), but always throws on failure */
	parseOrThrow(text: string | Uint8Array): Parsed {
		const { parsed, consumed, remaining } = parsePrefix(this.#items, text);

		if (remaining > 0 && this.#local.trailing === 'prohibit')
			throw new ParseFromDescriptionError(PARSE.UnexpectedTrailingCharacters, consumed);

		return parsed;
	}

	/** parse {text} into a Temporal.PlainDate */
	toPlainDate(text: string): Temporal.PlainDate | undefined {
		return this.#convert(text, toPlainDate);
	}

	/** parse {text} into a Temporal.PlainTime */
	toPlainTime(text: string): Temporal.PlainTime | undefined {
		return this.#convert(text, toPlainTime);
	}

	/** parse {text} into a Temporal.PlainDateTime */
	toPlainDateTime(text: string): Temporal.PlainDateTime | undefined {
		return this.#convert(text, toPlainDateTime);
	}

	/** parse {text} into a Temporal.ZonedDateTime, in its fixed offset */
	toZonedDateTime(text: string): Temporal.ZonedDateTime | undefined {
		return this.#convert(text, toZonedDateTime);
	}

	/** parse {text} into a Temporal.Instant */
	toInstant(text: string): Temporal.Instant | undefined {
		return this.#convert(text, toInstant);
	}

	/** parse {text} into a '±HH:MM' offset */
	toOffset(text: string): string | undefined {
		return this.#convert(text, toOffset);
	}

	toString() {
		return this.#source;
	}

	get [Symbol.toStringTag]() {
		return 'Pattern';
	}

	// #endregion

	// #region Instance private methods~~~~~~~~~~~~~~~~~~~~~~~

	/** run {fn}, following the {catch} policy on failure */
	#try<T>(fn: () => T, action: string): T | undefined {
		if (!this.#valid)
			return this.#logify.catch(new Error(`Cannot ${action}: "${this.#source}" did not compile`));

		try {
			return fn();
		} catch (err) {
			return this.#logify.catch(err, `Cannot ${action} with "${this.#source}"`);
		}
	}

	#convert<T>(text: string, to: (parsed: Parsed) => T) {
		return this.#try(() => to(this.parseOrThrow(text)), 'convert');
	}

	// #endregion
}

/** overlay {options} on a {base} config; undefined options keep the base value */
const merge = (base: Config, options: Options): Config => ({
	version: options.version ?? base.version,
	depth: options.depth ?? base.depth,
	trailing: options.trailing ?? base.trailing,
	debug: options.debug ?? base.debug,
	catch: options.catch ?? base.catch,
})

// #region shortcut functions~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

/** format {value} against {description} */
export const fmtPattern = (description: string, value: Providable, options?: Options) =>
	new Pattern(description, options).format(value);

/** parse {text} against {description} */
export const parsePattern = (description: string, text: string, options?: Options) =>
	new Pattern(description, options).parse(text);

// #endregion
