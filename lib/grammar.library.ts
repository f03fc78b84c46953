import { Cursor, isDigit, isWhitespace, byteLength, toBytes } from './cursor.class.js';
import { InvalidFormatDescription, GRAMMAR } from './error.library.js';
import { isComponent, lookupModifier, parseModifierValue, requiredModifiers, resolveModifiers } from './pattern.config/pattern.table.js';
import { KEYWORD, VERSION } from './pattern.config/pattern.enum.js';
import { Default } from './pattern.config/pattern.default.js';
import { isDefined, isUndefined } from './type.library.js';
import { quote } from './string.library.js';

import type { Span } from './error.library.js';
import type { ModifierValue } from './pattern.config/pattern.table.js';
import type { Version } from './pattern.config/pattern.enum.js';
import type { FormatItem, FormatItems } from './pattern.config/pattern.type.js';

/**
 * The format-description grammar.  
 *
 * ```
 * description := directive? sequence
 * directive   := 'version' ws* '=' ws* digits ws* ',' ws*
 * sequence    := ( literal | escape | component | nested )*
 * component   := '[' ws* name ( ws+ key ':' value )* ws* ']'
 * nested      := '[optional ' body ws* ']'  |  '[first ' body ( ws* body )* ws* ']'		(version 2)
 * body        := '[' sequence ']'
 * escape      := '[['  |  '\\' | '\[' | '\]'																					(backslash: version 2)
 * ```
 * Offsets are UTF-8 byte offsets into the description.
 */

const Byte = {
	Open: 0x5b,																								// [
	Close: 0x5d,																							// ]
	Backslash: 0x5c,																					// \
	Colon: 0x3a,																							// :
	Equals: 0x3d,																							// =
	Comma: 0x2c,																							// ,
	Space: 0x20,
} as const

const DIRECTIVE = toBytes('version');

/** bytes that may appear in a component name or a modifier */
const isTokenByte = (byte: number) =>
	!isWhitespace(byte) && byte !== Byte.Open && byte !== Byte.Close;

/** length of the UTF-8 sequence introduced by {lead} */
const charLength = (lead: number) =>
	lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;

const span = (start: number, end = start): Span => ({ start, end });

function fail(kind: GRAMMAR, where: Span, detail: string): never {
	throw new InvalidFormatDescription(kind, where, detail);
}

export namespace Grammar {
	export interface Options {
		/** maximum nesting of optional / first groups */						depth?: number;
	}
}

/**
 * compile a format-description into a frozen list of FormatItems.  
 * a leading 'version = N,' directive overrides {defaultVersion}.  
 * throws InvalidFormatDescription at the first error
 */
export function compile(source: string, defaultVersion: Version = Default.version, options: Grammar.Options = {}): FormatItems {
	return new Compiler(source, defaultVersion, options.depth ?? Default.depth).compile();
}

/** compile, and report the grammar version that was used */
export function compileWithVersion(source: string, defaultVersion: Version = Default.version, options: Grammar.Options = {}) {
	const compiler = new Compiler(source, defaultVersion, options.depth ?? Default.depth);
	const items = compiler.compile();

	return { items, version: compiler.version };
}

class Compiler {
	readonly #cursor: Cursor;
	readonly #limit: number;
	#version: Version;

	constructor(source: string, version: Version, limit: number) {
		this.#cursor = new Cursor(source);
		this.#version = version;
		this.#limit = limit;
	}

	get version() {
		return this.#version;
	}

	compile() {
		this.#directive();

		return deepFreeze(this.#sequence(0));
	}

	/** the current byte as text, for messages */
	#here() {
		const cursor = this.#cursor;
		return cursor.done ? quote() : quote(cursor.slice(cursor.offset, cursor.offset + charLength(cursor.peek() ?? 0)));
	}

	/** span of the (possibly multi-byte) character at the cursor; zero-length at end of input */
	#charSpan(at = this.#cursor.offset) {
		const lead = this.#cursor.bytes[at];
		return isUndefined(lead) ? span(at) : span(at, at + charLength(lead));
	}

	// #region directive ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** an optional leading 'version = N,' */
	#directive() {
		const cursor = this.#cursor;

		if (!cursor.startsWith(DIRECTIVE))
			return;

		const mark = cursor.snapshot();
		cursor.advance(DIRECTIVE.length);
		cursor.take(isWhitespace);

		if (!cursor.eat(Byte.Equals)) {														// not a directive after all: plain literal text
			cursor.restore(mark);
			return;
		}

		cursor.take(isWhitespace);
		const start = cursor.offset;
		const digits = cursor.take(isDigit);

		if (digits === 0) {
			const size = cursor.take(isTokenByte);
			fail(GRAMMAR.UnexpectedToken, size ? span(start, start + size) : this.#charSpan(start), `expected a version number, found ${size ? quote(cursor.slice(start, start + size)) : this.#here()}`);
		}

		const text = cursor.slice(start, cursor.offset);
		const version = Number(text);
		if (!VERSION.includes(version) || text.length !== 1)
			fail(GRAMMAR.InvalidFormatDescriptionVersion, span(start, cursor.offset), `unsupported version ${text}`);

		cursor.take(isWhitespace);
		if (!cursor.eat(Byte.Comma))
			fail(GRAMMAR.UnexpectedToken, this.#charSpan(), `expected "," after the version, found ${this.#here()}`);

		cursor.take(isWhitespace);
		this.#version = version;
	}

	// #endregion

	// #region sequence ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/**
	 * items up to end of input (top level), or up to the ']' that closes a nested body.  
	 * {opener} is the offset of the body's '[', when nested
	 */
	#sequence(depth: number, opener?: number): FormatItem[] {
		const cursor = this.#cursor;
		const items: FormatItem[] = [];
		let text = '';																					// pending literal

		const flush = () => {
			if (text)
				items.push({ type: 'literal', value: text });
			text = '';
		}
		const isLiteral = (byte: number) =>
			byte !== Byte.Open
			&& (byte !== Byte.Close || isUndefined(opener))				// ']' is plain text at the top level
			&& (byte !== Byte.Backslash || this.#version === VERSION.One);

		while (true) {
			const byte = cursor.peek();

			switch (true) {
				case isUndefined(byte):
					if (isDefined(opener))
						fail(GRAMMAR.UnclosedBracket, span(opener, opener + 1), 'unclosed bracket');
					flush();
					return items;

				case byte === Byte.Close && isDefined(opener):				// end of a nested body
					cursor.advance();
					flush();
					return items;

				case byte === Byte.Open && cursor.peek(1) === Byte.Open:
					cursor.advance(2);
					text += '[';
					break;

				case byte === Byte.Open:
					flush();
					items.push(this.#component(depth));
					break;

				case byte === Byte.Backslash && this.#version === VERSION.Two:
					text += this.#escape();
					break;

				default: {
					const start = cursor.offset;
					cursor.take(isLiteral);
					text += cursor.slice(start, cursor.offset);
				}
			}
		}
	}

	/** a backslash escape: '\\', '\[' or '\]' */
	#escape() {
		const cursor = this.#cursor;
		const start = cursor.offset;
		const next = cursor.peek(1);

		switch (next) {
			case Byte.Backslash:
			case Byte.Open:
			case Byte.Close:
				cursor.advance(2);
				return String.fromCharCode(next);

			case undefined:
				return fail(GRAMMAR.InvalidEscapeSequence, span(start, start + 1), 'trailing backslash');

			default:
				return fail(GRAMMAR.InvalidEscapeSequence, this.#charSpan(start + 1), `invalid escape sequence "\\${cursor.slice(start + 1, this.#charSpan(start + 1).end)}"`);
		}
	}

	// #endregion

	// #region component ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** a bracketed component, or (version 2) an optional / first group */
	#component(depth: number): FormatItem {
		const cursor = this.#cursor;
		const opener = cursor.offset;
		cursor.advance();																				// '['
		cursor.take(isWhitespace);

		const nameStart = cursor.offset;
		if (cursor.take(isTokenByte) === 0)
			fail(GRAMMAR.MissingComponentName, span(nameStart), 'expected a component name');

		const nameSpan = span(nameStart, cursor.offset);
		const name = cursor.slice(nameSpan.start, nameSpan.end).toLowerCase();

		if (this.#version === VERSION.Two) {
			switch (name) {
				case KEYWORD.Optional:
					return this.#optional(opener, depth);
				case KEYWORD.First:
					return this.#first(opener, depth);
			}
		}

		const modifiers = this.#modifiers();

		if (!cursor.eat(Byte.Close))
			fail(GRAMMAR.UnclosedBracket, span(opener, opener + 1), 'unclosed bracket');

		// validate only once the brackets balance
		if (!isComponent(name))
			fail(GRAMMAR.InvalidComponent, nameSpan, `invalid component ${quote(name)}`);

		const given = new Map<string, ModifierValue>();
		for (const { key, keySpan, value, valueSpan } of modifiers) {
			const rule = lookupModifier(name, key);
			if (isUndefined(rule))
				fail(GRAMMAR.InvalidModifierKey, keySpan, `invalid modifier ${quote(key)} for component ${quote(name)}`);

			const parsed = parseModifierValue(rule, value);
			if (isUndefined(parsed))
				fail(GRAMMAR.InvalidModifierValue, valueSpan, `invalid value ${quote(value)} for modifier ${quote(key)}`);

			given.set(key, parsed);																// last one wins
		}

		const missing = requiredModifiers(name).find(key => !given.has(key));
		if (isDefined(missing))
			fail(GRAMMAR.MissingRequiredModifier, nameSpan, `missing required modifier ${quote(missing)} for component ${quote(name)}`);

		return { type: 'component', component: resolveModifiers(name, given) };
	}

	/** whitespace-separated 'key:value' tokens, up to (not including) the closing bracket */
	#modifiers() {
		const cursor = this.#cursor;
		const list: Modifier[] = [];

		while (cursor.take(isWhitespace) > 0) {
			const start = cursor.offset;
			if (cursor.take(isTokenByte) === 0)
				break;																							// trailing whitespace

			const end = cursor.offset;
			const token = cursor.slice(start, end);
			const colon = token.indexOf(':');

			if (colon === -1)
				fail(GRAMMAR.ExpectedModifierValue, span(start, end), `expected "key:value", found ${quote(token)}`);
			if (colon === 0)
				fail(GRAMMAR.InvalidModifierKey, span(start), 'expected a modifier key');

			const valueStart = start + byteLength(token.slice(0, colon + 1));
			if (valueStart === end)
				fail(GRAMMAR.ExpectedModifierValue, span(end), `expected a value for modifier ${quote(token.slice(0, colon))}`);

			list.push({
				key: token.slice(0, colon).toLowerCase(),
				keySpan: span(start, valueStart - 1),
				value: token.slice(colon + 1),
				valueSpan: span(valueStart, end),
			});
		}

		return list;
	}

	// #endregion

	// #region nesting (version 2) ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~

	/** exactly one space must follow the keyword */
	#keywordSpace(kind: GRAMMAR, keyword: string) {
		const cursor = this.#cursor;
		const start = cursor.offset;
		const size = cursor.take(isWhitespace);

		if (size !== 1 || cursor.bytes[start] !== Byte.Space)
			fail(kind, size === 0 ? this.#charSpan(start) : span(start, start + size), `expected a single space after "${keyword}"`);
	}

	/** a '[' ... ']' body, one level deeper */
	#body(depth: number) {
		const cursor = this.#cursor;
		const opener = cursor.offset;

		if (!cursor.eat(Byte.Open))
			fail(GRAMMAR.ExpectedOpeningBracket, this.#charSpan(), `expected "[", found ${this.#here()}`);
		if (depth + 1 > this.#limit)
			fail(GRAMMAR.NestingLimitExceeded, span(opener, opener + 1), `nesting deeper than ${this.#limit}`);

		return this.#sequence(depth + 1, opener);
	}

	#optional(opener: number, depth: number): FormatItem {
		const cursor = this.#cursor;

		this.#keywordSpace(GRAMMAR.ExpectedWhitespaceAfterOptional, KEYWORD.Optional);
		const items = this.#body(depth);

		cursor.take(isWhitespace);
		if (cursor.done)
			fail(GRAMMAR.UnclosedBracket, span(opener, opener + 1), 'unclosed bracket');
		if (!cursor.eat(Byte.Close))
			fail(GRAMMAR.UnexpectedToken, this.#charSpan(), `expected "]" to close "optional", found ${this.#here()}`);

		return { type: 'optional', items };
	}

	#first(opener: number, depth: number): FormatItem {
		const cursor = this.#cursor;
		const alternatives: FormatItem[][] = [];

		this.#keywordSpace(GRAMMAR.ExpectedWhitespaceAfterFirst, KEYWORD.First);
		alternatives.push(this.#body(depth));

		while (true) {
			cursor.take(isWhitespace);

			switch (cursor.peek()) {
				case undefined:
					return fail(GRAMMAR.UnclosedBracket, span(opener, opener + 1), 'unclosed bracket');

				case Byte.Close:
					cursor.advance();
					return { type: 'first', alternatives };

				case Byte.Open:
					alternatives.push(this.#body(depth));
					break;

				default:
					return fail(GRAMMAR.UnexpectedToken, this.#charSpan(), `expected "[" or "]" in "first", found ${this.#here()}`);
			}
		}
	}

	// #endregion
}

interface Modifier {
	key: string;
	keySpan: Span;
	value: string;
	valueSpan: Span;
}

/** freeze a compiled tree, so it may be shared */
export function deepFreeze<T>(obj: T): T {
	if (typeof obj === 'object' && obj !== null && !Object.isFrozen(obj)) {
		Object.freeze(obj);
		Object.values(obj).forEach(deepFreeze);
	}

	return obj;
}
