import { isString } from './type.library.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * A position over a UTF-8 byte sequence.  
 * The compiler walks a description with one Cursor; the parser walks the input with another.  
 * Backtracking is a snapshot() of the offset, later handed to restore().
 */
export class Cursor {
	readonly bytes: Uint8Array;
	#offset = 0;

	constructor(source: string | Uint8Array, offset = 0) {
		this.bytes = isString(source) ? encoder.encode(source) : source;
		this.#offset = offset;
	}

	/** current byte offset */
	get offset() {
		return this.#offset;
	}

	/** count of bytes not yet consumed */
	get remaining() {
		return this.bytes.length - this.#offset;
	}

	/** true when every byte is consumed */
	get done() {
		return this.#offset >= this.bytes.length;
	}

	/** the byte at {ahead} past the offset, without consuming it */
	peek(ahead = 0): number | undefined {
		return this.bytes[this.#offset + ahead];
	}

	/** consume {count} bytes (clamped to the end) */
	advance(count = 1) {
		this.#offset = Math.min(this.#offset + count, this.bytes.length);
		return this;
	}

	/** consume the byte at the offset, if it is {byte} */
	eat(byte: number) {
		if (this.peek() !== byte)
			return false;

		this.#offset++;
		return true;
	}

	/** consume the longest run (up to {max} bytes) that satisfies {predicate}; returns its length */
	take(predicate: (byte: number) => boolean, max = Infinity) {
		const start = this.#offset;

		while (this.#offset < this.bytes.length && this.#offset - start < max && predicate(this.bytes[this.#offset] ?? 0))
			this.#offset++;

		return this.#offset - start;
	}

	/** true if the bytes at the offset begin with {prefix}; ASCII letters fold when not {caseSensitive} */
	startsWith(prefix: Uint8Array, caseSensitive = true) {
		if (prefix.length > this.remaining)
			return false;

		for (let idx = 0; idx < prefix.length; idx++) {
			const have = this.bytes[this.#offset + idx] ?? 0;
			const want = prefix[idx] ?? 0;

			if (caseSensitive ? have !== want : foldCase(have) !== foldCase(want))
				return false;
		}

		return true;
	}

	/** decode the bytes between two offsets (default: offset to end) */
	slice(start = this.#offset, end = this.bytes.length) {
		return decoder.decode(this.bytes.subarray(start, end));
	}

	snapshot() {
		return this.#offset;
	}

	restore(offset: number) {
		this.#offset = offset;
		return this;
	}
}

/** encode a string as UTF-8 */
export const toBytes = (str: string) => encoder.encode(str);

/** byte-length of a string once encoded as UTF-8 */
export const byteLength = (str: string) => encoder.encode(str).length;

export const isDigit = (byte: number) => byte >= 0x30 && byte <= 0x39;
export const isWhitespace = (byte: number) => byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
export const foldCase = (byte: number) => byte >= 0x41 && byte <= 0x5a ? byte + 0x20 : byte;
