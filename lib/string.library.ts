import { isObject, isString } from './type.library.js';

/** stringify a value, allowing for undefined and null */
export const asString = (str?: unknown) => {
	switch (true) {
		case str === undefined:
		case str === null:
			return '';

		case isObject(str):
			return JSON.stringify(str);

		default:
			return String(str);
	}
}

/** pad a number (or string) to a fixed width, with '0' for numbers and ' ' otherwise */
export const pad = (nbr: string | number | bigint = 0, len = 2, fill?: string) =>
	nbr.toString().padStart(len, fill ?? (isString(nbr) ? ' ' : '0'));

const regexp = /\$\{(\d)\}/g;																// pattern to find "${digit}" parameter markers

/**
 * use sprintf-style formatting on a string.  
 * '%s' and '%j' markers are flipped to positional '${digit}' parameters,
 * and any argument without a marker is appended
 */
export function sprintf(fmt: string, ...msg: unknown[]) {
	let cnt = 0;
	let sfmt = fmt.replace(/%[sj]/g, _ => `\${${cnt++}}`);		// flip all the %s or %j to a ${digit} parameter

	const params = Array.from(sfmt.matchAll(regexp))
		.map(match => Number(match[1]))													// which parameters are in the fmt
	msg.forEach((_, idx) => {
		if (!params.includes(idx))															// if more args than params
			sfmt += `${sfmt.length === 0 ? '' : ' '}\${${idx}}`		//  append a dummy param to fmt
	})

	return sfmt.replace(regexp, (_, idx: string) => asString(msg[Number(idx)]));
}

/** describe a byte for a message, e.g. '"["' or 'end of input' */
export const quote = (str?: string) =>
	isString(str) ? JSON.stringify(str) : 'end of input';
