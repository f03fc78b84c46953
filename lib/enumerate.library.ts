import { isArray, isObject } from './type.library.js';
import type { KeyOf, Prettify } from './type.library.js';

/**
 * The intent of this module is to provide a Javascript-supported syntax for an object to behave as an Enum.  
 * It can be used instead of Typescript's Enum (which is not supported in vanilla JS)
 */

type Stash = Record<string, unknown>

/**
 * This is the prototype for an Enum object.  
 * It contains just the methods / symbols we need.
 */
const ENUM = Object.create(null, {
	count: value(function (this: Stash) { return Object.keys(this).length }),
	keys: value(function (this: Stash) { return Object.keys(this) }),
	values: value(function (this: Stash) { return Object.values(this) }),
	entries: value(function (this: Stash) { return Object.entries(this) }),
	has: value(function (this: Stash, key: string) { return Object.hasOwn(this, key) }),
	includes: value(function (this: Stash, search: unknown) { return Object.values(this).includes(search) }),
	keyOf: value(function (this: Stash, search: unknown) { return Object.entries(this).find(([, val]) => val === search)?.[0] }),
	toString: value(function (this: Stash) { return JSON.stringify({ ...this }) }),
	[Symbol.toStringTag]: value('Enumify'),
	[Symbol.iterator]: value(function (this: Stash) { return Object.entries(this)[Symbol.iterator]() }),
})

/** define a Descriptor for an Enum's method */
function value(value: PropertyDescriptor["value"]) {
	return Object.assign({ enumerable: false, configurable: false, writable: false } as const, { value } as const);
}

/** turn a tuple of keys into an Object of key: index */
type Index<T extends ReadonlyArray<PropertyKey>> = {
	readonly [K in keyof T as K extends `${number}` ? T[K] & PropertyKey : never]: K extends `${infer N extends number}` ? N : never
}

/** extend the Enum object with 'helper' methods */
type Methods<T> = {
	/** count of Enum keys */																	count(): number;
	/** array of Enum keys */																	keys(): KeyOf<T>[];
	/** array of Enum values */																values(): T[keyof T][];
	/** tuple of Enum entries */															entries(): [KeyOf<T>, T[keyof T]][];
	/** test for an Enum key */																has(key: string): key is KeyOf<T>;
	/** test for an Enum value */															includes(search: unknown): search is T[keyof T];
	/** reverse lookup of Enum key by value */								keyOf(search: T[keyof T]): KeyOf<T> | undefined;
	/** stringify method */																		toString(): string;
	/** Iterator for Enum */																	[Symbol.iterator](): Iterator<[KeyOf<T>, T[keyof T]]>;
}

export type Enumify<T> = Readonly<T> & Methods<T>

export namespace Enum {
	export type keys<E> = E extends { keys(): (infer K)[] } ? K : never
	export type values<E> = E extends { values(): (infer V)[] } ? V : never
}

/**
 * function to return an 'enum-like' object (that we can use until Javascript implements its own)  
 * with useful helper-methods on the prototype
 */
export function enumify<const T extends ReadonlyArray<PropertyKey>>(list: T): Prettify<Enumify<Index<T>>>;
export function enumify<const T extends Record<string, unknown>>(list: T): Prettify<Enumify<T>>;
export function enumify(list: ReadonlyArray<PropertyKey> | Record<string, unknown>) {
	if (!isArray(list) && !isObject(list))
		throw new Error(`enumify requires an array or object as input`);

	const stash: Stash = isArray(list)												// refactor Array as an Object
		? list.reduce<Stash>((acc, itm, idx) => Object.assign(acc, { [String(itm)]: idx }), {})
		: { ...list }

	return Object.freeze(Object.create(ENUM, Object.getOwnPropertyDescriptors(stash)));
}

/**
 * Example of usage
 * 
 * const SEASON = enumify({ Spring: 'spring', Summer: 'summer', Autumn: 'autumn', Winter: 'winter' });
 * type SEASON = Enum.values<typeof SEASON>
 */
