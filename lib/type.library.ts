/** the actual type reported by ECMAScript */
const protoType = (obj?: unknown) => Object.prototype.toString.call(obj).slice(8, -1);

/**
 * return an object's type as a ProperCase string.  
 * if instance, return Class name
 */
export const getType = (obj?: unknown): Types => {
	const type = protoType(obj);

	switch (true) {
		case type === 'Object' && isFunctionLike(obj):
			return obj.constructor.name || 'Object';						// some Objects do not have a constructor method

		default:
			return type;
	}
}

const isFunctionLike = (obj: unknown): obj is { constructor: { name: string } } =>
	typeof obj === 'object' && obj !== null && typeof obj.constructor === 'function';

/** assert value is one of a list of Types */
export const isType = (obj: unknown, ...types: Types[]) => types.includes(getType(obj));

/** Type-Guards: assert \<obj> is of \<type> */
export const isString = (obj?: unknown): obj is string => isType(obj, 'String');
export const isNumber = (obj?: unknown): obj is number => isType(obj, 'Number');
export const isArray = (obj: unknown): obj is unknown[] => isType(obj, 'Array');
export const isObject = (obj?: unknown): obj is Record<string, unknown> => isType(obj, 'Object');

export const isNullish = <T>(obj: T | null | undefined): obj is null | undefined => isType(obj, 'Null', 'Undefined');
export const isDefined = <T>(obj: T): obj is NonNullable<T> => !isNullish(obj);
export const isUndefined = (obj?: unknown): obj is undefined => isType(obj, 'Undefined');

/** assert \<value> is one of the members of a readonly \<list> */
export const isOneOf = <const T extends ReadonlyArray<unknown>>(list: T, value: unknown): value is T[number] =>
	list.includes(value);

/** exhaustive-check for a switch over a discriminated union */
export function assertNever(val: never, msg = 'Unexpected value'): never {
	throw new Error(`${msg}: ${JSON.stringify(val)}`);
}

export type Types =
	| 'String' | 'Number' | 'BigInt' | 'Boolean' | 'Symbol' | 'Undefined' | 'Null'
	| 'Object' | 'Array' | 'Function' | 'Date' | 'RegExp' | 'Map' | 'Set' | 'Uint8Array'
	| (string & {})

export type KeyOf<T> = keyof T & string
/** flatten an intersection for a readable hover */
export type Prettify<T> = { [K in keyof T]: T[K] } & {}
