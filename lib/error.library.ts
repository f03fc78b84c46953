import { sprintf } from './string.library.js';
import { enumify } from './enumerate.library.js';
import type { Enum } from './enumerate.library.js';

/** a byte range into a UTF-8 source; {end} is exclusive */
export interface Span {
	readonly start: number;
	readonly end: number;
}

/** reasons a format-description fails to compile */
export const GRAMMAR = enumify({
	MissingComponentName: 'MissingComponentName',
	InvalidComponent: 'InvalidComponent',
	InvalidModifierKey: 'InvalidModifierKey',
	InvalidModifierValue: 'InvalidModifierValue',
	ExpectedModifierValue: 'ExpectedModifierValue',
	MissingRequiredModifier: 'MissingRequiredModifier',
	UnclosedBracket: 'UnclosedBracket',
	ExpectedOpeningBracket: 'ExpectedOpeningBracket',
	ExpectedWhitespaceAfterOptional: 'ExpectedWhitespaceAfterOptional',
	ExpectedWhitespaceAfterFirst: 'ExpectedWhitespaceAfterFirst',
	InvalidEscapeSequence: 'InvalidEscapeSequence',
	UnexpectedToken: 'UnexpectedToken',
	InvalidFormatDescriptionVersion: 'InvalidFormatDescriptionVersion',
	NestingLimitExceeded: 'NestingLimitExceeded',
});
export type GRAMMAR = Enum.values<typeof GRAMMAR>

/** reasons input text does not match a format-description */
export const PARSE = enumify({
	InvalidLiteral: 'InvalidLiteral',
	InvalidComponentValue: 'InvalidComponentValue',
	InconsistentParsedField: 'InconsistentParsedField',
	UnexpectedTrailingCharacters: 'UnexpectedTrailingCharacters',
});
export type PARSE = Enum.values<typeof PARSE>

/** reasons a value cannot be rendered */
export const FORMAT = enumify({
	UnsupportedComponent: 'UnsupportedComponent',
	InvalidComponentValue: 'InvalidComponentValue',
});
export type FORMAT = Enum.values<typeof FORMAT>

/** reasons a Parsed cannot become a calendar value */
export const CONVERT = enumify({
	InsufficientInformation: 'InsufficientInformation',
	ComponentRange: 'ComponentRange',
});
export type CONVERT = Enum.values<typeof CONVERT>

/** compile-time error, pointing at the offending bytes of the description */
export class InvalidFormatDescription extends Error {
	override name = 'InvalidFormatDescription';

	constructor(readonly kind: GRAMMAR, readonly span: Span, detail: string) {
		super(sprintf('%s at byte %s..%s: %s', kind, span.start, span.end, detail));
	}
}

/** parse-time error, pointing at the offset into the input */
export class ParseFromDescriptionError extends Error {
	override name = 'ParseFromDescriptionError';

	constructor(readonly kind: PARSE, readonly offset: number, readonly component?: string) {
		super(component
			? sprintf('%s (%s) at byte %s', kind, component, offset)
			: sprintf('%s at byte %s', kind, offset));
	}
}

/** render-time error, naming the component that could not be written */
export class FormattingError extends Error {
	override name = 'FormattingError';

	constructor(readonly kind: FORMAT, readonly component: string, detail = '') {
		super(sprintf('%s (%s)', kind, component, ...(detail ? [detail] : [])));
	}
}

/** conversion error, naming the field that is missing or out of range */
export class TryFromParsedError extends Error {
	override name = 'TryFromParsedError';

	constructor(readonly kind: CONVERT, readonly component: string, detail = '') {
		super(sprintf('%s (%s)', kind, component, ...(detail ? [detail] : [])));
	}
}
