export { Pattern, fmtPattern, parsePattern } from './pattern.class.js';
export { compile, compileWithVersion, deepFreeze } from './grammar.library.js';
export { describe, emitModule } from './embed.library.js';
export { render, format } from './render.library.js';
export { parse, parsePrefix, parseInto } from './parse.library.js';
export { Parsed } from './parsed.class.js';
export { Cursor } from './cursor.class.js';
export { provide, offsetSeconds } from './provider.library.js';
export { toPlainDate, toPlainTime, toPlainDateTime, toOffset, toZonedDateTime, toInstant } from './convert.library.js';
export { InvalidFormatDescription, ParseFromDescriptionError, FormattingError, TryFromParsedError, GRAMMAR, PARSE, FORMAT, CONVERT } from './error.library.js';
export { Table, lookupModifier, parseModifierValue, requiredModifiers, resolveModifiers, defaultModifier, isComponent } from './pattern.config/pattern.table.js';
export { COMPONENT, KEYWORD, VERSION, MONTHS, WEEKDAYS } from './pattern.config/pattern.enum.js';
export { Default, Layout } from './pattern.config/pattern.default.js';

export type { Sink } from './render.library.js';
export type { Fields, Field } from './parsed.class.js';
export type { Provider, Providable, DateFields, TimeFields, OffsetFields, TimestampFields, OffsetLike } from './provider.library.js';
export type { Span } from './error.library.js';
export type { Rule, ModifierValue } from './pattern.config/pattern.table.js';
export type { Component as ComponentKind, Version } from './pattern.config/pattern.enum.js';
export type { FormatItem, FormatItems, Literal, Component, Optional, First, ComponentSpec, Spec, Options, Config } from './pattern.config/pattern.type.js';
