import { compile, deepFreeze } from './grammar.library.js';
import { Default } from './pattern.config/pattern.default.js';

import type { Version } from './pattern.config/pattern.enum.js';
import type { FormatItems } from './pattern.config/pattern.type.js';

/**
 * Ahead-of-time descriptions.  
 * describe() is meant for module-level constants: a bad description fails when the module loads,
 * and the compiled tree is frozen and shared by every later call.  
 * emitModule() writes the same compiled trees as TypeScript source, for a code-generation step.  
 * Both go through compile(), as does every runtime description.
 */

const cache = new Map<string, FormatItems>();

/**
 * compile once (per version and source), and reuse the frozen result.  
 * the cache is never evicted: pass only constant sources here.
 * a description built at run time (from user input, say) goes to compile() or `new Pattern()` instead.
 */
export function describe(source: string, version: Version = Default.version): FormatItems {
	const key = `${version}:${source}`;
	let items = cache.get(key);

	if (!items) {
		items = compile(source, version);
		cache.set(key, items);
	}

	return items;
}

export namespace Embed {
	export interface Options {
		/** module specifier the generated code imports from */		from?: string;
		/** grammar version for descriptions without a directive */	version?: Version;
	}
}

const Match = {
	/** a JavaScript identifier */															identifier: /^[A-Za-z_$][\w$]*$/,
	/** the end of a block comment */														endComment: /\*\//g,
} as const

/**
 * generate a TypeScript module that exports one frozen constant per named description.  
 * throws InvalidFormatDescription for the first description that does not compile
 */
export function emitModule(entries: Readonly<Record<string, string>>, options: Embed.Options = {}) {
	const from = options.from ?? 'datetime-pattern';
	const version = options.version ?? Default.version;

	const lines = [
		'// generated by emitModule(); regenerate instead of editing',
		`import { deepFreeze } from '${from}';`,
		`import type { FormatItems } from '${from}';`,
	];

	for (const [name, source] of Object.entries(entries)) {
		if (!Match.identifier.test(name))
			throw new Error(`Cannot emit a constant named "${name}"`);

		const items = compile(source, version);
		lines.push(
			'',
			`/** ${source.replace(Match.endComment, '*\\/')} */`,
			`export const ${name}: FormatItems = deepFreeze(${JSON.stringify(items)});`,
		);
	}

	return lines.join('\n') + '\n';
}
