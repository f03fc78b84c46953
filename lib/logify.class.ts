import { sprintf } from './string.library.js';

const Level = {
	Debug: 'debug',
	Log: 'log',
	Info: 'info',
	Warn: 'warn',
	Error: 'error',
} as const

/**
 * a named console logger.  
 * output is only written when {debug} is set,
 * and {catch} decides whether an error is thrown back to the caller or only reported
 */
export class Logify {
	#name;
	opts: Required<Logify.Constructor>;

	#log(method: Logify.Method, ...msg: unknown[]) {
		if (this.opts.debug)
			console[method](sprintf(this.#name, ...msg));
	}

	/** report an error, then throw it unless {catch} is set */
	catch(err: unknown, ...msg: unknown[]): undefined {
		const error = err instanceof Error ? err : new Error(sprintf(this.#name, err, ...msg));

		if (this.opts.catch) {
			this.warn(error.message, ...msg);											// show a warning on the console
			return;																								// safe-return
		}

		this.error(error.message, ...msg);											// this goes to the console
		throw error;																						// this goes back to the caller
	}

	log = this.#log.bind(this, Level.Log);
	info = this.#log.bind(this, Level.Info);
	warn = this.#log.bind(this, Level.Warn);
	debug = this.#log.bind(this, Level.Debug);
	error = this.#log.bind(this, Level.Error);

	constructor(name = '', opts: Logify.Constructor = {}) {
		this.#name = name ? `${name}:` : '';

		this.opts = {
			debug: opts.debug ?? false,
			catch: opts.catch ?? false,
		}
	}
}

export namespace Logify {
	export type Method = Extract<keyof Console, 'log' | 'info' | 'debug' | 'warn' | 'error'>;

	export interface Constructor {
		debug?: boolean,
		catch?: boolean
	}
}
