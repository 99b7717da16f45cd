import Debug from 'debug';

import type { Logger } from './logger';

export const NAMESPACE = 'container-update';

/**
 * Create a logger on the `debug` package under the given namespace,
 * e.g. `container-update:warn`. Info and debug output goes to stdout.
 *
 * With `enable`, info, warnings and errors are shown without
 * the need to set DEBUG
 */
export function createLogger(
	namespace: string = NAMESPACE,
	{ enable = process.env.DEBUG == null }: { enable?: boolean } = {},
): Logger {
	const debug = Debug(namespace);
	debug.log = console.log.bind(console);

	if (enable) {
		Debug.enable(
			['error', 'warn', 'info'].map((level) => `${namespace}:${level}`).join(','),
		);
	}

	return {
		info: debug.extend('info'),
		warn: Debug(`${namespace}:warn`),
		error: Debug(`${namespace}:error`),
		debug: debug.extend('debug'),
	};
}
