/**
 * Log sink used across the library. Messages are formatted
 * by the caller
 */
export interface Logger {
	debug(...args: unknown[]): void;
	info(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

export const NullLogger: Logger = {
	debug: () => {
		/*noop*/
	},
	info: () => {
		/*noop*/
	},
	warn: () => {
		/*noop*/
	},
	error: () => {
		/*noop*/
	},
};
