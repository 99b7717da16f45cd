/**
 * Image overrides per service, e.g. `{ web: 'nginx:1.27' }`
 */
export type ImageOverrides = { [service: string]: string };

export class ComposeCommandFailed extends Error {
	constructor(
		readonly args: string[],
		readonly stderr: string,
		cause?: unknown,
	) {
		super(
			`Command '${args.join(' ')}' failed${stderr.length > 0 ? `: ${stderr}` : ''}`,
			{ cause },
		);
	}
}

/**
 * Declarative multi-service primitives operating on a compose file.
 *
 * Operations receiving overrides apply them on top of the compose
 * file for the duration of the call.
 */
export interface ComposeTool {
	/**
	 * List the services declared in the file
	 */
	services(file: string): Promise<string[]>;

	/**
	 * Return the image reference declared by every service that has one
	 */
	images(file: string): Promise<{ [service: string]: string }>;

	pull(file: string, service: string, overrides?: ImageOverrides): Promise<void>;

	/**
	 * Re-create the service container, without touching its dependencies
	 */
	up(file: string, service: string, overrides?: ImageOverrides): Promise<void>;

	/**
	 * Return the id of the service container, running or not, or
	 * undefined if there is none
	 */
	containerId(file: string, service: string): Promise<string | undefined>;
}
