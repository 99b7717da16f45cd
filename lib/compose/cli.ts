import { execFile } from 'child_process';
import { dirname } from 'path';
import { promisify } from 'util';

import { withOverlay } from './overlay';
import type { ComposeTool, ImageOverrides } from './types';
import { ComposeCommandFailed } from './types';

export type Exec = (
	command: string,
	args: string[],
	opts: { cwd: string },
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const defaultExec: Exec = (command, args, { cwd }) =>
	execFileAsync(command, args, {
		cwd,
		encoding: 'utf8',
		maxBuffer: 32 * 1024 * 1024,
	});

export interface ComposeCliOpts {
	/**
	 * Compose command, defaults to `docker compose`
	 */
	command: string[];

	/**
	 * Process runner
	 */
	exec: Exec;

	/**
	 * Where temporary overlay files are written, defaults
	 * to the system temporary directory
	 */
	tmpdir?: string;
}

function stderrOf(e: unknown): string {
	if (e instanceof Error && 'stderr' in e && typeof e.stderr === 'string') {
		return e.stderr.trim();
	}
	return '';
}

type ServicesConfig = { services: { [name: string]: { image?: unknown } } };

function isObject(x: unknown): x is object {
	return x != null && typeof x === 'object' && !Array.isArray(x);
}

function isServicesConfig(x: unknown): x is ServicesConfig {
	return (
		isObject(x) &&
		'services' in x &&
		isObject(x.services) &&
		Object.values(x.services).every(isObject)
	);
}

function lines(s: string) {
	return s
		.split('\n')
		.map((l) => l.trim())
		.filter((l) => l.length > 0);
}

/**
 * Compose tool running the `docker compose` command line
 */
function from({
	command = ['docker', 'compose'],
	exec = defaultExec,
	tmpdir,
}: Partial<ComposeCliOpts> = {}): ComposeTool {
	const [bin, ...prefix] = command;
	if (bin == null) {
		throw new Error('compose command cannot be empty');
	}

	const run = async (
		file: string,
		args: string[],
		overrides?: ImageOverrides,
	): Promise<string> =>
		withOverlay(
			overrides,
			async (overlay) => {
				const fullArgs = [
					...prefix,
					'-f',
					file,
					...(overlay != null ? ['-f', overlay] : []),
					...args,
				];
				const { stdout } = await exec(bin, fullArgs, {
					cwd: dirname(file),
				}).catch((e) => {
					throw new ComposeCommandFailed([bin, ...fullArgs], stderrOf(e), e);
				});
				return stdout;
			},
			tmpdir,
		);

	return {
		async services(file) {
			return lines(await run(file, ['config', '--services']));
		},
		async images(file) {
			const output = await run(file, ['config', '--format', 'json']);
			const config: unknown = JSON.parse(output);
			if (!isServicesConfig(config)) {
				throw new Error(`Unexpected output from 'compose config' for ${file}`);
			}

			const images: { [service: string]: string } = {};
			for (const [service, { image }] of Object.entries(config.services)) {
				if (typeof image === 'string' && image.length > 0) {
					images[service] = image;
				}
			}
			return images;
		},
		async pull(file, service, overrides) {
			await run(file, ['pull', service], overrides);
		},
		async up(file, service, overrides) {
			await run(
				file,
				['up', '--detach', '--force-recreate', '--no-deps', service],
				overrides,
			);
		},
		async containerId(file, service) {
			const [id] = lines(await run(file, ['ps', '--all', '--quiet', service]));
			return id;
		},
	};
}

export const ComposeCli = {
	from,
};
