import { stat } from 'fs/promises';
import { dirname, resolve } from 'path';

import type { ComposeTool } from './compose';
import { ComposeCli } from './compose';
import { ArgumentError, Config } from './config';
import type { ManagedContext } from './context';
import type { Trace } from './events';
import { IdentityResolver } from './identity';
import type { LogRecord } from './ledger';
import { FAILURES, Ledger } from './ledger';
import type { Logger } from './logger';
import { NullLogger } from './logger';
import type { Override, Plan, ProtocolOpts } from './recreate';
import { Protocol } from './recreate';
import { record } from './recreate/utils';
import type { Prompt } from './rollback';
import { Rollback } from './rollback';
import type { ContainerRuntime } from './runtime';
import { DockerRuntime } from './runtime';
import { readableTrace } from './trace';

/**
 * Result of reconciling a single target. A target either ends with
 * a ledger record or with an error that prevented recording one
 */
export type TargetResult =
	| { readonly target: string; readonly record: LogRecord }
	| { readonly target: string; readonly error: Error };

export interface Report {
	readonly results: TargetResult[];

	/**
	 * False if any target failed
	 */
	readonly success: boolean;
}

export interface ReconcilerOpts {
	/**
	 * Container runtime, defaults to the local docker engine
	 */
	runtime: ContainerRuntime;

	/**
	 * Compose tool, defaults to the compose command line
	 * from the configuration
	 */
	compose: ComposeTool;

	/**
	 * Ledger, defaults to the file from the configuration
	 */
	ledger: Ledger;
	logger: Logger;

	/**
	 * Receives reconciliation events, defaults to
	 * a readable trace on the logger
	 */
	trace: Trace;

	/**
	 * Operator prompt, required for rollback
	 */
	prompt: Prompt;
	config: Partial<Config>;
	clock: () => Date;
}

export interface Reconciler {
	/**
	 * Update every service declared in a compose file, or only the
	 * given service. A tag can only be given along with a service
	 */
	updateFile(
		file: string,
		opts?: { service?: string; tag?: string },
	): Promise<Report>;

	/**
	 * Update containers by name. A tag can only be given
	 * for a single container
	 */
	updateContainers(names: string[], opts?: { tag?: string }): Promise<Report>;

	/**
	 * Interactively roll back a container or service to an image
	 * it ran before
	 */
	rollback(name: string): Promise<Report>;
}

type Planned =
	| { readonly target: string; readonly plan: Plan }
	| { readonly target: string; readonly error: Error };

function toError(e: unknown): Error {
	return e instanceof Error ? e : new Error(String(e));
}

function report(results: TargetResult[]): Report {
	return {
		results,
		success: results.every(
			(r) => 'record' in r && !FAILURES.includes(r.record.action),
		),
	};
}

async function isFile(path: string) {
	return stat(path).then(
		(s) => s.isFile(),
		() => false,
	);
}

// Containers of the same service are reconciled once
function planKey(plan: Plan) {
	return plan.kind === 'managed'
		? `${plan.context.configFile}#${plan.context.service}`
		: `${plan.kind}#${plan.name}`;
}

function from(opts: Partial<ReconcilerOpts> = {}): Reconciler {
	const config = Config.from(opts.config ?? {});
	const logger = opts.logger ?? NullLogger;
	const trace = opts.trace ?? readableTrace(logger);
	const runtime = opts.runtime ?? new DockerRuntime();
	const compose =
		opts.compose ?? ComposeCli.from({ command: config.composeCommand });
	const ledger = opts.ledger ?? Ledger.from(config.logFile, { logger });

	const protocol: ProtocolOpts = {
		runtime,
		compose,
		ledger,
		resolver: IdentityResolver.from(runtime),
		trace,
		defaultTag: config.defaultTag,
		driftProtection: config.driftProtection,
		clock: opts.clock ?? (() => new Date()),
	};

	const plan = async (
		target: string,
		fn: () => Promise<Plan>,
	): Promise<Planned> => {
		try {
			return { target, plan: await fn() };
		} catch (e) {
			const error = toError(e);
			logger.error(`${target}: failed to inspect:`, error.message);
			return { target, error };
		}
	};

	// Unexpected errors leave the outcome unknown, the target is
	// recorded as failed without an identity
	const recordError = async (name: string) => {
		await record(protocol, { name, action: 'recreate-fail' }).catch(
			(e: unknown) => {
				logger.error(`${name}: failed to record outcome:`, toError(e).message);
			},
		);
	};

	// Every target is planned before any of them is executed, so
	// declared identities are resolved before anything is pulled.
	// Targets are then executed one at a time, a failing target
	// does not stop the others
	const run = async (
		planned: Planned[],
		override: Override | undefined,
	): Promise<Report> => {
		const results: TargetResult[] = [];
		for (const p of planned) {
			if ('error' in p) {
				await recordError(p.target);
				results.push(p);
				continue;
			}

			try {
				// The runtime spec of a standalone container is captured
				// again right before it is re-created
				const plan =
					p.plan.kind === 'standalone'
						? await Protocol.planContainer(p.plan.name, protocol)
						: p.plan;
				const record = await Protocol.execute(plan, override, protocol);
				results.push({ target: p.target, record });
			} catch (e) {
				const error = toError(e);
				logger.error(`${p.target}: ${error.message}`);
				await recordError(p.plan.name);
				results.push({ target: p.target, error });
			}
		}

		if (config.prune) {
			logger.info('pruning unused images');
			await runtime.pruneImages().catch((cause: unknown) => {
				trace({ event: 'prune-failed', cause });
			});
		}

		return report(results);
	};

	return {
		async updateFile(file, { service, tag } = {}) {
			if (tag != null && service == null) {
				throw new ArgumentError('a tag requires a service when a file is given');
			}

			const configFile = resolve(file);
			if (!(await isFile(configFile))) {
				throw new ArgumentError(`compose file '${file}' not found`);
			}

			const declared = await compose.services(configFile);
			if (service != null && !declared.includes(service)) {
				throw new ArgumentError(
					`service '${service}' is not declared in '${file}'`,
				);
			}

			const images = await compose.images(configFile);
			const services = (service != null ? [service] : declared).filter((s) => {
				if (images[s] == null) {
					logger.warn(`${s}: no image declared, skipping`);
					return false;
				}
				return true;
			});

			const planned: Planned[] = [];
			for (const s of services) {
				const context: ManagedContext = {
					configFile,
					workingDir: dirname(configFile),
					service: s,
				};
				planned.push(
					await plan(s, () => Protocol.planService(context, images, protocol)),
				);
			}

			return run(planned, tag != null ? { tag } : undefined);
		},

		async updateContainers(names, { tag } = {}) {
			if (names.length === 0) {
				throw new ArgumentError('no containers given');
			}
			if (tag != null && names.length > 1) {
				throw new ArgumentError('a tag can only be given for a single container');
			}

			const planned: Planned[] = [];
			const seen = new Set<string>();
			for (const name of new Set(names)) {
				const p = await plan(name, () =>
					Protocol.planContainer(name, protocol),
				);
				if ('plan' in p) {
					const key = planKey(p.plan);
					if (seen.has(key)) {
						logger.debug(`${name}: already planned as ${p.plan.name}`);
						continue;
					}
					seen.add(key);
				}
				planned.push(p);
			}

			return run(planned, tag != null ? { tag } : undefined);
		},

		async rollback(name) {
			const { prompt } = opts;
			if (prompt == null) {
				throw new ArgumentError('rollback requires an interactive prompt');
			}

			const record = await Rollback.rollback(name, {
				...protocol,
				prompt,
				limit: config.rollbackLimit,
			});
			return report([{ target: name, record }]);
		},
	};
}

export const Reconciler = {
	from,
};
