import { COMPOSE_SERVICE_LABEL } from './context';
import type { Identity } from './image';
import { ImageReference } from './image';
import type { ActionKind, LogRecord } from './ledger';
import type { Plan, ProtocolOpts } from './recreate';
import { Protocol } from './recreate';
import { record } from './recreate/utils';
import { ImageNotFound } from './runtime';

/**
 * Actions whose record identifies an image the target actually ran
 */
export const ROLLBACK_SOURCES: readonly ActionKind[] = [
	'update',
	'skip-pinned',
	'rollback-success',
	'recreate-fail',
];

export type Candidate = LogRecord & { readonly identity: Identity };

/**
 * Asks the operator to choose one of the entries
 */
export interface Prompt {
	/**
	 * Present the numbered choices and return the raw answer
	 */
	ask(question: string, choices: string[]): Promise<string>;
}

export class NoHistory extends Error {
	constructor(readonly target: string) {
		super(`No rollback history for '${target}'`);
	}
}

export class InvalidSelection extends Error {
	constructor(answer: string, count: number) {
		super(
			`Invalid choice '${answer}', expected a number between 1 and ${count}`,
		);
	}
}

export interface RollbackOpts extends ProtocolOpts {
	readonly prompt: Prompt;

	/**
	 * Maximum number of candidates to present
	 */
	readonly limit: number;
}

function isCandidate(r: LogRecord): r is Candidate {
	return r.identity != null;
}

/**
 * Return the most recent distinct identities the target ran,
 * most recent first
 */
async function candidates(
	{ ledger }: RollbackOpts,
	names: string[],
	limit: number,
): Promise<Candidate[]> {
	const records = await ledger.query({ names, actions: ROLLBACK_SOURCES });

	const seen = new Set<Identity>();
	const result: Candidate[] = [];
	for (const r of records.filter(isCandidate)) {
		if (seen.has(r.identity)) {
			continue;
		}
		seen.add(r.identity);
		result.push(r);
	}
	return result.slice(0, limit);
}

function pinned(reference: string | undefined, identity: Identity) {
	const repository =
		reference != null ? ImageReference.repositoryOf(reference) : undefined;
	return repository != null
		? ImageReference.format({ repository, digest: identity })
		: identity;
}

function describe({ timestamp, reference, identity, action }: Candidate) {
	return `${timestamp} => ${pinned(reference, identity)} (${action})`;
}

/**
 * Parse a 1-based menu answer
 *
 * Throws `InvalidSelection` if the answer is not a number within range
 */
function select(answer: string, count: number): number {
	const value = answer.trim();
	const n = Number(value);
	if (!/^\d+$/.test(value) || n < 1 || n > count) {
		throw new InvalidSelection(value, count);
	}
	return n - 1;
}

/**
 * Build the reference to re-create the target with. Image ids are
 * used as they are if the image is still available locally,
 * otherwise the identity is pinned as a digest of the repository
 */
async function referenceFor(
	{ runtime }: RollbackOpts,
	{ reference, identity }: Candidate,
): Promise<string> {
	const local = await runtime.inspectImage(identity).catch((e) => {
		if (e instanceof ImageNotFound) {
			return undefined;
		}
		throw e;
	});
	if (local?.Id === identity) {
		return identity;
	}
	return pinned(reference, identity);
}

/**
 * Find the target to roll back and every name its history may be
 * filed under. A container may have been logged by container name or,
 * if it belongs to a compose file, by service name.
 */
async function locate(
	name: string,
	opts: RollbackOpts,
): Promise<{ plan: Plan; keys: string[] }> {
	const plan = await Protocol.planContainer(name, opts);
	if (plan.kind !== 'not-found') {
		return { plan, keys: [...new Set([name, plan.name])] };
	}

	// The name may be a service, look for its containers
	const containers = await opts.runtime.findContainers({
		[COMPOSE_SERVICE_LABEL]: name,
	});
	const [first] = containers;
	if (first == null) {
		return { plan, keys: [name] };
	}

	const servicePlan = await Protocol.planContainer(first, opts);
	return {
		plan: servicePlan.kind !== 'not-found' ? servicePlan : plan,
		keys: [...new Set([name, ...containers])],
	};
}

/**
 * Roll back a container or service to an image found in the ledger.
 *
 * The chosen image is applied as an explicit override, which bypasses
 * drift protection. The outcome is recorded as `rollback-success` or
 * `rollback-fail`, referencing the chosen identity.
 *
 * Throws `NoHistory` if there is nothing to roll back to and
 * `InvalidSelection` if the answer is not valid. Nothing is
 * changed in either case
 */
async function rollback(name: string, opts: RollbackOpts): Promise<LogRecord> {
	const { prompt, limit } = opts;
	const { plan, keys } = await locate(name, opts);

	const options = await candidates(opts, keys, limit);
	if (options.length === 0) {
		throw new NoHistory(name);
	}

	if (plan.kind === 'not-found') {
		return Protocol.execute(plan, undefined, opts);
	}

	const answer = await prompt.ask(
		`Select rollback target for '${name}'`,
		options.map(describe),
	);
	const chosen = options[select(answer, options.length)];
	if (chosen == null) {
		throw new InvalidSelection(answer, options.length);
	}

	const outcome = (action: ActionKind, reference?: string) =>
		record(opts, {
			name: plan.name,
			...(reference != null && { reference }),
			identity: chosen.identity,
			action,
		});

	let reference: string | undefined;
	let result: LogRecord;
	try {
		reference = await referenceFor(opts, chosen);
		result = await Protocol.execute(plan, { reference }, opts);
	} catch (e) {
		await outcome('rollback-fail', reference);
		throw e;
	}

	const success =
		result.action === 'update' || result.action === 'skip-pinned';
	return outcome(success ? 'rollback-success' : 'rollback-fail', reference);
}

export const Rollback = {
	candidates,
	describe,
	select,
	rollback,
};
