import type { Identity } from './image';

/**
 * The action chosen by the decision engine, before anything
 * is executed
 */
export type DecisionOutcome =
	| 'pull-fail'
	| 'skip-pinned'
	| 'skip-mismatch'
	| 'update';

export interface DecisionInput {
	/**
	 * Identity of the target reference after the pull, undefined if
	 * it could not be resolved
	 */
	pulled?: Identity;

	/**
	 * Identity of the image the target is currently running, undefined
	 * if there is no running instance
	 */
	current?: Identity;

	/**
	 * An explicit version (tag, digest or rollback selection) was requested
	 */
	explicit: boolean;

	/**
	 * The running identity diverges from the identity its declaration
	 * specifies
	 */
	drift: boolean;
}

/**
 * Choose what to do with a target. Rules are applied in order
 *
 * 1. the pulled reference cannot be resolved: `pull-fail`
 * 2. the target already runs the pulled identity: `skip-pinned`
 * 3. drift without an explicit request: `skip-mismatch`
 * 4. anything else: `update`
 *
 * An explicit request wins over drift protection, but nothing
 * is re-created if it is already running the right image.
 */
export function decide({
	pulled,
	current,
	explicit,
	drift,
}: DecisionInput): DecisionOutcome {
	if (pulled == null) {
		return 'pull-fail';
	}

	if (current === pulled) {
		return 'skip-pinned';
	}

	if (drift && !explicit) {
		return 'skip-mismatch';
	}

	return 'update';
}
