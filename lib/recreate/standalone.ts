import { decide } from '../decision';
import { ImageReference, InvalidReference } from '../image';
import type { LogRecord } from '../ledger';

import type { Override, Plan, ProtocolOpts, ProtocolState } from './types';
import {
	applyOverride,
	currentIdentity,
	namedReference,
	pullAndResolve,
	record,
} from './utils';

type StandalonePlan = Extract<Plan, { kind: 'standalone' }>;

/**
 * Update a container that is not managed by a compose file.
 *
 * The container is only stopped and removed after the new image
 * has been pulled and resolved. It is then started again with the
 * runtime spec captured when the plan was created.
 */
export async function standalone(
	{ name, info, spec }: StandalonePlan,
	override: Override | undefined,
	opts: ProtocolOpts,
): Promise<LogRecord> {
	const { runtime, trace, defaultTag } = opts;

	const prior = info.Config.Image;
	const current = await currentIdentity(opts, info);

	const base =
		override != null && 'reference' in override
			? prior
			: await namedReference(opts, info);
	if (base == null) {
		// Nothing to pull, the image has no repository
		trace({
			event: 'pull-failed',
			target: name,
			reference: prior,
			cause: new InvalidReference(prior),
		});
		return record(opts, { name, reference: prior, action: 'pull-fail' });
	}

	const reference =
		override != null
			? applyOverride(base, override)
			: ImageReference.withTag(base, defaultTag);
	trace({ event: 'inspected', target: name, reference, current });

	const pulled = await pullAndResolve(opts, name, reference, () =>
		runtime.pull(reference),
	);

	// Standalone containers have no declaration to drift from
	const outcome = decide({
		pulled,
		current,
		explicit: override != null,
		drift: false,
	});
	trace({ event: 'compared', target: name, outcome });

	switch (outcome) {
		case 'pull-fail':
			return record(opts, { name, reference, action: outcome });
		case 'skip-pinned':
		case 'skip-mismatch':
			return record(opts, { name, reference, identity: current, action: outcome });
	}

	let state: ProtocolState = 'compared';
	try {
		await runtime.stop(name);
		state = 'stopped';
		trace({ event: 'stopped', target: name });

		await runtime.remove(name);
		state = 'removed';
		trace({ event: 'removed', target: name });

		await runtime.run({ ...spec, image: reference });
		state = 'started';
		trace({ event: 'started', target: name, reference });
	} catch (cause) {
		// Keep what was running before so it can be re-launched by hand
		trace({
			event: 'failed',
			target: name,
			state,
			cause,
			reference: prior,
			identity: current,
		});
		return record(opts, {
			name,
			reference: prior,
			identity: current,
			action: 'recreate-fail',
		});
	}

	return record(opts, { name, reference, identity: pulled, action: 'update' });
}
