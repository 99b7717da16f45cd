import { decide } from '../decision';
import type { Identity } from '../image';
import type { LogRecord } from '../ledger';

import type { Override, Plan, ProtocolOpts, ProtocolState } from './types';
import {
	applyOverride,
	currentIdentity,
	pullAndResolve,
	record,
} from './utils';

type ManagedPlan = Extract<Plan, { kind: 'managed' }>;

export class NoLiveInstance extends Error {
	constructor(service: string) {
		super(`No running container for service '${service}' after re-create`);
	}
}

/**
 * Update a service declared in a compose file.
 *
 * The compose tool performs the stop, remove and start of the service
 * container, with the override (if any) applied on top of the file. The
 * result is verified by inspecting the live container afterwards.
 */
export async function managed(
	{ name, context, image, declared }: ManagedPlan,
	override: Override | undefined,
	opts: ProtocolOpts,
): Promise<LogRecord> {
	const { runtime, compose, trace, driftProtection } = opts;
	const { configFile: file, service } = context;

	const containerId = await compose.containerId(file, service);
	const info =
		containerId != null ? await runtime.inspectContainer(containerId) : undefined;
	const current = info != null ? await currentIdentity(opts, info) : undefined;
	const prior = info?.Config.Image;

	const reference = override != null ? applyOverride(image, override) : image;
	const overrides = override != null ? { [service]: reference } : undefined;
	trace({ event: 'inspected', target: name, reference, current });

	const drift = declared != null && current != null && declared !== current;
	if (drift) {
		trace({
			event: 'drift',
			target: name,
			declared,
			current,
			protected: driftProtection && override == null,
		});
	}

	const pulled = await pullAndResolve(opts, name, reference, () =>
		compose.pull(file, service, overrides),
	);

	const outcome = decide({
		pulled,
		current,
		explicit: override != null,
		drift: drift && driftProtection,
	});
	trace({ event: 'compared', target: name, outcome });

	switch (outcome) {
		case 'pull-fail':
			return record(opts, { name, reference, action: outcome });
		case 'skip-pinned':
			return record(opts, { name, reference, identity: pulled, action: outcome });
		case 'skip-mismatch':
			return record(opts, {
				name,
				reference: prior ?? reference,
				identity: current,
				action: outcome,
			});
	}

	let state: ProtocolState = 'compared';
	let identity: Identity | undefined;
	try {
		await compose.up(file, service, overrides);
		state = 'started';
		trace({ event: 'started', target: name, reference });

		const id = await compose.containerId(file, service);
		const live = id != null ? await runtime.inspectContainer(id) : undefined;
		if (live == null || !live.State.Running) {
			throw new NoLiveInstance(service);
		}

		identity = await currentIdentity(opts, live);
		state = 'verified';
		trace({ event: 'verified', target: name, identity });
	} catch (cause) {
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

	return record(opts, { name, reference, identity, action: 'update' });
}
