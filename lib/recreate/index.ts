import { ManagedContext } from '../context';
import type { LogRecord } from '../ledger';
import { ContainerNotFound } from '../runtime';

import { managed } from './managed';
import { standalone } from './standalone';
import type { Override, Plan, ProtocolOpts } from './types';
import { record } from './utils';

export * from './types';
export { NoLiveInstance } from './managed';

export class MissingServiceImage extends Error {
	constructor(service: string, file: string) {
		super(`Service '${service}' in ${file} does not declare an image`);
	}
}

/**
 * Plan a compose service. The declared identity is resolved
 * here, before anything is pulled
 *
 * Throws `MissingServiceImage` if the service has no image
 */
async function planService(
	context: ManagedContext,
	images: { [service: string]: string },
	{ resolver }: ProtocolOpts,
): Promise<Plan> {
	const image = images[context.service];
	if (image == null) {
		throw new MissingServiceImage(context.service, context.configFile);
	}

	const declared = await resolver.tryResolve(image);
	return {
		kind: 'managed',
		name: context.service,
		context,
		image,
		...(declared != null && { declared }),
	};
}

/**
 * Plan a target given by container name
 */
async function planContainer(name: string, opts: ProtocolOpts): Promise<Plan> {
	const { runtime, compose, trace } = opts;
	try {
		const target = await ManagedContext.classify(runtime, name, trace);
		if (target.kind === 'standalone') {
			return target;
		}

		const images = await compose.images(target.context.configFile);
		return await planService(target.context, images, opts);
	} catch (e) {
		if (e instanceof ContainerNotFound) {
			return { kind: 'not-found', name };
		}
		throw e;
	}
}

/**
 * Run the recreate protocol for a planned target and
 * return the record appended to the ledger
 */
async function execute(
	plan: Plan,
	override: Override | undefined,
	opts: ProtocolOpts,
): Promise<LogRecord> {
	const { trace } = opts;
	switch (plan.kind) {
		case 'not-found':
			trace({ event: 'not-found', target: plan.name });
			return record(opts, { name: plan.name, action: 'not-found' });
		case 'standalone':
			trace({ event: 'start', target: plan.name, kind: 'standalone' });
			return standalone(plan, override, opts);
		case 'managed':
			trace({ event: 'start', target: plan.name, kind: 'managed' });
			return managed(plan, override, opts);
	}
}

export const Protocol = {
	planService,
	planContainer,
	execute,
};
