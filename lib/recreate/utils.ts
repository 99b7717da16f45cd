import { Identity, ImageReference } from '../image';
import type { LogRecord } from '../ledger';
import type { ContainerInspect } from '../runtime';
import { ImageNotFound } from '../runtime';

import type { Override, ProtocolOpts } from './types';

/**
 * Append a record to the ledger, stamped with the current time
 */
export async function record(
	{ ledger, trace, clock }: ProtocolOpts,
	r: Omit<LogRecord, 'timestamp'>,
): Promise<LogRecord> {
	const entry: LogRecord = { timestamp: clock().toISOString(), ...r };
	await ledger.append(entry);
	trace({ event: 'recorded', record: entry });
	return entry;
}

/**
 * Apply an override to a base reference
 */
export function applyOverride(base: string, override: Override): string {
	if ('reference' in override) {
		return override.reference;
	}
	return ImageReference.withTag(base, override.tag);
}

/**
 * Return a reference with a repository for the image the container
 * was created from. Containers created from an image id get the
 * repository from the tags or digests of the image, if it is still
 * available
 */
export async function namedReference(
	{ runtime }: ProtocolOpts,
	info: ContainerInspect,
): Promise<string | undefined> {
	if (ImageReference.repositoryOf(info.Config.Image) != null) {
		return info.Config.Image;
	}

	const image = await runtime.inspectImage(info.Image).catch((e) => {
		if (e instanceof ImageNotFound) {
			return undefined;
		}
		throw e;
	});
	return [...(image?.RepoTags ?? []), ...(image?.RepoDigests ?? [])].find(
		(r) => !r.startsWith('<none>') && ImageReference.repositoryOf(r) != null,
	);
}

/**
 * Resolve the identity of the image a container runs. If the image is no
 * longer available locally the image id is used
 */
export async function currentIdentity(
	{ resolver }: ProtocolOpts,
	info: ContainerInspect,
): Promise<Identity> {
	const repository = ImageReference.repositoryOf(info.Config.Image);
	return (
		(await resolver.tryResolve(info.Image, repository)) ??
		Identity.from(info.Image)
	);
}

/**
 * Pull a reference and resolve it. Returns undefined if the pull fails,
 * whatever copy of the image is available locally.
 *
 * Image ids only exist locally and are resolved without pulling
 */
export async function pullAndResolve(
	opts: ProtocolOpts,
	target: string,
	reference: string,
	pull: () => Promise<void>,
): Promise<Identity | undefined> {
	const { resolver, trace } = opts;

	if (!Identity.is(reference)) {
		trace({ event: 'pull-start', target, reference });
		try {
			await pull();
		} catch (cause) {
			trace({ event: 'pull-failed', target, reference, cause });
			return undefined;
		}
	}

	const pulled = await resolver.tryResolve(reference);
	if (pulled != null) {
		trace({ event: 'pulled', target, reference, identity: pulled });
	}
	return pulled;
}
