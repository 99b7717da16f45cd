import { Identity, ImageReference } from './image';
import type { ContainerRuntime } from './runtime';
import { ImageNotFound } from './runtime';

export interface IdentityResolver {
	/**
	 * Resolve a local image reference (tag, digest reference or image id)
	 * to its content identity.
	 *
	 * The repository digest matching `repository` is preferred, then
	 * any repository digest, then the image id. The resolver never pulls,
	 * pulling is the caller's responsibility.
	 *
	 * Throws `ImageNotFound` if the image is not available locally
	 */
	resolve(reference: string, repository?: string): Promise<Identity>;

	/**
	 * Same as resolve, but returns undefined if the image is not available
	 * locally
	 */
	tryResolve(reference: string, repository?: string): Promise<Identity | undefined>;
}

function splitDigest(repoDigest: string) {
	const at = repoDigest.lastIndexOf('@');
	if (at <= 0) {
		return undefined;
	}
	const digest = repoDigest.slice(at + 1);
	if (!Identity.is(digest)) {
		return undefined;
	}
	return { repository: repoDigest.slice(0, at), digest };
}

function from(runtime: ContainerRuntime): IdentityResolver {
	const resolve = async (reference: string, repository?: string) => {
		const image = await runtime.inspectImage(reference);
		const repo = repository ?? ImageReference.repositoryOf(reference);

		const digests = (image.RepoDigests ?? [])
			.map(splitDigest)
			.filter((d): d is { repository: string; digest: Identity } => d != null);

		const match = digests.find((d) => d.repository === repo) ?? digests[0];
		return match != null ? match.digest : Identity.from(image.Id);
	};

	return {
		resolve,
		async tryResolve(reference, repository) {
			return resolve(reference, repository).catch((e) => {
				if (e instanceof ImageNotFound) {
					return undefined;
				}
				throw e;
			});
		},
	};
}

export const IdentityResolver = {
	from,
};
