type IdentityBrand = { __brand: 'Identity' };

/**
 * A content derived token for an image. Two references point to
 * the same image if and only if their identities are equal, tags
 * are never compared.
 */
export type Identity = string & IdentityBrand;

export interface ImageReference {
	/**
	 * Repository, including the registry host (and port) if any
	 */
	readonly repository: string;
	readonly tag?: string;
	readonly digest?: string;
}

// algorithm:hex, e.g. sha256:4a5b...
const DIGEST_REGEX = /^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-f0-9]{32,}$/;

export class InvalidReference extends Error {
	constructor(ref: string) {
		super(`'${ref}' is not a valid image reference`);
	}
}

function isDigest(x: unknown): x is Identity {
	return typeof x === 'string' && DIGEST_REGEX.test(x);
}

export const Identity = {
	is: isDigest,
	/**
	 * Create an identity from a digest or image id. Throws if
	 * the value is not of the form `algorithm:hex`
	 */
	from(value: string): Identity {
		if (!isDigest(value)) {
			throw new Error(`'${value}' is not a valid image identity`);
		}
		return value;
	},
};

function parse(ref: string): ImageReference {
	let rest = ref.trim();
	if (isDigest(rest)) {
		// An image id, not a reference
		throw new InvalidReference(ref);
	}

	let digest: string | undefined;

	const at = rest.indexOf('@');
	if (at >= 0) {
		digest = rest.slice(at + 1);
		rest = rest.slice(0, at);
	}

	// A colon before the last slash belongs to the registry port
	let tag: string | undefined;
	const colon = rest.lastIndexOf(':');
	if (colon > rest.lastIndexOf('/')) {
		tag = rest.slice(colon + 1);
		rest = rest.slice(0, colon);
	}

	if (
		rest.length === 0 ||
		tag === '' ||
		(digest != null && !isDigest(digest))
	) {
		throw new InvalidReference(ref);
	}

	return {
		repository: rest,
		...(tag != null && { tag }),
		...(digest != null && { digest }),
	};
}

function format({ repository, tag, digest }: ImageReference): string {
	return (
		repository + (tag != null ? `:${tag}` : '') + (digest != null ? `@${digest}` : '')
	);
}

/**
 * Replace the version of a reference with the given tag,
 * e.g. `withTag('nginx:1.25', 'latest') === 'nginx:latest'`
 */
function withTag(ref: string, tag: string): string {
	const { repository } = parse(ref);
	return format({ repository, tag });
}

/**
 * Pin a reference to a content digest, dropping the tag
 */
function withDigest(ref: string, digest: string): string {
	const { repository } = parse(ref);
	return format({ repository, digest });
}

export const ImageReference = {
	parse,
	format,
	withTag,
	withDigest,
	/**
	 * Return the repository of a reference, or undefined if the
	 * reference cannot be parsed (e.g. an image id)
	 */
	repositoryOf(ref: string): string | undefined {
		try {
			return parse(ref).repository;
		} catch {
			return undefined;
		}
	},
};
