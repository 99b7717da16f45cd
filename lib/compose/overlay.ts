import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import type { ImageOverrides } from './types';

export const OVERLAY_FILE = 'compose.override.json';

/**
 * Write the overrides to a temporary compose file and call `fn` with
 * its path. The file is removed when `fn` settles, whether it succeeds
 * or throws.
 *
 * If there are no overrides, `fn` is called with undefined and nothing
 * is written. JSON is valid YAML, so compose reads the file as is.
 */
export async function withOverlay<T>(
	overrides: ImageOverrides | undefined,
	fn: (overlay: string | undefined) => Promise<T>,
	dir: string = tmpdir(),
): Promise<T> {
	const entries = Object.entries(overrides ?? {});
	if (entries.length === 0) {
		return await fn(undefined);
	}

	const overlayDir = await mkdtemp(join(dir, 'container-update-'));
	try {
		const overlay = join(overlayDir, OVERLAY_FILE);
		const services = Object.fromEntries(
			entries.map(([service, image]) => [service, { image }]),
		);
		await writeFile(overlay, JSON.stringify({ services }, null, 2), 'utf8');
		return await fn(overlay);
	} finally {
		await rm(overlayDir, { recursive: true, force: true });
	}
}
