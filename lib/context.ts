import { isAbsolute, resolve } from 'path';

import type { Trace } from './events';
import { NullTrace } from './events';
import type { ContainerInspect, ContainerRuntime } from './runtime';
import { RuntimeSpec } from './runtime-spec';

export const COMPOSE_CONFIG_FILES_LABEL = 'com.docker.compose.project.config_files';
export const COMPOSE_WORKING_DIR_LABEL = 'com.docker.compose.project.working_dir';
export const COMPOSE_SERVICE_LABEL = 'com.docker.compose.service';

/**
 * Identifies the compose file and service owning a container
 */
export interface ManagedContext {
	/**
	 * Absolute path of the compose file
	 */
	readonly configFile: string;
	readonly workingDir: string;
	readonly service: string;
}

/**
 * What a target is, decided once per target
 */
export type Target =
	| {
			readonly kind: 'standalone';
			readonly name: string;
			readonly info: ContainerInspect;
			readonly spec: RuntimeSpec;
	  }
	| {
			readonly kind: 'managed';
			readonly name: string;
			readonly info: ContainerInspect;
			readonly context: ManagedContext;
	  };

/**
 * Read the managed context from container labels. Returns undefined
 * if any of the config file, working directory or service is missing
 */
function fromLabels(
	labels: { [label: string]: string } | null | undefined,
): ManagedContext | undefined {
	// Compose writes the list of files separated by commas, the
	// first one is the main file
	const [first = ''] = (labels?.[COMPOSE_CONFIG_FILES_LABEL] ?? '').split(',');
	const file = first.trim().replace(/^\[|\]$/g, '').replace(/"/g, '');
	const workingDir = labels?.[COMPOSE_WORKING_DIR_LABEL] ?? '';
	const service = labels?.[COMPOSE_SERVICE_LABEL] ?? '';

	if (file === '' || workingDir === '' || service === '') {
		return undefined;
	}

	return {
		configFile: isAbsolute(file) ? file : resolve(workingDir, file),
		workingDir,
		service,
	};
}

/**
 * Find out if a container is managed by a compose file. This
 * performs a single inspect call and has no other side effects.
 *
 * Throws `ContainerNotFound` if the container does not exist
 */
async function detect(
	runtime: ContainerRuntime,
	name: string,
): Promise<ManagedContext | undefined> {
	const info = await runtime.inspectContainer(name);
	return fromLabels(info.Config.Labels);
}

/**
 * Classify a target as managed or standalone. The runtime spec
 * of standalone containers is captured here, before anything else
 * happens to the container.
 *
 * Throws `ContainerNotFound` if the container does not exist
 */
async function classify(
	runtime: ContainerRuntime,
	name: string,
	trace: Trace = NullTrace,
): Promise<Target> {
	const info = await runtime.inspectContainer(name);
	const context = fromLabels(info.Config.Labels);
	if (context != null) {
		return { kind: 'managed', name, info, context };
	}

	const spec = await RuntimeSpec.fromContainer(runtime, info, trace);
	return { kind: 'standalone', name, info, spec };
}

export const ManagedContext = {
	fromLabels,
	detect,
	classify,
};
