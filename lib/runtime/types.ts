import type { RuntimeSpec } from '../runtime-spec';

/**
 * The subset of the container introspection response used
 * for reconciliation. Field names follow the Docker Engine API so
 * dockerode responses can be used as they are.
 */
export interface ContainerInspect {
	Id: string;
	Name: string;
	/**
	 * Id of the image the container is running
	 */
	Image: string;
	Config: {
		Image: string;
		Hostname?: string;
		Env?: string[] | null;
		Entrypoint?: string | string[] | null;
		Labels?: { [label: string]: string } | null;
	};
	HostConfig: {
		PortBindings?: PortMap | null;
		RestartPolicy?: { Name?: string; MaximumRetryCount?: number } | null;
		NetworkMode?: string;
		Tmpfs?: { [dir: string]: string } | null;
	};
	Mounts?: Array<{
		Type?: string;
		Name?: string;
		Source: string;
		Destination: string;
		RW: boolean;
	}> | null;
	State: {
		Running: boolean;
	};
}

export type PortMap = {
	[containerPort: string]: Array<{ HostIp?: string; HostPort?: string }> | null;
};

export interface ImageInspect {
	Id: string;
	RepoTags?: string[] | null;
	RepoDigests?: string[] | null;
	/**
	 * Defaults baked into the image
	 */
	Config?: {
		Env?: string[] | null;
		Entrypoint?: string | string[] | null;
	} | null;
}

export class ContainerNotFound extends Error {
	constructor(
		readonly container: string,
		cause?: unknown,
	) {
		super(`Container '${container}' not found`, { cause });
	}
}

export class ImageNotFound extends Error {
	constructor(
		readonly reference: string,
		cause?: unknown,
	) {
		super(`Image '${reference}' not found locally`, { cause });
	}
}

/**
 * Container runtime primitives. Every call is awaited by the caller
 * before the next one is issued.
 */
export interface ContainerRuntime {
	/**
	 * Throws `ContainerNotFound` if the container does not exist
	 */
	inspectContainer(name: string): Promise<ContainerInspect>;

	/**
	 * Inspect a local image. Never pulls.
	 *
	 * Throws `ImageNotFound` if the image is not available locally
	 */
	inspectImage(reference: string): Promise<ImageInspect>;

	/**
	 * Pull the reference from its registry
	 */
	pull(reference: string): Promise<void>;

	/**
	 * Stop the container. Stopping a stopped container is not an error
	 */
	stop(name: string): Promise<void>;

	remove(name: string): Promise<void>;

	/**
	 * Create and start a new container from the spec. Returns the
	 * new container id
	 */
	run(spec: RuntimeSpec): Promise<string>;

	/**
	 * Return the names of containers (running or not) carrying all the given labels
	 */
	findContainers(labels: { [label: string]: string }): Promise<string[]>;

	/**
	 * Remove every image not used by a container
	 */
	pruneImages(): Promise<void>;
}
