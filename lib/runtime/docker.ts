import Docker from 'dockerode';

import type { RuntimeSpec } from '../runtime-spec';
import type { ContainerInspect, ContainerRuntime, ImageInspect } from './types';
import { ContainerNotFound, ImageNotFound } from './types';

interface StatusError extends Error {
	statusCode: number;
}

function isStatusError(x: unknown): x is StatusError {
	return (
		x instanceof Error && 'statusCode' in x && typeof x.statusCode === 'number'
	);
}

function isNotFound(e: unknown) {
	return isStatusError(e) && e.statusCode === 404;
}

/**
 * Convert a runtime spec into the body of a container create request
 */
export function toCreateOptions(
	spec: RuntimeSpec,
): Docker.ContainerCreateOptions {
	const exposedPorts: { [port: string]: object } = {};
	const portBindings: {
		[port: string]: Array<{ HostIp?: string; HostPort?: string }>;
	} = {};
	for (const { containerPort, hostIp, hostPort } of spec.ports) {
		exposedPorts[containerPort] = {};
		const bindings = portBindings[containerPort] ?? [];
		bindings.push({
			...(hostIp != null && { HostIp: hostIp }),
			...(hostPort != null && { HostPort: hostPort }),
		});
		portBindings[containerPort] = bindings;
	}

	const binds: string[] = [];
	const tmpfs: { [dir: string]: string } = {};
	for (const m of spec.mounts) {
		if (m.kind === 'tmpfs') {
			tmpfs[m.destination] = m.readOnly ? 'ro' : '';
			continue;
		}
		binds.push(`${m.source}:${m.destination}${m.readOnly ? ':ro' : ''}`);
	}

	return {
		name: spec.name,
		Image: spec.image,
		Env: spec.env,
		...(spec.hostname != null && { Hostname: spec.hostname }),
		...(spec.entrypoint != null && { Entrypoint: spec.entrypoint }),
		ExposedPorts: exposedPorts,
		HostConfig: {
			PortBindings: portBindings,
			Binds: binds,
			...(Object.keys(tmpfs).length > 0 && { Tmpfs: tmpfs }),
			...(spec.restartPolicy != null && {
				RestartPolicy: {
					Name: spec.restartPolicy.name,
					MaximumRetryCount: spec.restartPolicy.maximumRetryCount,
				},
			}),
			...(spec.networkMode != null && { NetworkMode: spec.networkMode }),
		},
	};
}

/**
 * Container runtime backed by the Docker Engine API
 */
export class DockerRuntime implements ContainerRuntime {
	constructor(private readonly docker: Docker = new Docker()) {}

	async inspectContainer(name: string): Promise<ContainerInspect> {
		return await this.docker
			.getContainer(name)
			.inspect()
			.catch((e) => {
				if (isNotFound(e)) {
					throw new ContainerNotFound(name, e);
				}
				throw e;
			});
	}

	async inspectImage(reference: string): Promise<ImageInspect> {
		return await this.docker
			.getImage(reference)
			.inspect()
			.catch((e) => {
				if (isNotFound(e)) {
					throw new ImageNotFound(reference, e);
				}
				throw e;
			});
	}

	async pull(reference: string): Promise<void> {
		const stream = await this.docker.pull(reference);
		await new Promise<void>((resolve, reject) => {
			// Errors reported by the registry come as part of the
			// progress output, followProgress reports them on finish
			this.docker.modem.followProgress(stream, (err: unknown) => {
				if (err != null) {
					reject(err instanceof Error ? err : new Error(String(err)));
					return;
				}
				resolve();
			});
		});
	}

	async stop(name: string): Promise<void> {
		await this.docker
			.getContainer(name)
			.stop()
			.catch((e) => {
				// 304 means the container is already stopped
				if (isStatusError(e) && e.statusCode === 304) {
					return;
				}
				if (isNotFound(e)) {
					throw new ContainerNotFound(name, e);
				}
				throw e;
			});
	}

	async remove(name: string): Promise<void> {
		await this.docker
			.getContainer(name)
			.remove()
			.catch((e) => {
				if (isNotFound(e)) {
					throw new ContainerNotFound(name, e);
				}
				throw e;
			});
	}

	async run(spec: RuntimeSpec): Promise<string> {
		const container = await this.docker.createContainer(toCreateOptions(spec));
		await container.start();
		return container.id;
	}

	async findContainers(labels: { [label: string]: string }): Promise<string[]> {
		const containers = await this.docker.listContainers({
			all: true,
			filters: {
				label: Object.entries(labels).map(([k, v]) => `${k}=${v}`),
			},
		});

		return containers
			.map(({ Names }) => Names[0])
			.filter((n): n is string => n != null)
			.map((n) => n.replace(/^\//, ''));
	}

	async pruneImages(): Promise<void> {
		await this.docker.pruneImages({ filters: { dangling: { false: true } } });
	}
}
