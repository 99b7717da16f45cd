import type { Trace } from './events';
import { NullTrace } from './events';
import type {
	ContainerInspect,
	ContainerRuntime,
	ImageInspect,
} from './runtime';
import { ImageNotFound } from './runtime';

export interface PortBinding {
	/**
	 * Container port with protocol, e.g. `80/tcp`
	 */
	readonly containerPort: string;
	readonly hostIp?: string;
	readonly hostPort?: string;
}

export type MountKind = 'bind' | 'volume' | 'tmpfs';

export interface Mount {
	readonly kind: MountKind;
	/**
	 * Host path for binds, volume name for volumes, empty for tmpfs
	 */
	readonly source: string;
	readonly destination: string;
	readonly readOnly: boolean;
}

export interface RestartPolicy {
	readonly name: string;
	readonly maximumRetryCount: number;
}

/**
 * The launch configuration of a container, captured before
 * the container is removed so it can be re-created with a
 * different image
 */
export interface RuntimeSpec {
	readonly name: string;
	readonly image: string;
	readonly env: string[];
	readonly ports: PortBinding[];
	readonly mounts: Mount[];
	readonly restartPolicy?: RestartPolicy;
	readonly networkMode?: string;
	readonly hostname?: string;
	readonly entrypoint?: string[];
}

// 80, 80/tcp, 8000-8010/udp
const CONTAINER_PORT_REGEX = /^\d+(-\d+)?(\/(tcp|udp|sctp))?$/;

// Host interfaces meaning "all interfaces"
const WILDCARD_IPS = ['', '0.0.0.0', '::'];

// Network modes equivalent to not passing a network at all
const DEFAULT_NETWORKS = ['', 'default', 'bridge'];

const MOUNT_KINDS: MountKind[] = ['bind', 'volume', 'tmpfs'];

type Drop = (field: string, reason: string) => void;

function asList(v: string | string[] | null | undefined): string[] {
	if (v == null) {
		return [];
	}
	return Array.isArray(v) ? v : [v];
}

function env(info: ContainerInspect, image: ImageInspect | undefined, drop: Drop) {
	// Variables set by the image itself should come from the new image
	const defaults = new Set(image?.Config?.Env ?? []);
	return (info.Config.Env ?? []).filter((e) => {
		const [name] = e.split('=', 1);
		if (name == null || name.length === 0) {
			drop('env', `invalid variable '${e}'`);
			return false;
		}
		return !defaults.has(e);
	});
}

function ports(info: ContainerInspect, drop: Drop): PortBinding[] {
	const bindings: PortBinding[] = [];
	const seen = new Set<string>();
	for (const [containerPort, hostBindings] of Object.entries(
		info.HostConfig.PortBindings ?? {},
	)) {
		if (!CONTAINER_PORT_REGEX.test(containerPort)) {
			drop('ports', `invalid container port '${containerPort}'`);
			continue;
		}

		for (const { HostIp: ip = '', HostPort: port = '' } of hostBindings ?? []) {
			const hostIp = WILDCARD_IPS.includes(ip) ? undefined : ip;
			const hostPort = port === '' ? undefined : port;

			// Dual stack hosts report the same binding for IPv4 and IPv6
			const key = [containerPort, hostIp, hostPort].join('|');
			if (seen.has(key)) {
				continue;
			}
			seen.add(key);

			bindings.push({
				containerPort,
				...(hostIp != null && { hostIp }),
				...(hostPort != null && { hostPort }),
			});
		}
	}
	return bindings;
}

function isMountKind(x: string): x is MountKind {
	return MOUNT_KINDS.some((k) => k === x);
}

function mounts(info: ContainerInspect, drop: Drop): Mount[] {
	const result: Mount[] = [];
	for (const m of info.Mounts ?? []) {
		if (!m.Destination) {
			drop('mounts', `mount of '${m.Source}' has no destination`);
			continue;
		}

		// Older engines do not report the type
		const kind = m.Type ?? (m.Name ? 'volume' : 'bind');
		if (!isMountKind(kind)) {
			drop('mounts', `unsupported mount type '${kind}' on '${m.Destination}'`);
			continue;
		}

		const source = kind === 'volume' ? m.Name : kind === 'bind' ? m.Source : '';
		if (source == null || (kind !== 'tmpfs' && source.length === 0)) {
			drop('mounts', `${kind} mount on '${m.Destination}' has no source`);
			continue;
		}

		result.push({
			kind,
			source,
			destination: m.Destination,
			readOnly: !m.RW,
		});
	}

	for (const [destination, opts] of Object.entries(
		info.HostConfig.Tmpfs ?? {},
	)) {
		if (result.some((m) => m.destination === destination)) {
			continue;
		}
		result.push({
			kind: 'tmpfs',
			source: '',
			destination,
			readOnly: opts.split(',').includes('ro'),
		});
	}

	return result;
}

function restartPolicy(info: ContainerInspect): RestartPolicy | undefined {
	const policy = info.HostConfig.RestartPolicy;
	const name = policy?.Name ?? '';
	const retries = policy?.MaximumRetryCount ?? 0;
	if (name === '' || name === 'no') {
		return undefined;
	}
	return {
		name,
		// The engine only accepts a retry count for on-failure
		maximumRetryCount: name === 'on-failure' ? retries : 0,
	};
}

function networkMode(info: ContainerInspect): string | undefined {
	const mode = info.HostConfig.NetworkMode ?? '';
	return DEFAULT_NETWORKS.includes(mode) ? undefined : mode;
}

function hostname(
	info: ContainerInspect,
	network: string | undefined,
): string | undefined {
	const name = info.Config.Hostname ?? '';

	// The hostname cannot be set when sharing the network namespace
	if (network === 'host' || network?.startsWith('container:')) {
		return undefined;
	}

	// The default hostname is the short container id
	if (name === '' || name === info.Id.slice(0, 12)) {
		return undefined;
	}
	return name;
}

function entrypoint(
	info: ContainerInspect,
	image: ImageInspect | undefined,
): string[] | undefined {
	const current = asList(info.Config.Entrypoint);
	if (current.length === 0) {
		return undefined;
	}

	// Only keep the entrypoint if it overrides the image default
	const defaults = asList(image?.Config?.Entrypoint);
	if (
		image != null &&
		defaults.length === current.length &&
		defaults.every((v, i) => v === current[i])
	) {
		return undefined;
	}
	return current;
}

/**
 * Build the launch configuration of a container from its
 * introspection data.
 *
 * If the image the container runs is given, environment variables
 * and entrypoint inherited from the image are left out, so they are
 * taken from the new image on re-create.
 *
 * Malformed entries are dropped and reported through the trace,
 * the rest of the spec is still returned.
 */
function fromInspect(
	info: ContainerInspect,
	{ image, trace = NullTrace }: { image?: ImageInspect; trace?: Trace } = {},
): RuntimeSpec {
	const name = info.Name.replace(/^\//, '');
	const drop: Drop = (field, reason) =>
		trace({ event: 'field-dropped', target: name, field, reason });

	const network = networkMode(info);
	const restart = restartPolicy(info);
	const host = hostname(info, network);
	const entry = entrypoint(info, image);

	return {
		name,
		image: info.Config.Image,
		env: env(info, image, drop),
		ports: ports(info, drop),
		mounts: mounts(info, drop),
		...(restart != null && { restartPolicy: restart }),
		...(network != null && { networkMode: network }),
		...(host != null && { hostname: host }),
		...(entry != null && { entrypoint: entry }),
	};
}

/**
 * Build the runtime spec from introspection data, reading the
 * defaults of the image the container runs
 */
async function fromContainer(
	runtime: ContainerRuntime,
	info: ContainerInspect,
	trace: Trace = NullTrace,
): Promise<RuntimeSpec> {
	const image = await runtime.inspectImage(info.Image).catch((e) => {
		// The image may have been removed while the container runs
		if (e instanceof ImageNotFound) {
			return undefined;
		}
		throw e;
	});
	return fromInspect(info, { image, trace });
}

/**
 * Capture the runtime spec of an existing container.
 *
 * Throws `ContainerNotFound` if the container does not exist
 */
async function extract(
	runtime: ContainerRuntime,
	name: string,
	trace: Trace = NullTrace,
): Promise<RuntimeSpec> {
	const info = await runtime.inspectContainer(name);
	return fromContainer(runtime, info, trace);
}

export const RuntimeSpec = {
	extract,
	fromContainer,
	fromInspect,
};
