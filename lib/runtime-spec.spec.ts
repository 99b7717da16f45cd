import { stub } from 'sinon';

import { FakeRuntime, expect } from '~/test-utils';

import type { ContainerInspect, ImageInspect } from './runtime';
import { RuntimeSpec } from './runtime-spec';

const ID = 'c0ffee' + '0'.repeat(58);

function inspect({
	Config = {},
	HostConfig = {},
	Mounts = [],
}: {
	Config?: Partial<ContainerInspect['Config']>;
	HostConfig?: ContainerInspect['HostConfig'];
	Mounts?: ContainerInspect['Mounts'];
} = {}): ContainerInspect {
	return {
		Id: ID,
		Name: '/web',
		Image: `sha256:${'b'.repeat(64)}`,
		Config: {
			Image: 'nginx:1.25',
			Hostname: ID.slice(0, 12),
			Env: ['PATH=/usr/bin'],
			...Config,
		},
		HostConfig,
		Mounts,
		State: { Running: true },
	};
}

const image: ImageInspect = {
	Id: `sha256:${'b'.repeat(64)}`,
	Config: { Env: ['PATH=/usr/bin'], Entrypoint: ['/docker-entrypoint.sh'] },
};

describe('RuntimeSpec', () => {
	it('captures the launch configuration of a container', () => {
		const info = inspect({
			Config: {
				Image: 'nginx:1.25',
				Hostname: ID.slice(0, 12),
				Env: ['PATH=/usr/bin', 'API_URL=http://api', 'MODE=prod'],
				Entrypoint: ['/docker-entrypoint.sh'],
			},
			HostConfig: {
				PortBindings: {
					'80/tcp': [
						{ HostIp: '0.0.0.0', HostPort: '8080' },
						{ HostIp: '::', HostPort: '8080' },
					],
					'443/tcp': [{ HostIp: '127.0.0.1', HostPort: '8443' }],
				},
				RestartPolicy: { Name: 'on-failure', MaximumRetryCount: 3 },
				NetworkMode: 'backend',
				Tmpfs: { '/run': 'rw,size=64m' },
			},
			Mounts: [
				{
					Type: 'bind',
					Source: '/srv/config',
					Destination: '/etc/nginx/conf.d',
					RW: false,
				},
				{
					Type: 'volume',
					Name: 'web-data',
					Source: '/var/lib/docker/volumes/web-data/_data',
					Destination: '/data',
					RW: true,
				},
			],
		});

		expect(RuntimeSpec.fromInspect(info, { image })).to.deep.equal({
			name: 'web',
			image: 'nginx:1.25',
			env: ['API_URL=http://api', 'MODE=prod'],
			ports: [
				{ containerPort: '80/tcp', hostPort: '8080' },
				{ containerPort: '443/tcp', hostIp: '127.0.0.1', hostPort: '8443' },
			],
			mounts: [
				{
					kind: 'bind',
					source: '/srv/config',
					destination: '/etc/nginx/conf.d',
					readOnly: true,
				},
				{ kind: 'volume', source: 'web-data', destination: '/data', readOnly: false },
				{ kind: 'tmpfs', source: '', destination: '/run', readOnly: false },
			],
			restartPolicy: { name: 'on-failure', maximumRetryCount: 3 },
			networkMode: 'backend',
		});
	});

	it('leaves out engine defaults', () => {
		const spec = RuntimeSpec.fromInspect(
			inspect({
				HostConfig: {
					RestartPolicy: { Name: 'no', MaximumRetryCount: 0 },
					NetworkMode: 'bridge',
				},
			}),
		);
		expect(spec).to.not.have.property('restartPolicy');
		expect(spec).to.not.have.property('networkMode');
		expect(spec).to.not.have.property('hostname');
		expect(spec).to.not.have.property('entrypoint');
	});

	it('only keeps a retry count for on-failure policies', () => {
		const spec = RuntimeSpec.fromInspect(
			inspect({
				HostConfig: { RestartPolicy: { Name: 'always', MaximumRetryCount: 5 } },
			}),
		);
		expect(spec.restartPolicy).to.deep.equal({
			name: 'always',
			maximumRetryCount: 0,
		});
	});

	it('keeps custom hostnames unless the network is shared', () => {
		const custom = { Image: 'nginx:1.25', Hostname: 'frontend' };
		expect(
			RuntimeSpec.fromInspect(inspect({ Config: custom })).hostname,
		).to.equal('frontend');
		expect(
			RuntimeSpec.fromInspect(
				inspect({ Config: custom, HostConfig: { NetworkMode: 'host' } }),
			).hostname,
		).to.be.undefined;
		expect(
			RuntimeSpec.fromInspect(
				inspect({
					Config: custom,
					HostConfig: { NetworkMode: 'container:proxy' },
				}),
			).hostname,
		).to.be.undefined;
	});

	it('keeps entrypoints that override the image', () => {
		const Config = { Image: 'nginx:1.25', Entrypoint: ['/bin/sh', '-c'] };
		expect(
			RuntimeSpec.fromInspect(inspect({ Config }), { image }).entrypoint,
		).to.deep.equal(['/bin/sh', '-c']);
		expect(
			RuntimeSpec.fromInspect(inspect({ Config: { ...Config, Entrypoint: '/start' } }))
				.entrypoint,
		).to.deep.equal(['/start']);
	});

	it('drops malformed entries and reports them', () => {
		const trace = stub();
		const spec = RuntimeSpec.fromInspect(
			inspect({
				Config: { Image: 'nginx:1.25', Env: ['=oops', 'MODE=prod'] },
				HostConfig: {
					PortBindings: { http: [{ HostPort: '80' }], '80/tcp': null },
				},
				Mounts: [
					{ Type: 'npipe', Source: '/pipe', Destination: '/pipe', RW: true },
					{ Type: 'bind', Source: '/srv', Destination: '', RW: true },
					{ Type: 'volume', Source: '', Destination: '/cache', RW: true },
				],
			}),
			{ trace },
		);

		expect(spec.env).to.deep.equal(['MODE=prod']);
		expect(spec.ports).to.deep.equal([]);
		expect(spec.mounts).to.deep.equal([]);
		expect(trace.args.map(([e]) => [e.field, e.reason])).to.deep.equal([
			['env', "invalid variable '=oops'"],
			['ports', "invalid container port 'http'"],
			['mounts', "unsupported mount type 'npipe' on '/pipe'"],
			['mounts', "mount of '/srv' has no destination"],
			['mounts', "volume mount on '/cache' has no source"],
		]);
		expect(trace).to.have.been.calledWithMatch({
			event: 'field-dropped',
			target: 'web',
		});
	});

	it('extracts the spec of a running container', async () => {
		const runtime = new FakeRuntime();
		runtime.addImage('nginx:1.25', 'nginx-1.25');
		runtime.addContainer('web', 'nginx:1.25', { env: ['MODE=prod'] });

		expect(await RuntimeSpec.extract(runtime, 'web')).to.deep.equal({
			name: 'web',
			image: 'nginx:1.25',
			env: ['MODE=prod'],
			ports: [],
			mounts: [],
		});
	});

	it('relaunches containers with an identical configuration', async () => {
		const runtime = new FakeRuntime();
		runtime.addImage('api:1.0', 'api-1.0');
		const launched: RuntimeSpec = {
			name: 'api',
			image: 'api:1.0',
			env: ['DB_HOST=db', 'LOG_LEVEL=info'],
			ports: [{ containerPort: '8080/tcp', hostPort: '8080' }],
			mounts: [
				{
					kind: 'bind',
					source: '/srv/api/config',
					destination: '/config',
					readOnly: true,
				},
			],
			restartPolicy: { name: 'on-failure', maximumRetryCount: 3 },
			networkMode: 'backend',
		};
		await runtime.run(launched);

		const captured = await RuntimeSpec.extract(runtime, 'api');
		expect(captured).to.deep.equal(launched);

		await runtime.stop('api');
		await runtime.remove('api');
		await runtime.run(captured);

		expect(await RuntimeSpec.extract(runtime, 'api')).to.deep.equal(launched);
	});

	it('keeps every variable if the image is gone', async () => {
		const runtime = new FakeRuntime();
		runtime.addImage('nginx:1.25', 'nginx-1.25');
		const info = runtime.addContainer('web', 'nginx:1.25', { env: ['MODE=prod'] });
		runtime.images.splice(0);

		const spec = await RuntimeSpec.fromContainer(runtime, info);
		expect(spec.env).to.deep.equal(['MODE=prod', 'PATH=/usr/bin']);
	});
});
