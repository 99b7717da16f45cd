import Docker from 'dockerode';
import { stub } from 'sinon';

import { expect } from '~/test-utils';

import type { RuntimeSpec } from '../runtime-spec';
import { DockerRuntime, toCreateOptions } from './docker';
import { ContainerNotFound, ImageNotFound } from './types';

function statusError(statusCode: number, message: string) {
	return Object.assign(new Error(message), { statusCode });
}

const spec: RuntimeSpec = {
	name: 'web',
	image: 'nginx:1.27',
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
};

describe('DockerRuntime', () => {
	it('converts a runtime spec into a create request', () => {
		expect(toCreateOptions(spec)).to.deep.equal({
			name: 'web',
			Image: 'nginx:1.27',
			Env: ['API_URL=http://api', 'MODE=prod'],
			ExposedPorts: { '80/tcp': {}, '443/tcp': {} },
			HostConfig: {
				PortBindings: {
					'80/tcp': [{ HostPort: '8080' }],
					'443/tcp': [{ HostIp: '127.0.0.1', HostPort: '8443' }],
				},
				Binds: ['/srv/config:/etc/nginx/conf.d:ro', 'web-data:/data'],
				Tmpfs: { '/run': '' },
				RestartPolicy: { Name: 'on-failure', MaximumRetryCount: 3 },
				NetworkMode: 'backend',
			},
		});
	});

	it('passes hostname and entrypoint only when set', () => {
		const options = toCreateOptions({
			...spec,
			hostname: 'frontend',
			entrypoint: ['/bin/sh', '-c'],
		});
		expect(options.Hostname).to.equal('frontend');
		expect(options.Entrypoint).to.deep.equal(['/bin/sh', '-c']);
		expect(toCreateOptions(spec)).to.not.have.property('Hostname');
	});

	it('reports missing containers and images', async () => {
		const docker = new Docker();
		const container = docker.getContainer('web');
		stub(container, 'inspect').rejects(statusError(404, 'no such container'));
		stub(docker, 'getContainer').returns(container);

		const image = docker.getImage('nginx:1.27');
		stub(image, 'inspect').rejects(statusError(404, 'no such image'));
		stub(docker, 'getImage').returns(image);

		const runtime = new DockerRuntime(docker);
		await expect(runtime.inspectContainer('web')).to.be.rejectedWith(
			ContainerNotFound,
		);
		await expect(runtime.inspectImage('nginx:1.27')).to.be.rejectedWith(
			ImageNotFound,
		);
	});

	it('does not hide other engine errors', async () => {
		const docker = new Docker();
		const image = docker.getImage('nginx:1.27');
		stub(image, 'inspect').rejects(statusError(500, 'engine failure'));
		stub(docker, 'getImage').returns(image);

		await expect(
			new DockerRuntime(docker).inspectImage('nginx:1.27'),
		).to.be.rejectedWith('engine failure');
	});

	it('ignores stopping a stopped container', async () => {
		const docker = new Docker();
		const container = docker.getContainer('web');
		stub(container, 'stop').rejects(statusError(304, 'not modified'));
		stub(docker, 'getContainer').returns(container);

		await expect(new DockerRuntime(docker).stop('web')).to.be.fulfilled;
	});

	it('creates and starts containers', async () => {
		const docker = new Docker();
		const container = docker.getContainer('5e1f00d');
		const start = stub(container, 'start').resolves();
		const create = stub(docker, 'createContainer').resolves(container);

		expect(await new DockerRuntime(docker).run(spec)).to.equal('5e1f00d');
		expect(create).to.have.been.calledOnceWith(toCreateOptions(spec));
		expect(start).to.have.been.calledOnce;
	});

	it('prunes images not used by any container', async () => {
		const docker = new Docker();
		const prune = stub(docker, 'pruneImages').resolves({
			ImagesDeleted: [],
			SpaceReclaimed: 0,
		});

		await new DockerRuntime(docker).pruneImages();
		expect(prune).to.have.been.calledOnceWith({
			filters: { dangling: { false: true } },
		});
	});
});
