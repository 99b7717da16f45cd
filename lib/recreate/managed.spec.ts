import { stub } from 'sinon';

import type { TestEnv } from '~/test-utils';
import { NOW, digest, expect, imageId, testEnv } from '~/test-utils';

import type { ManagedContext } from '../context';
import type { Override } from './index';
import { MissingServiceImage, Protocol } from './index';

const FILE = '/srv/app/compose.yaml';

describe('Protocol: compose services', () => {
	let env: TestEnv;
	const context: ManagedContext = {
		configFile: FILE,
		workingDir: '/srv/app',
		service: 'web',
	};

	beforeEach(async () => {
		env = await testEnv();
		env.compose.declare(FILE, { web: 'nginx:1.25', builder: undefined });
		env.runtime.addImage('nginx:1.25', 'v1');
	});

	afterEach(() => env.cleanup());

	const update = async (override?: Override, opts = env.opts) => {
		const images = await env.compose.images(FILE);
		const plan = await Protocol.planService(context, images, opts);
		return Protocol.execute(plan, override, opts);
	};

	it('resolves the declared identity when planning', async () => {
		const plan = await Protocol.planService(
			context,
			await env.compose.images(FILE),
			env.opts,
		);
		expect(plan).to.deep.equal({
			kind: 'managed',
			name: 'web',
			context,
			image: 'nginx:1.25',
			declared: digest('v1'),
		});
	});

	it('rejects services without an image', async () => {
		await expect(
			Protocol.planService(
				{ ...context, service: 'builder' },
				await env.compose.images(FILE),
				env.opts,
			),
		).to.be.rejectedWith(MissingServiceImage);
	});

	it('re-creates the service when the declared tag moves', async () => {
		env.compose.deploy(FILE, 'web');
		env.runtime.publish('nginx:1.25', 'v2');

		expect(await update()).to.deep.equal({
			timestamp: NOW,
			name: 'web',
			reference: 'nginx:1.25',
			identity: digest('v2'),
			action: 'update',
		});
		expect(env.compose.calls).to.deep.equal([
			'pull web nginx:1.25',
			'up web nginx:1.25',
		]);
		expect(env.runtime.containers.get('app-web-1')?.Image).to.equal(
			imageId('v2'),
		);
	});

	it('does nothing if the service already runs the declared image', async () => {
		env.compose.deploy(FILE, 'web');
		env.runtime.publish('nginx:1.25', 'v1');

		expect(await update()).to.deep.equal({
			timestamp: NOW,
			name: 'web',
			reference: 'nginx:1.25',
			identity: digest('v1'),
			action: 'skip-pinned',
		});
		expect(env.compose.calls).to.deep.equal(['pull web nginx:1.25']);
	});

	it('starts services that have no container yet', async () => {
		env.runtime.publish('nginx:1.25', 'v1');

		const record = await update();
		expect(record.action).to.equal('update');
		expect(record.identity).to.equal(digest('v1'));
		expect(env.runtime.containers.has('app-web-1')).to.be.true;
	});

	describe('drift', () => {
		beforeEach(() => {
			// The service runs something other than what the file declares
			env.runtime.addImage('nginx:1.24', 'old');
			env.compose.deploy(FILE, 'web', 'nginx:1.24');
			env.runtime.publish('nginx:1.25', 'v1');
			env.runtime.publish('nginx:1.27', 'v3');
		});

		it('skips drifted services', async () => {
			const trace = stub();
			expect(await update(undefined, { ...env.opts, trace })).to.deep.equal({
				timestamp: NOW,
				name: 'web',
				reference: 'nginx:1.24',
				identity: digest('old'),
				action: 'skip-mismatch',
			});
			expect(env.compose.calls).to.deep.equal(['pull web nginx:1.25']);
			expect(trace).to.have.been.calledWith({
				event: 'drift',
				target: 'web',
				declared: digest('v1'),
				current: digest('old'),
				protected: true,
			});
		});

		it('updates drifted services if protection is disabled', async () => {
			const record = await update(undefined, {
				...env.opts,
				driftProtection: false,
			});
			expect(record.action).to.equal('update');
			expect(record.identity).to.equal(digest('v1'));
		});

		it('updates drifted services to an explicitly requested version', async () => {
			expect(await update({ tag: '1.27' })).to.deep.equal({
				timestamp: NOW,
				name: 'web',
				reference: 'nginx:1.27',
				identity: digest('v3'),
				action: 'update',
			});
			expect(env.compose.calls).to.deep.equal([
				'pull web nginx:1.27',
				'up web nginx:1.27',
			]);
		});
	});

	it('records what was running if the re-create fails', async () => {
		env.compose.deploy(FILE, 'web');
		env.runtime.publish('nginx:1.25', 'v2');
		env.compose.upFailure = new Error('port is already allocated');

		expect(await update()).to.deep.equal({
			timestamp: NOW,
			name: 'web',
			reference: 'nginx:1.25',
			identity: digest('v1'),
			action: 'recreate-fail',
		});
	});

	it('fails if the service is not running after the re-create', async () => {
		env.compose.deploy(FILE, 'web');
		env.runtime.publish('nginx:1.25', 'v2');
		const up = env.compose.up.bind(env.compose);
		stub(env.compose, 'up').callsFake(async (file, service, overrides) => {
			await up(file, service, overrides);
			const live = env.runtime.containers.get('app-web-1');
			if (live != null) {
				live.State.Running = false;
			}
		});

		const record = await update();
		expect(record.action).to.equal('recreate-fail');
		expect(record.identity).to.equal(digest('v1'));
	});

	it('plans services from the name of their container', async () => {
		env.compose.deploy(FILE, 'web');

		const plan = await Protocol.planContainer('app-web-1', env.opts);
		expect(plan).to.deep.include({ kind: 'managed', name: 'web' });
	});
});
