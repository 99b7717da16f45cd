import { strict as assert } from 'assert';

export interface Config {
	/**
	 * Path of the ledger file
	 */
	logFile: string;

	/**
	 * Tag standalone containers are updated to when no tag is given
	 */
	defaultTag: string;

	/**
	 * Skip managed targets that run something other than what their
	 * compose file declares, unless a version is explicitly requested
	 */
	driftProtection: boolean;

	/**
	 * Maximum number of rollback candidates presented
	 */
	rollbackLimit: number;

	/**
	 * Remove unused images after an update run
	 */
	prune: boolean;

	/**
	 * Command used to invoke compose
	 */
	composeCommand: string[];
}

export class ArgumentError extends Error {
	constructor(message: string) {
		super(message);
	}
}

export const DEFAULTS: Readonly<Config> = {
	logFile: '/tmp/docker-update.log',
	defaultTag: 'latest',
	driftProtection: true,
	rollbackLimit: 5,
	prune: true,
	composeCommand: ['docker', 'compose'],
};

/**
 * Read configuration overrides from the environment
 *
 * - CONTAINER_UPDATE_LOG_FILE
 * - CONTAINER_UPDATE_DEFAULT_TAG
 * - CONTAINER_UPDATE_ROLLBACK_LIMIT
 * - CONTAINER_UPDATE_DRIFT (`protect` or `allow`)
 * - DOCKER_COMPOSE_CMD, e.g. `docker-compose`
 */
function fromEnv(env: NodeJS.ProcessEnv = process.env): Partial<Config> {
	const config: Partial<Config> = {};

	if (env.CONTAINER_UPDATE_LOG_FILE) {
		config.logFile = env.CONTAINER_UPDATE_LOG_FILE;
	}

	if (env.CONTAINER_UPDATE_DEFAULT_TAG) {
		config.defaultTag = env.CONTAINER_UPDATE_DEFAULT_TAG;
	}

	if (env.CONTAINER_UPDATE_ROLLBACK_LIMIT) {
		const limit = Number(env.CONTAINER_UPDATE_ROLLBACK_LIMIT);
		if (!Number.isInteger(limit)) {
			throw new ArgumentError(
				`CONTAINER_UPDATE_ROLLBACK_LIMIT must be an integer, got '${env.CONTAINER_UPDATE_ROLLBACK_LIMIT}'`,
			);
		}
		config.rollbackLimit = limit;
	}

	switch (env.CONTAINER_UPDATE_DRIFT) {
		case undefined:
		case '':
			break;
		case 'protect':
			config.driftProtection = true;
			break;
		case 'allow':
			config.driftProtection = false;
			break;
		default:
			throw new ArgumentError(
				`CONTAINER_UPDATE_DRIFT must be 'protect' or 'allow', got '${env.CONTAINER_UPDATE_DRIFT}'`,
			);
	}

	if (env.DOCKER_COMPOSE_CMD) {
		config.composeCommand = env.DOCKER_COMPOSE_CMD.trim().split(/\s+/);
	}

	return config;
}

function pick<K extends keyof Config>(
	layers: Array<Partial<Config>>,
	key: K,
): Config[K] {
	let value = DEFAULTS[key];
	for (const layer of layers) {
		const v = layer[key];
		if (v !== undefined) {
			value = v;
		}
	}
	return value;
}

/**
 * Merge configuration layers on top of the defaults. Later layers
 * take precedence, undefined values are ignored
 */
function from(...layers: Array<Partial<Config>>): Config {
	const config: Config = {
		logFile: pick(layers, 'logFile'),
		defaultTag: pick(layers, 'defaultTag'),
		driftProtection: pick(layers, 'driftProtection'),
		rollbackLimit: pick(layers, 'rollbackLimit'),
		prune: pick(layers, 'prune'),
		composeCommand: pick(layers, 'composeCommand'),
	};

	assert(
		config.logFile.length > 0,
		new ArgumentError('logFile cannot be empty'),
	);
	assert(
		config.defaultTag.length > 0,
		new ArgumentError('defaultTag cannot be empty'),
	);
	assert(
		config.rollbackLimit > 0,
		new ArgumentError('rollbackLimit must be greater than 0'),
	);
	assert(
		config.composeCommand.length > 0,
		new ArgumentError('composeCommand cannot be empty'),
	);

	return config;
}

export const Config = {
	from,
	fromEnv,
};
