#!/usr/bin/env node

import { Command } from 'commander';
import { createInterface } from 'readline/promises';

import { ArgumentError, Config } from './config';
import { createLogger } from './console';
import type { Report } from './reconciler';
import { Reconciler } from './reconciler';
import type { Prompt } from './rollback';

const logger = createLogger();

type CliOptions = {
	file?: string;
	service?: string;
	tag?: string;
	containers?: string[];
	rollback?: string;
	prune: boolean;
	logFile?: string;
	allowDrift?: boolean;
};

const terminal: Prompt = {
	async ask(question, choices) {
		process.stdout.write(`${question}\n`);
		choices.forEach((c, i) => process.stdout.write(`  ${i + 1}) ${c}\n`));

		const rl = createInterface({ input: process.stdin, output: process.stdout });
		try {
			return await rl.question(`Choice [1-${choices.length}]: `);
		} finally {
			rl.close();
		}
	},
};

export function duration(ms: number): string {
	const total = Math.floor(ms / 1000);
	return [Math.floor(total / 3600), Math.floor(total / 60) % 60, total % 60]
		.map((n) => String(n).padStart(2, '0'))
		.join(':');
}

function run(reconciler: Reconciler, options: CliOptions): Promise<Report> {
	const modes = [options.file, options.containers, options.rollback].filter(
		(m) => m != null,
	);
	if (modes.length !== 1) {
		throw new ArgumentError(
			'exactly one of --file, --containers or --rollback must be given',
		);
	}

	if (options.file != null) {
		return reconciler.updateFile(options.file, {
			service: options.service,
			tag: options.tag,
		});
	}

	if (options.service != null) {
		throw new ArgumentError('--service can only be used with --file');
	}

	if (options.containers != null) {
		return reconciler.updateContainers(options.containers, {
			tag: options.tag,
		});
	}

	if (options.tag != null) {
		throw new ArgumentError('--tag cannot be used with --rollback');
	}
	return reconciler.rollback(options.rollback ?? '');
}

async function main(argv: string[]): Promise<number> {
	const program = new Command()
		.name('container-update')
		.description(
			'Update containers and compose services to the latest version of their images, or roll them back',
		)
		.option('-f, --file <file>', 'compose file to update')
		.option('-s, --service <service>', 'only update this service of the file')
		.option('-t, --tag <tag>', 'update to this tag instead of the declared one')
		.option('-c, --containers <names...>', 'containers to update')
		.option('-r, --rollback <name>', 'roll back a container or service')
		.option('--no-prune', 'keep unused images after updating')
		.option('--log-file <path>', 'ledger file')
		.option('--allow-drift', 'update services that run something other than declared')
		.parse(argv);

	const options = program.opts<CliOptions>();
	const start = Date.now();

	try {
		const config = Config.from(Config.fromEnv(), {
			logFile: options.logFile,
			prune: options.prune,
			...(options.allowDrift === true && { driftProtection: false }),
		});
		const reconciler = Reconciler.from({ config, logger, prompt: terminal });
		const report = await run(reconciler, options);

		for (const r of report.results) {
			if ('record' in r) {
				logger.info(`${r.target}: ${r.record.action}`);
			} else {
				logger.error(`${r.target}: ${r.error.message}`);
			}
		}
		logger.info(
			`finished in ${duration(Date.now() - start)}${report.success ? '' : ', with failures'}`,
		);
		return report.success ? 0 : 1;
	} catch (e) {
		logger.error(e instanceof Error ? e.message : String(e));
		return 1;
	}
}

if (require.main === module) {
	main(process.argv)
		.then((code) => {
			process.exitCode = code;
		})
		.catch((e: unknown) => {
			logger.error(e);
			process.exitCode = 1;
		});
}
