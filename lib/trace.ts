import type { Trace } from './events';
import type { Logger } from './logger';
import { NullLogger } from './logger';

function reason(cause: unknown) {
	return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Create a human readable tracer of events during reconciliation
 */
export function readableTrace(logger: Partial<Logger>): Trace {
	const log = {
		...NullLogger,
		...logger,
	};

	return function (e) {
		switch (e.event) {
			case 'start':
				log.info(`${e.target}: reconciling ${e.kind} target`);
				return;

			case 'not-found':
				log.error(`${e.target}: not found`);
				return;

			case 'field-dropped':
				log.warn(`${e.target}: ignoring ${e.field} setting, ${e.reason}`);
				return;

			case 'inspected':
				log.debug(
					`${e.target}: target image '${e.reference}', running ${e.current ?? 'nothing'}`,
				);
				return;

			case 'drift':
				log.warn(
					`${e.target}: running ${e.current} but the compose file declares ${e.declared}` +
						(e.protected
							? ', it will not be updated unless a version is given'
							: ''),
				);
				return;

			case 'pull-start':
				log.info(`${e.target}: pulling '${e.reference}' ...`);
				return;

			case 'pull-failed':
				log.error(`${e.target}: failed to pull '${e.reference}':`, reason(e.cause));
				return;

			case 'pulled':
				log.debug(`${e.target}: '${e.reference}' is ${e.identity}`);
				return;

			case 'compared':
				switch (e.outcome) {
					case 'skip-pinned':
						log.info(`${e.target}: already up to date, skipping`);
						break;
					case 'skip-mismatch':
						log.warn(`${e.target}: skipping, running image differs from declaration`);
						break;
					case 'pull-fail':
						log.error(`${e.target}: target image could not be resolved`);
						break;
					case 'update':
						log.info(`${e.target}: updating`);
						break;
				}
				return;

			case 'stopped':
				log.info(`${e.target}: stopped`);
				return;

			case 'removed':
				log.info(`${e.target}: removed`);
				return;

			case 'started':
				log.info(`${e.target}: started with '${e.reference}'`);
				return;

			case 'verified':
				log.info(`${e.target}: running ${e.identity}`);
				return;

			case 'failed':
				log.error(`${e.target}: re-create failed after ${e.state}:`, reason(e.cause));
				if (e.state === 'removed' || e.state === 'started') {
					log.error(
						`${e.target}: is no longer running, it was previously running '${e.reference ?? 'unknown'}' (${e.identity ?? 'unknown'})`,
					);
				}
				return;

			case 'recorded':
				log.debug(`${e.record.name}: recorded ${e.record.action}`);
				return;

			case 'prune-failed':
				log.warn('failed to prune unused images:', reason(e.cause));
				return;
		}
	};
}
