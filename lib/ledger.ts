import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';

import { Identity } from './image';
import type { Logger } from './logger';
import { NullLogger } from './logger';

export const ACTIONS = [
	'update',
	'skip-pinned',
	'skip-mismatch',
	'pull-fail',
	'recreate-fail',
	'rollback-success',
	'rollback-fail',
	'not-found',
] as const;

export type ActionKind = (typeof ACTIONS)[number];

/**
 * Actions that make a run unsuccessful
 */
export const FAILURES: readonly ActionKind[] = [
	'pull-fail',
	'recreate-fail',
	'rollback-fail',
	'not-found',
];

function isActionKind(x: string): x is ActionKind {
	return ACTIONS.some((a) => a === x);
}

export interface LogRecord {
	/**
	 * ISO 8601 time of the append
	 */
	readonly timestamp: string;

	/**
	 * Name the record is filed under, the container name
	 * or, for compose managed targets, the service name
	 */
	readonly name: string;
	readonly reference?: string;
	readonly identity?: Identity;
	readonly action: ActionKind;
}

const SEPARATOR = '\t';
const PLACEHOLDER = '-';

function escape(field: string) {
	return field.replace(/[\\\t\r\n]/g, (c) => {
		switch (c) {
			case '\t':
				return '\\t';
			case '\r':
				return '\\r';
			case '\n':
				return '\\n';
			default:
				return '\\\\';
		}
	});
}

function unescape(field: string) {
	return field.replace(/\\([\\trn])/g, (_, c: string) => {
		switch (c) {
			case 't':
				return '\t';
			case 'r':
				return '\r';
			case 'n':
				return '\n';
			default:
				return '\\';
		}
	});
}

export class MalformedRecord extends Error {
	constructor(line: string) {
		super(`Malformed ledger line: ${JSON.stringify(line)}`);
	}
}

function serialize(r: LogRecord): string {
	return [
		r.timestamp,
		r.name,
		r.reference ?? PLACEHOLDER,
		r.identity ?? PLACEHOLDER,
		r.action,
	]
		.map((f) => (f === '' ? PLACEHOLDER : escape(f)))
		.join(SEPARATOR);
}

function parse(line: string): LogRecord {
	const fields = line.split(SEPARATOR).map(unescape);
	if (fields.length !== 5) {
		throw new MalformedRecord(line);
	}

	const [timestamp, name, reference, identity, action] = fields;
	if (
		timestamp == null ||
		name == null ||
		reference == null ||
		identity == null ||
		action == null ||
		!isActionKind(action) ||
		name === PLACEHOLDER
	) {
		throw new MalformedRecord(line);
	}

	return {
		timestamp,
		name,
		...(reference !== PLACEHOLDER && { reference }),
		// Anything that is not a digest is a placeholder
		...(Identity.is(identity) && { identity }),
		action,
	};
}

export const LogRecord = {
	serialize,
	parse,
};

export interface LedgerQuery {
	/**
	 * Names to match, any of them
	 */
	names: string[];

	/**
	 * Actions to match, defaults to all
	 */
	actions?: readonly ActionKind[];

	/**
	 * Maximum number of records to return
	 */
	limit?: number;
}

/**
 * Append only history of reconciliation outcomes.
 *
 * Records are never rewritten or removed and are kept in
 * append order. There is no locking, a single writer is assumed.
 */
export interface Ledger {
	append(record: LogRecord): Promise<void>;

	/**
	 * Return the most recent matches, most recent first
	 */
	query(q: LedgerQuery): Promise<LogRecord[]>;
}

function isNotFound(e: unknown) {
	return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function from(
	path: string,
	{ logger = NullLogger }: { logger?: Logger } = {},
): Ledger {
	const readAll = async () => {
		const contents = await readFile(path, 'utf8').catch((e) => {
			if (isNotFound(e)) {
				return '';
			}
			throw e;
		});

		const records: LogRecord[] = [];
		for (const line of contents.split('\n')) {
			if (line.trim().length === 0) {
				continue;
			}
			try {
				records.push(parse(line));
			} catch (e) {
				if (!(e instanceof MalformedRecord)) {
					throw e;
				}
				logger.warn(`${path}: skipping line, ${e.message}`);
			}
		}
		return records;
	};

	return {
		async append(record) {
			await mkdir(dirname(path), { recursive: true });
			await appendFile(path, serialize(record) + '\n', {
				encoding: 'utf8',
				flag: 'a',
			});
		},
		async query({ names, actions = ACTIONS, limit = Infinity }) {
			const records = await readAll();
			return records
				.filter((r) => names.includes(r.name) && actions.includes(r.action))
				.reverse()
				.slice(0, limit);
		},
	};
}

export const Ledger = {
	from,
};
