import type { DecisionOutcome } from './decision';
import type { Identity } from './image';
import type { LogRecord } from './ledger';
import type { ProtocolState } from './recreate/types';

/**
 * Events reported while a target is reconciled. Every event carries
 * the name of the target it refers to.
 */
export type ReconcileEvent =
	| { event: 'start'; target: string; kind: 'standalone' | 'managed' }
	| { event: 'not-found'; target: string }
	| {
			event: 'field-dropped';
			target: string;
			field: string;
			reason: string;
	  }
	| {
			event: 'inspected';
			target: string;
			reference: string;
			current?: Identity;
	  }
	| {
			event: 'drift';
			target: string;
			declared: Identity;
			current: Identity;
			// Drift will cause the target to be skipped
			protected: boolean;
	  }
	| { event: 'pull-start'; target: string; reference: string }
	| {
			event: 'pull-failed';
			target: string;
			reference: string;
			cause: unknown;
	  }
	| { event: 'pulled'; target: string; reference: string; identity: Identity }
	| { event: 'compared'; target: string; outcome: DecisionOutcome }
	| { event: 'stopped'; target: string }
	| { event: 'removed'; target: string }
	| { event: 'started'; target: string; reference: string }
	| { event: 'verified'; target: string; identity: Identity }
	| {
			event: 'failed';
			target: string;
			state: ProtocolState;
			cause: unknown;
			// What the target was running before the failure
			reference?: string;
			identity?: Identity;
	  }
	| { event: 'recorded'; record: LogRecord }
	| { event: 'prune-failed'; cause: unknown };

export type Trace = (e: ReconcileEvent) => void;

export const NullTrace: Trace = () => {
	/* noop */
};
