import type { ComposeTool } from '../compose';
import type { ManagedContext } from '../context';
import type { Trace } from '../events';
import type { Identity } from '../image';
import type { IdentityResolver } from '../identity';
import type { Ledger } from '../ledger';
import type { ContainerInspect, ContainerRuntime } from '../runtime';
import type { RuntimeSpec } from '../runtime-spec';

export type ProtocolState =
	| 'inspected'
	| 'pulled'
	| 'compared'
	| 'skipped'
	| 'stopped'
	| 'removed'
	| 'started'
	| 'verified'
	| 'failed';

/**
 * An explicit version request, either a tag applied to the target
 * repository, or a full reference
 */
export type Override = { tag: string } | { reference: string };

/**
 * Everything known about a target before anything is pulled
 */
export type Plan =
	| {
			readonly kind: 'not-found';
			readonly name: string;
	  }
	| {
			readonly kind: 'standalone';
			readonly name: string;
			readonly info: ContainerInspect;
			readonly spec: RuntimeSpec;
	  }
	| {
			readonly kind: 'managed';
			/**
			 * The service name, used as the logical name
			 */
			readonly name: string;
			readonly context: ManagedContext;

			/**
			 * Image reference declared for the service
			 */
			readonly image: string;

			/**
			 * Identity the declared reference resolved to before
			 * anything was pulled in this run
			 */
			readonly declared?: Identity;
	  };

export interface ProtocolOpts {
	readonly runtime: ContainerRuntime;
	readonly compose: ComposeTool;
	readonly resolver: IdentityResolver;
	readonly ledger: Ledger;
	readonly trace: Trace;

	/**
	 * Tag used for standalone containers when no override is given
	 */
	readonly defaultTag: string;

	/**
	 * Skip managed targets running something other than what
	 * their compose file declares
	 */
	readonly driftProtection: boolean;

	readonly clock: () => Date;
}
