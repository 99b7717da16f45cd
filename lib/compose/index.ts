export * from './types';
export { ComposeCli } from './cli';
export type { ComposeCliOpts, Exec } from './cli';
export { withOverlay } from './overlay';
