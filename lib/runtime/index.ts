export * from './types';
export { DockerRuntime, toCreateOptions } from './docker';
