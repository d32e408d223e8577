// Library entry point for ffxiv-reshade-setup
export * from './installers';
export * from './lib/config-document';
export * from './lib/config-patcher';
export * from './lib/environment-resolver';
export * from './lib/fetcher';
export * from './lib/command-runner';
export { getSetupPaths } from './config';
export type { SetupPaths } from './config';
export * from './shared-constants';
export type * from './types';
