export { watchRollout, isRolledOut, statusChanged } from './tool';
export { watchRolloutSchema, type WatchRolloutOptions } from './schema';
