export { ensureRegistryReachable } from './tool';
export { connectRegistrySchema, type ConnectRegistryParams } from './schema';
