/**
 * Prepare Cluster Tool
 * Creates or reuses the local cluster
 */

export { ensureCluster, type PrepareClusterDeps, type PrepareClusterResult } from './tool';
export { prepareClusterSchema, type PrepareClusterParams } from './schema';
