/**
 * Verify Deployment Tool
 * Polls the workload's health endpoint
 */

export { verifyHealth, parseBody, type VerifyDeploymentDeps } from './tool';
export { verifyDeploymentSchema, type VerifyDeploymentOptions } from './schema';
