import { z } from 'zod';
import { DEFAULT_CLUSTER, DEFAULT_HEALTH, DEFAULT_TIMEOUTS } from '../../config/defaults';

export const verifyDeploymentSchema = z.object({
  path: z.string().startsWith('/').default(DEFAULT_HEALTH.path).describe('Health endpoint path'),
  attempts: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_HEALTH.attempts)
    .describe('GET attempts before giving up'),
  backoffMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TIMEOUTS.healthBackoff)
    .describe('Delay after the first failed attempt, doubled after each further one'),
  initialDelayMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TIMEOUTS.healthInitialDelay)
    .describe('Settle time before the first attempt'),
  requestTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIMEOUTS.healthRequest)
    .describe('Upper bound for a single GET'),
  fallbackNodePort: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(DEFAULT_CLUSTER.nodePort)
    .describe('NodePort used when the service does not report one'),
});

export type VerifyDeploymentOptions = z.input<typeof verifyDeploymentSchema>;
