import { z } from 'zod';
import { DEFAULT_CLUSTER, DEFAULT_TIMEOUTS } from '../../config/defaults';

export const prepareClusterSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(63, 'Cluster name must be 63 characters or less')
    .regex(
      /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/,
      'Cluster name must contain only lowercase letters, numbers, and hyphens',
    )
    .describe('Cluster name (DNS-1123 label)'),
  reachabilityAttempts: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_CLUSTER.reachabilityAttempts)
    .describe('API server pings before giving up'),
  reachabilityIntervalMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TIMEOUTS.clusterReachabilityPoll)
    .describe('Delay between API server pings'),
});

export type PrepareClusterParams = z.input<typeof prepareClusterSchema>;
