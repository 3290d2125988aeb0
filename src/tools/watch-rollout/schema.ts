import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';

export const watchRolloutSchema = z.object({
  timeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIMEOUTS.rollout)
    .describe('Wait window for the rollout'),
  pollIntervalMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIMEOUTS.rolloutPoll)
    .describe('Delay between deployment status reads'),
});

export type WatchRolloutOptions = z.input<typeof watchRolloutSchema>;
