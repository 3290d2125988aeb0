/**
 * Shared types for the pipeline stages
 */

import type { Logger } from 'pino';
import type { Clock } from '../lib/clock';

/**
 * Passed to every stage. Stages log through `logger` and read time through `clock`.
 */
export interface ToolContext {
  logger: Logger;
  clock?: Clock;
}
