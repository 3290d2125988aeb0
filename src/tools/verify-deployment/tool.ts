/**
 * Verify Deployment Tool
 *
 * Resolves the host-reachable URL of the workload's NodePort service and polls its
 * health path. The result is advisory: an unreachable endpoint is reported, the
 * deployment stays as it is.
 *
 * @example
 * ```typescript
 * const health = await verifyHealth(target, { path: '/health' }, deps, { logger });
 * logger.info({ reachable: health.reachable, endpoint: health.endpoint }, 'Health verified');
 * ```
 */

import type { Logger } from 'pino';
import { createTimer } from '../../lib/logger';
import { systemClock, type Clock } from '../../lib/clock';
import { errorName, extractErrorMessage } from '../../errors';
import type { DeploymentTarget, HealthResult } from '../../domain/types';
import type { ClusterBackend } from '../../infrastructure/backends';
import type { ClusterApi } from '../../infrastructure/kubernetes-client';
import type { ToolContext } from '../types';
import { verifyDeploymentSchema, type VerifyDeploymentOptions } from './schema';

export interface VerifyDeploymentDeps {
  api: ClusterApi;
  backend: Pick<ClusterBackend, 'resolveBaseUrl'>;
  clusterName: string;
  fetch?: typeof fetch;
}

type Attempt =
  | { ok: true; statusCode: number; body: unknown; latencyMs: number }
  | { ok: false; error: string; statusCode?: number; body?: unknown };

/**
 * JSON when the body parses, the raw text otherwise
 */
export function parseBody(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

async function resolveNodePort(
  api: ClusterApi,
  target: DeploymentTarget,
  fallback: number,
  logger: Logger,
): Promise<number> {
  try {
    const service = await api.getService(target.serviceName, target.namespace);
    const nodePort = service.ports.find((port) => port.nodePort !== undefined)?.nodePort;
    if (nodePort !== undefined) {
      return nodePort;
    }
    logger.warn({ service: target.serviceName, fallback }, 'Service exposes no NodePort');
  } catch (error) {
    logger.warn(
      { service: target.serviceName, fallback, error: extractErrorMessage(error) },
      'Could not read service, using configured NodePort',
    );
  }
  return fallback;
}

async function attemptHealthCheck(
  fetchImpl: typeof fetch,
  endpoint: string,
  requestTimeoutMs: number,
  clock: Clock,
): Promise<Attempt> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), requestTimeoutMs);
  const startedAt = clock.now();

  try {
    const response = await fetchImpl(endpoint, {
      method: 'GET',
      signal: controller.signal,
      headers: { Accept: 'application/json', 'User-Agent': 'cluster-bootstrap-health-check' },
    });
    const body = parseBody(await response.text());

    if (response.ok) {
      return { ok: true, statusCode: response.status, body, latencyMs: clock.now() - startedAt };
    }
    return { ok: false, error: `HTTP ${response.status}`, statusCode: response.status, body };
  } catch (error) {
    if (errorName(error) === 'AbortError') {
      return { ok: false, error: `Request timed out after ${requestTimeoutMs}ms` };
    }
    return { ok: false, error: extractErrorMessage(error) };
  } finally {
    clearTimeout(timeoutId);
  }
}

async function verifyHealthImpl(
  target: DeploymentTarget,
  options: VerifyDeploymentOptions,
  deps: VerifyDeploymentDeps,
  context: ToolContext,
): Promise<HealthResult> {
  const logger = context.logger.child({ component: 'verify-deployment' });
  const clock = context.clock ?? systemClock;
  const fetchImpl = deps.fetch ?? fetch;
  const { path, attempts, backoffMs, initialDelayMs, requestTimeoutMs, fallbackNodePort } =
    verifyDeploymentSchema.parse(options);

  const nodePort = await resolveNodePort(deps.api, target, fallbackNodePort, logger);

  let endpoint: string;
  try {
    endpoint = `${await deps.backend.resolveBaseUrl(deps.clusterName, nodePort)}${path}`;
  } catch (error) {
    const message = `Could not resolve endpoint: ${extractErrorMessage(error)}`;
    logger.warn({ nodePort }, message);
    return { endpoint: '', reachable: false, attempts: 0, error: message };
  }

  const timer = createTimer(logger, 'verify-health', { endpoint, attempts });
  logger.info({ endpoint }, 'Testing endpoint');

  await clock.sleep(initialDelayMs);

  let last: Attempt = { ok: false, error: 'No attempt made' };
  for (let attempt = 1; attempt <= attempts; attempt++) {
    last = await attemptHealthCheck(fetchImpl, endpoint, requestTimeoutMs, clock);

    if (last.ok) {
      timer.end({ attempt, statusCode: last.statusCode });
      return {
        endpoint,
        reachable: true,
        attempts: attempt,
        latencyMs: last.latencyMs,
        statusCode: last.statusCode,
        ...(last.body !== undefined && { body: last.body }),
      };
    }

    logger.debug({ attempt, error: last.error }, 'Health check attempt failed');
    if (attempt < attempts) {
      await clock.sleep(backoffMs * 2 ** (attempt - 1));
    }
  }

  const failure: HealthResult = {
    endpoint,
    reachable: false,
    attempts,
    error: last.ok ? 'unreachable' : last.error,
  };
  if (!last.ok && last.statusCode !== undefined) failure.statusCode = last.statusCode;
  if (!last.ok && last.body !== undefined) failure.body = last.body;

  timer.error(failure.error, { attempts });
  logger.warn({ endpoint }, 'Health check failed. The service might not be ready yet.');
  return failure;
}

export const verifyHealth = verifyHealthImpl;
