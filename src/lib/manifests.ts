/**
 * Manifest loading and preparation.
 *
 * The applier takes a fixed ordered set: Namespace (optional), then Deployment, then
 * Service, each at most once.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ManifestApplyError, errorCode, extractErrorMessage } from '../errors';
import { Failure, Success, type Result } from '../domain/types/result';
import type { DeploymentTarget, K8sManifest } from '../domain/types';
import { MANIFEST_FILES } from '../config/defaults';

const K8sManifestSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: z
      .object({
        name: z.string().min(1),
        namespace: z.string().optional(),
        labels: z.record(z.string()).optional(),
        annotations: z.record(z.string()).optional(),
      })
      .passthrough(),
    spec: z.record(z.unknown()).optional(),
  })
  .passthrough();

const MANIFEST_ORDER: Record<string, number> = {
  Namespace: 0,
  Deployment: 1,
  Service: 2,
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resourceOf(manifest: Pick<K8sManifest, 'kind' | 'metadata'>): string {
  return `${manifest.kind}/${manifest.metadata.name}`;
}

/**
 * Parse a (multi-document) YAML file into validated manifests
 */
export function parseManifestDocuments(content: string, source: string): K8sManifest[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content);
  } catch (error) {
    throw new ManifestApplyError(
      `Invalid YAML in ${source}: ${extractErrorMessage(error)}`,
      source,
    );
  }

  return documents
    .filter((doc) => doc !== null && doc !== undefined)
    .map((doc, index) => {
      const parsed = K8sManifestSchema.safeParse(doc);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        throw new ManifestApplyError(
          `Invalid manifest #${index + 1} in ${source}: ${issues}`,
          source,
        );
      }
      return parsed.data;
    });
}

/**
 * Read namespace.yaml, deployment.yaml and service.yaml from `dir`, in that order.
 * A missing file is skipped; the order check reports what is absent.
 */
export async function loadManifestSet(dir: string): Promise<K8sManifest[]> {
  const manifests: K8sManifest[] = [];
  for (const file of MANIFEST_FILES) {
    const filePath = path.join(dir, file);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        continue;
      }
      throw new ManifestApplyError(
        `Cannot read ${filePath}: ${extractErrorMessage(error)}`,
        filePath,
      );
    }
    manifests.push(...parseManifestDocuments(content, filePath));
  }
  return manifests;
}

/**
 * Check kinds appear as Namespace → Deployment → Service, each at most once,
 * with a Deployment present. Names the first offending resource.
 */
export function validateManifestOrder(
  manifests: readonly K8sManifest[],
): Result<void, ManifestApplyError> {
  let lastRank = -1;
  let hasDeployment = false;

  for (const manifest of manifests) {
    const resource = resourceOf(manifest);
    const rank = MANIFEST_ORDER[manifest.kind];
    if (rank === undefined) {
      return Failure(
        new ManifestApplyError(`Unsupported manifest kind ${manifest.kind}`, resource),
      );
    }
    if (rank <= lastRank) {
      return Failure(
        new ManifestApplyError(
          `${resource} is out of order: expected Namespace, Deployment, Service, each at most once`,
          resource,
        ),
      );
    }
    lastRank = rank;
    hasDeployment = hasDeployment || manifest.kind === 'Deployment';
  }

  if (!hasDeployment) {
    return Failure(new ManifestApplyError('Manifest set has no Deployment', 'Deployment'));
  }
  return Success(undefined);
}

/**
 * Replace the image of the deployment's first container
 */
export function withImage(deployment: K8sManifest, image: string): K8sManifest {
  const copy = structuredClone(deployment);
  const template = copy.spec?.template;
  const podSpec = isRecord(template) ? template.spec : undefined;
  const containers = isRecord(podSpec) ? podSpec.containers : undefined;
  const first: unknown = Array.isArray(containers) ? containers[0] : undefined;

  if (!isRecord(first)) {
    throw new ManifestApplyError(
      `${resourceOf(deployment)} has no container to set the image on`,
      resourceOf(deployment),
    );
  }
  first.image = image;
  return copy;
}

/**
 * Force every resource into `namespace` and apply the image override.
 * The Namespace manifest itself is renamed to `namespace`.
 */
export function prepareManifests(
  manifests: readonly K8sManifest[],
  namespace: string,
  image?: string,
): K8sManifest[] {
  return manifests.map((manifest) => {
    if (manifest.kind === 'Namespace') {
      return { ...manifest, metadata: { ...manifest.metadata, name: namespace } };
    }
    const placed: K8sManifest = { ...manifest, metadata: { ...manifest.metadata, namespace } };
    return manifest.kind === 'Deployment' && image !== undefined
      ? withImage(placed, image)
      : placed;
  });
}

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const entries = Object.entries(value).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string',
  );
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * What the rollout watcher and health verifier track for this manifest set
 */
export function deploymentTargetFrom(
  manifests: readonly K8sManifest[],
  namespace: string,
): DeploymentTarget {
  const deployment = manifests.find((manifest) => manifest.kind === 'Deployment');
  if (!deployment) {
    throw new ManifestApplyError('Manifest set has no Deployment', 'Deployment');
  }
  const service = manifests.find((manifest) => manifest.kind === 'Service');
  const name = deployment.metadata.name;
  const selector = deployment.spec?.selector;
  const replicas = deployment.spec?.replicas;

  return {
    name,
    namespace,
    selector: (isRecord(selector) ? stringRecord(selector.matchLabels) : undefined) ??
      deployment.metadata.labels ?? { app: name },
    desiredReplicas: typeof replicas === 'number' ? replicas : 1,
    serviceName: service?.metadata.name ?? name,
  };
}

export function toLabelSelector(selector: Record<string, string>): string {
  return Object.entries(selector)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}
