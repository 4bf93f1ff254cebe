import pLimit from 'p-limit';
import { createChildLogger } from '../utils/logger.js';
import { createImage, InventorySet, InvalidDigestError, type Image } from '../models/image.js';
import type { ContainerSummary } from '../models/docker.js';
import type { ContainerSource } from './docker-client.js';

const log = createChildLogger('inventory');

export interface HostFailure {
  host: string;
  error: string;
}

export interface InventoryResult {
  inventory: InventorySet;
  hostsQueried: number;
  hostFailures: HostFailure[];
  containersSeen: number;
  duplicates: number;
}

export interface CollectInventoryOptions {
  /** Hosts queried at once; 1 keeps the sequential behaviour */
  concurrency?: number;
  /** Aborts host queries that are still in flight or queued */
  signal?: AbortSignal;
}

function toImage(container: ContainerSummary): Image | null {
  try {
    return createImage(container.Image, container.ImageID);
  } catch (err) {
    if (err instanceof InvalidDigestError) return null;
    throw err;
  }
}

/**
 * Build the deduplicated image inventory of every running container across
 * all hosts. A failing host is logged and contributes nothing; it never
 * fails the collection. Results are merged in host order, so which display
 * name survives a digest collision does not depend on response timing.
 */
export async function collectInventory(
  sources: readonly ContainerSource[],
  options: CollectInventoryOptions = {},
): Promise<InventoryResult> {
  const limit = pLimit(options.concurrency ?? 1);
  const results = await Promise.allSettled(
    sources.map((source) => limit(() => source.listRunningContainers(options.signal))),
  );

  const inventory = new InventorySet();
  const hostFailures: HostFailure[] = [];
  let containersSeen = 0;
  let duplicates = 0;

  for (let i = 0; i < results.length; i++) {
    const result = results[i];
    const host = sources[i].label;
    if (result.status === 'rejected') {
      const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
      log.error({ host, err: result.reason }, 'Failed to list containers on host');
      hostFailures.push({ host, error });
      continue;
    }

    const containers: ContainerSummary[] = result.value;
    containersSeen += containers.length;
    let added = 0;
    for (const container of containers) {
      const image = toImage(container);
      if (!image) {
        log.warn({ host, containerId: container.Id, imageId: container.ImageID }, 'Skipping container with unusable image ID');
        continue;
      }
      if (inventory.add(image)) {
        added++;
      } else {
        duplicates++;
        log.debug({ host, image: image.displayName, digest: image.contentDigest }, 'Image already in inventory');
      }
    }
    log.debug({ host, containers: containers.length, added }, 'Host inventory merged');
  }

  log.info(
    {
      hosts: sources.length,
      failedHosts: hostFailures.length,
      containers: containersSeen,
      images: inventory.size,
    },
    'Inventory collected',
  );

  return { inventory, hostsQueried: sources.length, hostFailures, containersSeen, duplicates };
}
