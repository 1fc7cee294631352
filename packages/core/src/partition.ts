// packages/core/src/partition.ts
// Turns a topology snapshot into disjoint, ordered scan ranges.
import { PartitioningError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { Bound, ChunkInfo, CollectionTopology, PartitionDescriptor, Value } from './types.js';
import { compareBounds, compareValues, renderValue, valuesEqual } from './values.js';

const MIN: Bound = { kind: 'min' };
const MAX: Bound = { kind: 'max' };

export function describeBound(b: Bound): string {
  return b.kind === 'value' ? renderValue(b.value) : b.kind === 'min' ? 'MinKey' : 'MaxKey';
}

function fullRange(key: string, hosts: string[]): PartitionDescriptor[] {
  return [{ index: 0, key, min: MIN, max: MAX, hosts: [...hosts] }];
}

function chunkBound(chunk: ChunkInfo, side: 'min' | 'max', key: string): Bound {
  const b = chunk[side][key];
  if (!b) {
    throw new PartitioningError(`Chunk on shard ${chunk.shard} has no ${side} bound for key ${key}`, { shard: chunk.shard });
  }
  return b;
}

function planSharded(
  topology: Extract<CollectionTopology, { kind: 'sharded' }>,
  log: Logger
): PartitionDescriptor[] {
  const [first, ...rest] = Object.entries(topology.keyPattern);
  if (!first) throw new PartitioningError('Sharded collection reported an empty shard key');
  const [key, kind] = first;

  const allHosts = [...new Set(Object.values(topology.shards).flat())].sort();
  if (rest.length) {
    log.warn({ keyPattern: topology.keyPattern }, 'compound shard key; scanning as a single partition');
    return fullRange(key, allHosts);
  }
  // chunk bounds of a hashed key are hashes, not key values: no index range to read them by
  if (kind !== 1) {
    log.warn({ keyPattern: topology.keyPattern }, 'non-ascending shard key; scanning as a single partition');
    return fullRange(key, allHosts);
  }
  if (!topology.chunks.length) return fullRange(key, allHosts);

  const ranges = topology.chunks.map((c) => ({
    min: chunkBound(c, 'min', key),
    max: chunkBound(c, 'max', key),
    shard: c.shard
  }));

  for (const r of ranges) {
    if (compareBounds(r.min, r.max) >= 0) {
      throw new PartitioningError(
        `Inverted chunk range [${describeBound(r.min)}, ${describeBound(r.max)}) on shard ${r.shard}`,
        { shard: r.shard }
      );
    }
  }

  ranges.sort((a, b) => compareBounds(a.min, b.min));

  if (ranges[0].min.kind !== 'min') {
    throw new PartitioningError(`Chunks do not start at MinKey (first lower bound ${describeBound(ranges[0].min)})`);
  }
  const last = ranges[ranges.length - 1];
  if (last.max.kind !== 'max') {
    throw new PartitioningError(`Chunks do not end at MaxKey (last upper bound ${describeBound(last.max)})`);
  }
  for (let i = 1; i < ranges.length; i++) {
    const c = compareBounds(ranges[i - 1].max, ranges[i].min);
    if (c > 0) {
      throw new PartitioningError(
        `Overlapping chunks at ${describeBound(ranges[i].min)} (previous ends at ${describeBound(ranges[i - 1].max)})`,
        { index: i }
      );
    }
    if (c < 0) {
      throw new PartitioningError(
        `Gap between chunks: ${describeBound(ranges[i - 1].max)} .. ${describeBound(ranges[i].min)}`,
        { index: i }
      );
    }
  }

  return ranges.map((r, index) => ({
    index,
    key,
    min: r.min,
    max: r.max,
    hosts: [...(topology.shards[r.shard] ?? [])]
  }));
}

function planSplit(topology: Extract<CollectionTopology, { kind: 'split' }>): PartitionDescriptor[] {
  const points = [...topology.splitPoints].sort(compareValues);
  for (let i = 1; i < points.length; i++) {
    if (valuesEqual(points[i - 1], points[i])) {
      throw new PartitioningError(`Duplicate split point ${renderValue(points[i])}`, { index: i });
    }
  }
  const bounds: Bound[] = [MIN, ...points.map((value): Bound => ({ kind: 'value', value })), MAX];
  return bounds.slice(1).map((max, index) => ({
    index,
    key: topology.key,
    min: bounds[index],
    max,
    hosts: [...topology.hosts]
  }));
}

function planFor(topology: CollectionTopology, log: Logger): PartitionDescriptor[] {
  switch (topology.kind) {
    case 'unsharded':
      return fullRange('_id', topology.hosts);
    case 'split':
      return topology.splitPoints.length ? planSplit(topology) : fullRange(topology.key, topology.hosts);
    case 'sharded':
      return planSharded(topology, log);
  }
}

/**
 * One descriptor per storage range, ordered by lower bound. Same snapshot in,
 * same partitions out. Malformed ranges fail instead of being skipped.
 */
export function planPartitions(topology: CollectionTopology, logger: Logger = silentLogger): PartitionDescriptor[] {
  const parts = planFor(topology, logger);
  logger.info({ kind: topology.kind, partitions: parts.length }, 'partition-plan');
  return parts.map((p) => Object.freeze(p));
}

export function partitionContains(p: PartitionDescriptor, keyValue: Value | undefined): boolean {
  // absent shard keys sort as null
  const b: Bound = { kind: 'value', value: keyValue ?? { type: 'null' } };
  return compareBounds(p.min, b) <= 0 && compareBounds(b, p.max) < 0;
}

export function wholeCollectionPartition(key = '_id', hosts: string[] = []): PartitionDescriptor {
  return Object.freeze(fullRange(key, hosts)[0]);
}

export function isFullRange(p: Pick<PartitionDescriptor, 'min' | 'max'>): boolean {
  return p.min.kind === 'min' && p.max.kind === 'max';
}
