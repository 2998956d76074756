import type { Allocation } from '../allocation/allocator.js';
import { allocatedCount } from '../allocation/allocator.js';
import type { Manifest } from '../schemas/manifest.js';
import { writeOutput } from './writer.js';

/**
 * Describe an allocation for audit and reconciliation.
 * Key order is fixed so identical runs produce identical files.
 */
export function buildManifest(allocation: Allocation): Manifest {
  const allocated = allocatedCount(allocation);

  return {
    total_data: allocation.total,
    batch_size: allocation.batchSize,
    on_remainder: allocation.policy,
    participants: allocation.annotators.length,
    allocated_count: allocated,
    unallocated_count: allocation.unallocated.length,
    unallocated_ids: allocation.unallocated.map(r => r.id),
    annotators: allocation.annotators.map(a => ({
      name: a.name,
      count: a.records.length,
      conversation_ids: a.records.map(r => r.id),
    })),
  };
}

export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(manifest, null, 2) + '\n';
}

export function writeManifest(allocation: Allocation, path: string): Manifest {
  const manifest = buildManifest(allocation);
  writeOutput(path, serializeManifest(manifest));
  return manifest;
}
