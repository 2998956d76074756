import type { ConversationRecord } from '../schemas/record.js';
import type { RemainderPolicy } from '../schemas/config.js';
import type { Dataset } from '../dataset/loader.js';
import { planBatches } from './planner.js';
import type { BatchPlan } from './planner.js';
import { InvalidInputError } from '../errors/index.js';

export interface AllocatorOptions {
  /**
   * What happens to the records past the last full batch.
   * - dropRemainder: they stay unallocated
   * - distributeToLast: they go to one extra, final annotator as a short batch
   */
  onRemainder?: RemainderPolicy;
}

export interface AnnotatorBatch {
  /** "1", "2", ... in allocation order */
  name: string;
  records: readonly ConversationRecord[];
}

export interface Allocation {
  total: number;
  batchSize: number;
  policy: RemainderPolicy;
  annotators: readonly AnnotatorBatch[];
  unallocated: readonly ConversationRecord[];
}

export class BatchAllocator {
  private readonly policy: RemainderPolicy;

  constructor(options: AllocatorOptions = {}) {
    this.policy = options.onRemainder ?? 'dropRemainder';
  }

  /**
   * Hand out contiguous slices of the dataset to sequentially numbered annotators.
   * Purely positional: annotator k gets [(k-1)*batchSize, k*batchSize).
   */
  allocate(dataset: Dataset, plan: BatchPlan): Allocation {
    if (plan.total !== dataset.length) {
      throw new InvalidInputError(
        `Batch plan was made for ${plan.total} records but the dataset has ${dataset.length}`
      );
    }
    const expected = planBatches(dataset.length, plan.batchSize);
    if (plan.batchCount !== expected.batchCount || plan.remainder !== expected.remainder) {
      throw new InvalidInputError(
        `Batch plan does not add up: ${dataset.length} records in batches of ${plan.batchSize} ` +
        `make ${expected.batchCount} batches with ${expected.remainder} left over ` +
        `(got ${plan.batchCount} and ${plan.remainder})`
      );
    }

    const annotators: AnnotatorBatch[] = [];
    let cursor = 0;

    for (let k = 1; k <= plan.batchCount; k++) {
      const records = dataset.slice(cursor, cursor + plan.batchSize);
      cursor += plan.batchSize;
      annotators.push(Object.freeze({ name: String(k), records: Object.freeze(records) }));
    }

    let unallocated = dataset.slice(cursor);

    if (this.policy === 'distributeToLast' && unallocated.length > 0) {
      annotators.push(Object.freeze({
        name: String(annotators.length + 1),
        records: Object.freeze(unallocated),
      }));
      unallocated = [];
    }

    return Object.freeze({
      total: dataset.length,
      batchSize: plan.batchSize,
      policy: this.policy,
      annotators: Object.freeze(annotators),
      unallocated: Object.freeze(unallocated),
    });
  }
}

export function allocate(dataset: Dataset, plan: BatchPlan, options: AllocatorOptions = {}): Allocation {
  return new BatchAllocator(options).allocate(dataset, plan);
}

export function allocatedCount(allocation: Allocation): number {
  return allocation.annotators.reduce((sum, a) => sum + a.records.length, 0);
}
