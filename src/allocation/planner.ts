import { InvalidInputError } from '../errors/index.js';

export interface BatchPlan {
  total: number;
  batchSize: number;
  /** Number of full batches, one per annotator */
  batchCount: number;
  /** Records left after the last full batch, always < batchSize */
  remainder: number;
}

/**
 * Work out how many full batches of `batchSize` fit into `total` records.
 * Throws InvalidInputError when the batch size is not an integer in [1, total].
 */
export function planBatches(total: number, batchSize: number): BatchPlan {
  if (!Number.isInteger(total) || total < 0) {
    throw new InvalidInputError(`Invalid dataset size: ${total}`);
  }
  if (!Number.isInteger(batchSize)) {
    throw new InvalidInputError(`Batch size must be an integer (got ${batchSize})`);
  }
  if (batchSize <= 0) {
    throw new InvalidInputError('Batch size must be greater than 0');
  }
  if (batchSize > total) {
    throw new InvalidInputError(`Batch size cannot exceed the dataset size (${total})`);
  }

  return {
    total,
    batchSize,
    batchCount: Math.floor(total / batchSize),
    remainder: total % batchSize,
  };
}

/**
 * Parse a batch size typed by the user and check it against the dataset size.
 */
export function parseBatchSize(raw: string, total: number): number {
  const trimmed = raw.trim();
  // Number() would accept '', '1e2', '0x10' and '3.0'
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidInputError('Please enter a whole number');
  }
  const batchSize = parseInt(trimmed, 10);
  planBatches(total, batchSize);
  return batchSize;
}
