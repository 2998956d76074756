import { describe, it, expect } from 'vitest';
import { BatchAllocator, allocate, allocatedCount } from '../src/allocation/allocator.js';
import { planBatches } from '../src/allocation/planner.js';
import type { ConversationRecord } from '../src/schemas/record.js';
import { InvalidInputError } from '../src/errors/index.js';

function makeRecords(n: number): ConversationRecord[] {
  return Array.from({ length: n }, (_, i) => ({
    id: `c${i}`,
    text: { Title: `Title ${i}`, Conversation: `User: hello ${i}` },
  }));
}

function ids(records: readonly ConversationRecord[]): (string | number)[] {
  return records.map(r => r.id);
}

describe('BatchAllocator', () => {
  it('hands out contiguous slices and leaves the tail unallocated', () => {
    const records = makeRecords(10);
    const result = allocate(records, planBatches(10, 3));

    expect(result.annotators.map(a => a.name)).toEqual(['1', '2', '3']);
    expect(ids(result.annotators[0].records)).toEqual(['c0', 'c1', 'c2']);
    expect(ids(result.annotators[1].records)).toEqual(['c3', 'c4', 'c5']);
    expect(ids(result.annotators[2].records)).toEqual(['c6', 'c7', 'c8']);
    expect(ids(result.unallocated)).toEqual(['c9']);
  });

  it('leaves nothing over when the dataset divides evenly', () => {
    const result = allocate(makeRecords(9), planBatches(9, 3));

    expect(result.annotators).toHaveLength(3);
    expect(result.unallocated).toEqual([]);
  });

  it('defaults to the dropRemainder policy', () => {
    const result = new BatchAllocator().allocate(makeRecords(5), planBatches(5, 2));
    expect(result.policy).toBe('dropRemainder');
    expect(ids(result.unallocated)).toEqual(['c4']);
  });

  it('gives leftovers to one extra short batch under distributeToLast', () => {
    const result = allocate(makeRecords(10), planBatches(10, 4), { onRemainder: 'distributeToLast' });

    expect(result.annotators.map(a => a.name)).toEqual(['1', '2', '3']);
    expect(result.annotators.map(a => a.records.length)).toEqual([4, 4, 2]);
    expect(ids(result.annotators[2].records)).toEqual(['c8', 'c9']);
    expect(result.unallocated).toEqual([]);
  });

  it('adds no extra annotator under distributeToLast when nothing is left over', () => {
    const result = allocate(makeRecords(8), planBatches(8, 4), { onRemainder: 'distributeToLast' });
    expect(result.annotators).toHaveLength(2);
  });

  it('keeps the original records (same objects, same order)', () => {
    const records = makeRecords(4);
    const result = allocate(records, planBatches(4, 2));
    expect(result.annotators[1].records[0]).toBe(records[2]);
  });

  it('partitions the dataset for every batch size and policy', () => {
    const records = makeRecords(23);
    for (const onRemainder of ['dropRemainder', 'distributeToLast'] as const) {
      for (let batchSize = 1; batchSize <= 23; batchSize++) {
        const result = allocate(records, planBatches(23, batchSize), { onRemainder });
        const rebuilt = [...result.annotators.flatMap(a => a.records), ...result.unallocated];

        expect(ids(rebuilt)).toEqual(ids(records));
        expect(new Set(ids(rebuilt)).size).toBe(23);
        expect(allocatedCount(result) + result.unallocated.length).toBe(23);
      }
    }
  });

  it('rejects a plan made for a different dataset size', () => {
    expect(() => allocate(makeRecords(6), planBatches(8, 2))).toThrow(InvalidInputError);
  });

  it('rejects a plan whose batch count does not match its batch size', () => {
    const plan = { total: 10, batchSize: 3, batchCount: 5, remainder: 1 };
    expect(() => allocate(makeRecords(10), plan)).toThrow(
      'Batch plan does not add up: 10 records in batches of 3 make 3 batches with 1 left over (got 5 and 1)'
    );
  });

  it('rejects a plan whose remainder does not match', () => {
    const plan = { total: 10, batchSize: 3, batchCount: 3, remainder: 0 };
    expect(() => allocate(makeRecords(10), plan)).toThrow(InvalidInputError);
  });

  it('rejects a plan with an out-of-range batch size', () => {
    const plan = { total: 4, batchSize: 0, batchCount: 0, remainder: 4 };
    expect(() => allocate(makeRecords(4), plan)).toThrow('Batch size must be greater than 0');
  });

  it('returns frozen results', () => {
    const result = allocate(makeRecords(4), planBatches(4, 2));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.annotators)).toBe(true);
    expect(Object.isFrozen(result.annotators[0].records)).toBe(true);
  });

  it('allocates deterministically', () => {
    const records = makeRecords(12);
    const first = allocate(records, planBatches(12, 5));
    const second = allocate(records, planBatches(12, 5));
    expect(second).toEqual(first);
  });
});
