import type { Allocation } from '../allocation/allocator.js';
import type { ConversationRecord } from '../schemas/record.js';
import { writeOutput } from './writer.js';

/** Fixed value of the Participants column: one reviewer per row */
const PARTICIPANTS_PER_ROW = 1;

export function csvEscape(value: string): string {
  if (value.includes('\n') || value.includes('\r') || value.includes(',') || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function csvHeader(batchSize: number): string[] {
  const headers = ['Participants'];
  for (let i = 1; i <= batchSize; i++) {
    headers.push(`id${i}`, `title${i}`, `convo${i}`);
  }
  return headers;
}

function recordCells(record: ConversationRecord): string[] {
  return [String(record.id), record.text.Title, record.text.Conversation];
}

/**
 * One row per annotator: Participants, then (id, title, convo) for each record.
 * Short batches are padded with empty cells to the full header width.
 */
export function buildCsvRows(allocation: Allocation): string[][] {
  const width = 1 + 3 * allocation.batchSize;
  const rows: string[][] = [csvHeader(allocation.batchSize)];

  for (const annotator of allocation.annotators) {
    const row = [String(PARTICIPANTS_PER_ROW), ...annotator.records.flatMap(recordCells)];
    while (row.length < width) {
      row.push('');
    }
    rows.push(row);
  }

  return rows;
}

export function buildCsv(allocation: Allocation): string {
  return buildCsvRows(allocation)
    .map(row => row.map(csvEscape).join(','))
    .join('\n') + '\n';
}

export function writeCsv(allocation: Allocation, path: string): void {
  writeOutput(path, buildCsv(allocation));
}
