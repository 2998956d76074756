import { existsSync, readFileSync } from 'fs';
import { ZodError } from 'zod';
import { ConversationRecord, ConversationRecordSchema } from '../schemas/record.js';
import { DatasetNotFoundError, ParseError } from '../errors/index.js';

export type Dataset = readonly ConversationRecord[];

/**
 * Parse newline-delimited JSON into records.
 *
 * Blank lines are skipped. Any malformed line, schema violation or repeated id
 * rejects the whole input; there is no partial load.
 */
export function parseDataset(content: string, file?: string): Dataset {
  const records: ConversationRecord[] = [];
  const firstSeen = new Map<string, number>();
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;
    const lineNo = index + 1;

    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ParseError(`Line ${lineNo}: invalid JSON (${message})`, file, lineNo);
    }

    const result = ConversationRecordSchema.safeParse(data);
    if (!result.success) {
      throw new ParseError(`Line ${lineNo}: ${describeIssues(result.error)}`, file, lineNo);
    }

    const key = String(result.data.id);
    const previous = firstSeen.get(key);
    if (previous !== undefined) {
      throw new ParseError(
        `Line ${lineNo}: duplicate record id "${key}" (first seen on line ${previous})`,
        file,
        lineNo
      );
    }
    firstSeen.set(key, lineNo);
    records.push(Object.freeze({ ...result.data, text: Object.freeze(result.data.text) }));
  });

  return Object.freeze(records);
}

export function loadDataset(path: string): Dataset {
  if (!existsSync(path)) {
    throw new DatasetNotFoundError(path);
  }
  return parseDataset(readFileSync(path, 'utf-8'), path);
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map(i => `${i.path.join('.') || '(record)'}: ${i.message}`)
    .join('; ');
}
