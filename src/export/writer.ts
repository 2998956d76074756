import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { ExportError } from '../errors/index.js';

/**
 * Write an artifact, replacing any previous file at `path`.
 */
export function writeOutput(path: string, content: string): void {
  try {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, content, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExportError(`Failed to write ${path}: ${message}`, path);
  }
}
