import type { Allocation } from '../allocation/allocator.js';
import type { OutputPaths } from '../config/loader.js';
import type { Manifest } from '../schemas/manifest.js';
import { writeCsv } from './csv.js';
import { writeManifest } from './manifest.js';
import { writePage, PageOptions } from './page.js';

export interface ExportResult {
  csv: string;
  manifest: string;
  page: string;
  summary: Manifest;
}

/**
 * Write the assignment sheet, the manifest and the annotation page.
 * Each file is overwritten; the first failure aborts the rest.
 */
export function exportAll(
  allocation: Allocation,
  paths: OutputPaths,
  pageOptions: PageOptions = {}
): ExportResult {
  writeCsv(allocation, paths.csv);
  const summary = writeManifest(allocation, paths.manifest);
  writePage(allocation.batchSize, paths.page, pageOptions);

  return {
    csv: paths.csv,
    manifest: paths.manifest,
    page: paths.page,
    summary,
  };
}
