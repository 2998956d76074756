import { z } from 'zod';

export const DEFAULT_PAGE_TITLE = 'Conversation review';
export const DEFAULT_QUESTION = 'Does this conversation contain any issues?';

export const RemainderPolicySchema = z.enum(['dropRemainder', 'distributeToLast']);

export type RemainderPolicy = z.infer<typeof RemainderPolicySchema>;

const DatasetConfigSchema = z.object({
  path: z.string().min(1).default('dataset.jsonl'),
});

const OutputConfigSchema = z.object({
  dir: z.string().min(1).default('output'),
  csv: z.string().min(1).default('allocated_data.csv'),
  manifest: z.string().min(1).default('allocation_info.json'),
  page: z.string().min(1).default('annotation_page.html'),
});

const AllocationConfigSchema = z.object({
  on_remainder: RemainderPolicySchema.default('dropRemainder'),
});

const PageConfigSchema = z.object({
  title: z.string().default(DEFAULT_PAGE_TITLE),
  question: z.string().min(1).default(DEFAULT_QUESTION),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  dataset: DatasetConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  allocation: AllocationConfigSchema.default({}),
  page: PageConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(data: unknown): Config {
  return ConfigSchema.parse(data);
}
