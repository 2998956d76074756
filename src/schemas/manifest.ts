import { z } from 'zod';
import { RemainderPolicySchema } from './config.js';

export const AnnotatorEntrySchema = z.object({
  name: z.string().min(1),
  count: z.number().int().nonnegative(),
  conversation_ids: z.array(z.union([z.string(), z.number()])),
});

export const ManifestSchema = z.object({
  total_data: z.number().int().nonnegative(),
  batch_size: z.number().int().positive(),
  on_remainder: RemainderPolicySchema,
  participants: z.number().int().nonnegative(),
  allocated_count: z.number().int().nonnegative(),
  unallocated_count: z.number().int().nonnegative(),
  unallocated_ids: z.array(z.union([z.string(), z.number()])),
  annotators: z.array(AnnotatorEntrySchema),
}).refine(
  m => m.allocated_count + m.unallocated_count === m.total_data,
  { message: 'allocated_count + unallocated_count must equal total_data' }
);

export type Manifest = z.infer<typeof ManifestSchema>;

export function parseManifest(data: unknown): Manifest {
  return ManifestSchema.parse(data);
}
