import { z } from 'zod';

/** Free-form JSON object (statistics, analytics, exports, acknowledgements). */
export const RecordSchema = z.record(z.unknown());
export type JsonRecord = z.infer<typeof RecordSchema>;

export const MetadataSchema = z.record(z.unknown());
export type Metadata = z.infer<typeof MetadataSchema>;

export const DeleteResultSchema = z
  .object({
    deleted_count: z.number().optional(),
    message: z.string().optional(),
  })
  .passthrough();
export type DeleteResult = z.infer<typeof DeleteResultSchema>;

export const HealthSchema = z
  .object({
    status: z.string().optional(),
  })
  .passthrough();
export type Health = z.infer<typeof HealthSchema>;

export const AuditLogListSchema = z.union([
  z.array(RecordSchema),
  z.object({ logs: z.array(RecordSchema) }).passthrough(),
]);
