import { z } from 'zod';

// ─── Persisted record schemas ──────────────────────────

export const NodeRecordSchema = z.object({
  id: z.string().min(1),
  x: z.number().finite(),
  y: z.number().finite(),
  // out-of-bounds sizes are clamped on load, not rejected
  width: z.number().finite(),
  height: z.number().finite(),
  content: z.object({
    kind: z.string(),
    payload: z.unknown().optional(),
  }),
  color: z.string().optional(),
  createdAt: z.number().finite(),
  updatedAt: z.number().finite(),
});

export const EdgeRecordSchema = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  target: z.string().min(1),
  color: z.string().optional(),
  createdAt: z.number().finite(),
});

export const DocumentRecordSchema = z.object({
  viewport: z.object({
    zoom: z.number().finite().positive(),
    offsetX: z.number().finite(),
    offsetY: z.number().finite(),
  }),
  savedAt: z.number().finite(),
});

/** Enough of a record to know which entity it belonged to. */
export const RecordIdSchema = z.object({ id: z.string().min(1) });

export type NodeRecord = z.infer<typeof NodeRecordSchema>;
export type EdgeRecord = z.infer<typeof EdgeRecordSchema>;
export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;
