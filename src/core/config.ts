import { z } from 'zod';

const SizeSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
});

// ─── Editor configuration ──────────────────────────────

export const EditorConfigSchema = z
  .object({
    nodeSize: z
      .object({
        min: SizeSchema.default({ width: 120, height: 80 }),
        max: SizeSchema.default({ width: 1600, height: 1200 }),
        default: SizeSchema.default({ width: 400, height: 160 }),
      })
      .default({}),
    history: z
      .object({
        capacity: z.number().int().positive().default(200),
        /** Same-target updates closer together than this merge into one undo entry. */
        coalesceWindowMs: z.number().int().nonnegative().default(500),
      })
      .default({}),
    persistence: z
      .object({
        debounceMs: z.number().int().nonnegative().default(300),
        /** Upper bound on how long a continuous burst can postpone a flush. */
        maxWaitMs: z.number().int().positive().default(2000),
        retryInitialMs: z.number().int().positive().default(1000),
        retryMaxMs: z.number().int().positive().default(32000),
      })
      .default({}),
    routing: z
      .object({
        /** Inactivity gap that ends a gesture and releases its routing lock. */
        gestureReleaseMs: z.number().int().nonnegative().default(500),
      })
      .default({}),
    camera: z
      .object({
        minZoom: z.number().positive().default(0.1),
        maxZoom: z.number().positive().default(3),
        wheelZoomSensitivity: z.number().positive().default(0.0015),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    const { min, max, default: def } = cfg.nodeSize;
    if (min.width > max.width || min.height > max.height) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['nodeSize'], message: 'min exceeds max' });
    }
    if (
      def.width < min.width ||
      def.height < min.height ||
      def.width > max.width ||
      def.height > max.height
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['nodeSize', 'default'],
        message: 'default size outside min/max',
      });
    }
    if (cfg.camera.minZoom > cfg.camera.maxZoom) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['camera'], message: 'minZoom exceeds maxZoom' });
    }
  });

export type EditorConfig = z.infer<typeof EditorConfigSchema>;
export type EditorConfigInput = z.input<typeof EditorConfigSchema>;

/** Fill defaults and validate. Throws a ZodError on invalid input. */
export function resolveConfig(input?: EditorConfigInput): EditorConfig {
  return EditorConfigSchema.parse(input ?? {});
}

export type SizeBounds = EditorConfig['nodeSize'];

export function clampSize(
  size: { width: number; height: number },
  bounds: Pick<SizeBounds, 'min' | 'max'>,
): { width: number; height: number } {
  return {
    width: Math.min(bounds.max.width, Math.max(bounds.min.width, size.width)),
    height: Math.min(bounds.max.height, Math.max(bounds.min.height, size.height)),
  };
}
