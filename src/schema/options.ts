import { z } from "zod";
import {
  DEFAULT_GAP_THRESHOLD_PX,
  DEFAULT_MIN_HEIGHT_PX,
  DEFAULT_MIN_WIDTH_PX,
  DEFAULT_VIEWPORT,
  DEFAULT_RENDER_TIMEOUT_MS,
} from "../constants.js";

export const DetectOptionsSchema = z
  .object({
    gapThresholdPx: z.number().finite().nonnegative().default(DEFAULT_GAP_THRESHOLD_PX),
    minHeightPx: z.number().finite().nonnegative().default(DEFAULT_MIN_HEIGHT_PX),
    minWidthPx: z.number().finite().nonnegative().default(DEFAULT_MIN_WIDTH_PX),
  })
  .strict();
export type DetectOptions = z.infer<typeof DetectOptionsSchema>;
export type DetectOptionsInput = z.input<typeof DetectOptionsSchema>;

/** Fill in defaults for detection thresholds. Throws ZodError on invalid input. */
export function resolveDetectOptions(input: DetectOptionsInput = {}): DetectOptions {
  return DetectOptionsSchema.parse(input);
}

export const WaitStrategy = z.enum(["load", "domcontentloaded", "networkidle"]);
export type WaitStrategy = z.infer<typeof WaitStrategy>;

export const RenderConfigSchema = z
  .object({
    viewport: z
      .object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
      })
      .default({ ...DEFAULT_VIEWPORT }),
    waitUntil: WaitStrategy.default("networkidle"),
    timeoutMs: z.number().int().positive().default(DEFAULT_RENDER_TIMEOUT_MS),
  })
  .strict();
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type RenderConfigInput = z.input<typeof RenderConfigSchema>;

/** Fill in defaults for rendering. Throws ZodError on invalid input. */
export function resolveRenderConfig(input: RenderConfigInput = {}): RenderConfig {
  return RenderConfigSchema.parse(input);
}
