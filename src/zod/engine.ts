// Zod schemas for engine configuration

import { z } from "zod";
import type { EngineOptions, OutputSink, RulePlacement } from "../types/engine";

/**
 * Rule placement schema
 */
export const RulePlacementSchema = z.enum([
  "stage",
  "central",
]) satisfies z.ZodType<RulePlacement>;

/**
 * Output sink schema: anything with a write(chunk) method
 */
export const OutputSinkSchema = z.custom<OutputSink>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "write" in value &&
    typeof value.write === "function",
  { message: "output must have a write(chunk) method" },
);

/**
 * Engine options schema
 */
export const EngineOptionsSchema = z.object({
  state: z
    .custom<object>((value) => typeof value === "object" && value !== null, {
      message: "state must be an object",
    })
    .optional(),
  placement: RulePlacementSchema.optional(),
  output: OutputSinkSchema.optional(),
  onEvent: z.function().optional(),
  context: z.record(z.unknown()).optional(),
}) satisfies z.ZodType<EngineOptions<object>>;

/**
 * Split arguments schema
 */
export const SplitArgsSchema = z.object({
  separator: z.string().min(1).optional(),
  maxSplit: z.number().int().min(-1),
});
