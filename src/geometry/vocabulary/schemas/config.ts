import { z } from "zod";

/**
 * Geometry Config Schema
 *
 * Tunables for tessellation density, grid layout and the background loop.
 * Defaults reproduce the stepping the renderer has always used.
 */
export const geometryConfigSchema = z.object({
  gridSpacing: z.number().positive(),
  chordLength: z.number().positive(), // target segment length for automatic curve stepping
  maxStepAngle: z.number().positive(), // ceiling on the angular step, in radians
  minRadius: z.number().positive(), // floor applied to degenerate radii
  loopIntervalMs: z.number().int().positive(),
});

export type GeometryConfig = z.infer<typeof geometryConfigSchema>;

export const defaultGeometryConfig: GeometryConfig = {
  gridSpacing: 50,
  chordLength: 32,
  maxStepAngle: Math.PI / 16,
  minRadius: 0.01,
  loopIntervalMs: 1000,
};

export const tessellationSettingsSchema = geometryConfigSchema.pick({
  chordLength: true,
  maxStepAngle: true,
  minRadius: true,
});

export type TessellationSettings = z.infer<typeof tessellationSettingsSchema>;

export const defaultTessellationSettings: TessellationSettings = {
  chordLength: defaultGeometryConfig.chordLength,
  maxStepAngle: defaultGeometryConfig.maxStepAngle,
  minRadius: defaultGeometryConfig.minRadius,
};
