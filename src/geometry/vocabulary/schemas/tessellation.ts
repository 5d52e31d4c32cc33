import { z } from "zod";

/**
 * Tessellation Schemas - Caller-supplied shape parameters
 *
 * A zero `da` or `step` means "not supplied"; the conflict between the two is
 * checked before these schemas run (see tessellation.ts).
 */

export const ellipseOptionsSchema = z.object({
  da: z.number().nonnegative().optional(), // explicit angular step (radians)
  step: z.number().nonnegative().optional(), // explicit chord length
  dashed: z.boolean().optional(), // emit every other step only
});

export type EllipseOptions = z.infer<typeof ellipseOptionsSchema>;

export const ngonSidesSchema = z
  .number()
  .int("sides must be an integer")
  .min(3, "sides must be at least 3");

export const gridSpacingSchema = z.number().positive("grid spacing must be positive");
