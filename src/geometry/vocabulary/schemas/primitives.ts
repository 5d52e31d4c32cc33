import { z } from "zod";
import { primitiveKeywords } from "../keywords";

/**
 * Primitive Schemas - Foundational types with zero dependencies
 *
 * Only keywords are imported here. Everything else in the geometry layer is
 * composed from these.
 */

/**
 * Point2D - a position in world space
 *
 * Treated as an immutable value: operations always return a new point.
 */
export const vectorSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export type Point2D = z.infer<typeof vectorSchema>;

export type Area2D = {
  width: number;
  height: number;
};

/** Angle in radians. Any real value is accepted. */
export type Angle = number;

/** Flat x, y pairs in drawing order. */
export type VertexSequence = Float32Array;

/** Flat r, g, b, a tuples, one per vertex. */
export type ColorSequence = Float32Array;

export const primitiveKindSchema = z.enum([
  primitiveKeywords.points,
  primitiveKeywords.lines,
  primitiveKeywords.lineLoop,
  primitiveKeywords.triangleFan,
  primitiveKeywords.quads,
  primitiveKeywords.polygon,
]);

export type PrimitiveKind = z.infer<typeof primitiveKindSchema>;

export const ORIGIN: Readonly<Point2D> = Object.freeze({ x: 0, y: 0 });
