/**
 * Draw Commands
 *
 * Pure builders that turn shape requests into validated vertex buffers.
 * A draw command is what crosses the rendering boundary: a primitive kind,
 * a flat vertex buffer, an optional per-vertex color buffer and the vertex
 * count. Buffers are always freshly allocated and owned by the caller.
 */

import { primitiveKeywords } from "@/geometry/vocabulary/keywords";
import type {
  ColorSequence,
  PrimitiveKind,
  VertexSequence,
} from "@/geometry/vocabulary/schemas/primitives";
import {
  defaultTessellationSettings,
  type TessellationSettings,
} from "@/geometry/vocabulary/schemas/config";
import type { EllipseOptions } from "@/geometry/vocabulary/schemas/tessellation";
import { MalformedDrawCallError } from "@/geometry/errors";
import {
  flattenPoints,
  flattenSegments,
  iterateCircle,
  iterateEllipse,
  iterateGrid,
  iterateNgon,
} from "@/geometry/tessellation";

export type DrawCommand = {
  primitive: PrimitiveKind;
  vertices: VertexSequence;
  colors?: ColorSequence;
  count: number;
};

/** Flat numeric input: [x1, y1, x2, y2, ...] or [r1, g1, b1, a1, ...] */
export type NumberList = ArrayLike<number>;

/**
 * Build a draw command, rejecting buffers whose arity does not line up.
 */
export function createDrawCommand(
  primitive: PrimitiveKind,
  vertices: NumberList,
  colors?: NumberList
): DrawCommand {
  if (vertices.length % 2 !== 0) {
    throw new MalformedDrawCallError(
      `Vertex buffer holds ${vertices.length} values, expected x/y pairs`
    );
  }
  const count = vertices.length / 2;

  if (primitive === primitiveKeywords.quads && count % 4 !== 0) {
    throw new MalformedDrawCallError(
      `Quad list needs a multiple of 4 vertices, got ${count}`
    );
  }
  if (colors !== undefined && colors.length !== count * 4) {
    throw new MalformedDrawCallError(
      `Color buffer holds ${colors.length} values for ${count} vertices, expected ${count * 4}`
    );
  }

  const command: DrawCommand = {
    primitive,
    vertices: Float32Array.from(vertices),
    count,
  };
  if (colors !== undefined) {
    command.colors = Float32Array.from(colors);
  }
  return command;
}

// ============================================================================
// Lines and polygons
// ============================================================================

export const lineCommand = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  colors?: NumberList
): DrawCommand => createDrawCommand(primitiveKeywords.lines, [x1, y1, x2, y2], colors);

export const lineLoopCommand = (points: NumberList, colors?: NumberList): DrawCommand =>
  createDrawCommand(primitiveKeywords.lineLoop, points, colors);

export const pointsCommand = (points: NumberList, colors?: NumberList): DrawCommand =>
  createDrawCommand(primitiveKeywords.points, points, colors);

export const polygonCommand = (points: NumberList, colors?: NumberList): DrawCommand =>
  createDrawCommand(primitiveKeywords.polygon, points, colors);

export const quadCommand = (points: NumberList, colors?: NumberList): DrawCommand =>
  createDrawCommand(primitiveKeywords.quads, points, colors);

// ============================================================================
// Rectangles
// ============================================================================

/** Filled rectangle between two corners. */
export const rectCommand = (x1: number, y1: number, x2: number, y2: number): DrawCommand =>
  createDrawCommand(primitiveKeywords.quads, [x1, y1, x1, y2, x2, y2, x2, y1]);

/**
 * Rectangle outline between two corners, given in any order.
 */
export function rectOutlineCommand(
  x1: number,
  y1: number,
  x2: number,
  y2: number
): DrawCommand {
  const left = Math.min(x1, x2);
  const right = Math.max(x1, x2);
  const bottom = Math.min(y1, y2);
  const top = Math.max(y1, y2);
  return createDrawCommand(primitiveKeywords.lineLoop, [
    left,
    bottom,
    left,
    top,
    right,
    top,
    right,
    bottom,
  ]);
}

/** Outline of the box at (x, y) with the given size. */
export const frameCommand = (
  x: number,
  y: number,
  width: number,
  height: number
): DrawCommand =>
  createDrawCommand(primitiveKeywords.lineLoop, [
    x,
    y,
    x + width,
    y,
    x + width,
    y + height,
    x,
    y + height,
  ]);

// ============================================================================
// Curves
// ============================================================================

// Filled curves are emitted as a fan anchored on the first outline vertex;
// the center is not inserted.

export const ellipseCommand = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  options?: EllipseOptions,
  settings: TessellationSettings = defaultTessellationSettings
): DrawCommand =>
  createDrawCommand(
    primitiveKeywords.triangleFan,
    flattenPoints(iterateEllipse(x1, y1, x2, y2, options, settings))
  );

export const ellipseOutlineCommand = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  options?: EllipseOptions,
  settings: TessellationSettings = defaultTessellationSettings
): DrawCommand =>
  createDrawCommand(
    primitiveKeywords.lineLoop,
    flattenPoints(iterateEllipse(x1, y1, x2, y2, options, settings))
  );

export const circleCommand = (
  x: number,
  y: number,
  radius: number,
  options?: EllipseOptions,
  settings: TessellationSettings = defaultTessellationSettings
): DrawCommand =>
  createDrawCommand(
    primitiveKeywords.triangleFan,
    flattenPoints(iterateCircle(x, y, radius, options, settings))
  );

export const circleOutlineCommand = (
  x: number,
  y: number,
  radius: number,
  options?: EllipseOptions,
  settings: TessellationSettings = defaultTessellationSettings
): DrawCommand =>
  createDrawCommand(
    primitiveKeywords.lineLoop,
    flattenPoints(iterateCircle(x, y, radius, options, settings))
  );

export const ngonCommand = (
  x: number,
  y: number,
  radius: number,
  sides: number,
  startAngle = 0
): DrawCommand =>
  createDrawCommand(
    primitiveKeywords.triangleFan,
    flattenPoints(iterateNgon(x, y, radius, sides, startAngle))
  );

export const ngonOutlineCommand = (
  x: number,
  y: number,
  radius: number,
  sides: number,
  startAngle = 0
): DrawCommand =>
  createDrawCommand(
    primitiveKeywords.lineLoop,
    flattenPoints(iterateNgon(x, y, radius, sides, startAngle))
  );

// ============================================================================
// Grid
// ============================================================================

/** Line list covering the area, snapped to multiples of `spacing`. */
export const gridCommand = (
  x: number,
  y: number,
  width: number,
  height: number,
  spacing: number
): DrawCommand =>
  createDrawCommand(
    primitiveKeywords.lines,
    flattenSegments(iterateGrid(x, y, width, height, spacing))
  );
