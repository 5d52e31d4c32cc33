/**
 * Shape Tessellation
 *
 * Expands circles, ellipses, regular polygons and grids into point sequences.
 * Every function validates its input eagerly and returns a restartable
 * iterable: each `for...of` walks the shape again from the first vertex.
 *
 * Curves are stepped by angle. The step is derived from a target chord
 * length and capped at `maxStepAngle`, so small shapes still get a round
 * outline (32 segments at the default cap) and large shapes stay bounded.
 */

import type {
  Point2D,
  VertexSequence,
} from "./vocabulary/schemas/primitives";
import {
  defaultTessellationSettings,
  type TessellationSettings,
} from "./vocabulary/schemas/config";
import {
  ellipseOptionsSchema,
  gridSpacingSchema,
  ngonSidesSchema,
  type EllipseOptions,
} from "./vocabulary/schemas/tessellation";
import { describeIssues, TessellationConfigError } from "./errors";

const TWO_PI = Math.PI * 2;

export type GridSegment = {
  from: Point2D;
  to: Point2D;
};

// zero counts as "not supplied"
const isSupplied = (value: number | undefined): boolean =>
  value !== undefined && value !== 0;

const floorMod = (value: number, modulus: number): number =>
  ((value % modulus) + modulus) % modulus;

/**
 * Resolve the angular step used to walk an ellipse with the given radii.
 *
 * An explicit `da` wins. Otherwise the step is the angle subtending a chord
 * of `options.step` (or `settings.chordLength`) on the mean radius, capped
 * at `settings.maxStepAngle`. The mean radius is floored at
 * `settings.minRadius` so zero-size shapes still produce a finite step.
 */
export function ellipseStep(
  xrad: number,
  yrad: number,
  options: EllipseOptions = {},
  settings: TessellationSettings = defaultTessellationSettings
): number {
  if (isSupplied(options.da) && isSupplied(options.step)) {
    throw new TessellationConfigError("Can only set one of da and step");
  }
  const parsed = ellipseOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new TessellationConfigError(
      describeIssues("Invalid ellipse options", parsed.error)
    );
  }

  const { da, step } = parsed.data;
  if (da) return da;

  const chord = step || settings.chordLength;
  const rad = Math.max((xrad + yrad) / 2, settings.minRadius);
  const ratio = Math.max(Math.min(chord / rad / 2, 1), -1);

  return Math.min(2 * Math.asin(ratio), settings.maxStepAngle);
}

/**
 * Points along the ellipse inscribed in the box (x1, y1)-(x2, y2).
 *
 * Starts at angle 0 and walks counter-clockwise up to and including 2π, so
 * the closing vertex is emitted whenever the step divides the turn evenly.
 * Dashed mode advances two steps per vertex (half density).
 */
export function iterateEllipse(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  options: EllipseOptions = {},
  settings: TessellationSettings = defaultTessellationSettings
): Iterable<Point2D> {
  const xrad = Math.abs((x2 - x1) / 2);
  const yrad = Math.abs((y2 - y1) / 2);
  const cx = (x1 + x2) / 2;
  const cy = (y1 + y2) / 2;
  const da = ellipseStep(xrad, yrad, options, settings);
  const stride = options.dashed ? 2 : 1;

  return {
    *[Symbol.iterator]() {
      for (let i = 0; i * da <= TWO_PI; i += stride) {
        const a = i * da;
        yield { x: cx + Math.cos(a) * xrad, y: cy + Math.sin(a) * yrad };
      }
    },
  };
}

/** Circle as the equal-radii ellipse around (x, y). */
export function iterateCircle(
  x: number,
  y: number,
  radius: number,
  options: EllipseOptions = {},
  settings: TessellationSettings = defaultTessellationSettings
): Iterable<Point2D> {
  return iterateEllipse(x - radius, y - radius, x + radius, y + radius, options, settings);
}

/**
 * Vertices of a regular polygon centered on (x, y).
 *
 * Walks from `startAngle` to `startAngle + 2π` inclusive; the closing vertex
 * repeats the first one when the arithmetic lands exactly on the end angle.
 */
export function iterateNgon(
  x: number,
  y: number,
  radius: number,
  sides: number,
  startAngle = 0
): Iterable<Point2D> {
  const parsed = ngonSidesSchema.safeParse(sides);
  if (!parsed.success) {
    throw new TessellationConfigError(describeIssues("Invalid polygon", parsed.error));
  }

  const da = TWO_PI / parsed.data;
  const endAngle = TWO_PI + startAngle;

  return {
    *[Symbol.iterator]() {
      for (let i = 0; startAngle + i * da <= endAngle; i++) {
        const a = startAngle + i * da;
        yield { x: x + Math.cos(a) * radius, y: y + Math.sin(a) * radius };
      }
    },
  };
}

/**
 * Grid lines covering the area (x, y, width, height).
 *
 * Line positions are snapped down to a multiple of `spacing`, so the same
 * world lines show up however the viewport is panned. Vertical lines come
 * first, then horizontal ones.
 */
export function iterateGrid(
  x: number,
  y: number,
  width: number,
  height: number,
  spacing: number
): Iterable<GridSegment> {
  const parsed = gridSpacingSchema.safeParse(spacing);
  if (!parsed.success) {
    throw new TessellationConfigError(describeIssues("Invalid grid", parsed.error));
  }

  const xEnd = x + width;
  const yEnd = y + height;
  const xStart = x - floorMod(x, spacing);
  const yStart = y - floorMod(y, spacing);

  return {
    *[Symbol.iterator]() {
      for (let gx = xStart; gx < xEnd; gx += spacing) {
        yield { from: { x: gx, y: yStart }, to: { x: gx, y: yStart + height } };
      }
      // horizontal lines run from the requested x, not the snapped one
      for (let gy = yStart; gy < yEnd; gy += spacing) {
        yield { from: { x, y: gy }, to: { x: xEnd, y: gy } };
      }
    },
  };
}

export function flattenPoints(points: Iterable<Point2D>): VertexSequence {
  const flat: number[] = [];
  for (const point of points) {
    flat.push(point.x, point.y);
  }
  return Float32Array.from(flat);
}

export function flattenSegments(segments: Iterable<GridSegment>): VertexSequence {
  const flat: number[] = [];
  for (const { from, to } of segments) {
    flat.push(from.x, from.y, to.x, to.y);
  }
  return Float32Array.from(flat);
}
