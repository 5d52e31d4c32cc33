import type { Angle, Area2D, Point2D } from "./vocabulary/schemas/primitives";
import { ORIGIN } from "./vocabulary/schemas/primitives";

const TWO_PI = Math.PI * 2;

export function add(a: Point2D, b: Point2D): Point2D {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtract(a: Point2D, b: Point2D): Point2D {
  return { x: a.x - b.x, y: a.y - b.y };
}

/**
 * Rotate a point counter-clockwise about the origin
 * NaN and infinite inputs propagate to the result.
 */
export function rotate(point: Point2D, angle: Angle): Point2D {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return {
    x: cos * point.x - sin * point.y,
    y: sin * point.x + cos * point.y,
  };
}

/**
 * Rotate a point counter-clockwise about an arbitrary pivot
 */
export function rotateAroundPivot(pivot: Point2D, point: Point2D, angle: Angle): Point2D {
  return add(rotate(subtract(point, pivot), angle), pivot);
}

/**
 * Bring an angle back into [0, 2π) by at most one revolution.
 *
 * This is a single correction, not a modulo: 4π + 0.1 comes back as 2π + 0.1.
 * Callers rendering headings rely on this exact output.
 */
export function wrapAngle(angle: Angle): Angle {
  if (angle >= TWO_PI) {
    return angle - TWO_PI;
  }
  if (angle < 0) {
    return angle + TWO_PI;
  }
  return angle;
}

export function distanceSq(p1: Point2D = ORIGIN, p2: Point2D = ORIGIN): number {
  const dx = p1.x - p2.x;
  const dy = p1.y - p2.y;
  return dx * dx + dy * dy;
}

export function distance(p1: Point2D = ORIGIN, p2: Point2D = ORIGIN): number {
  return Math.sqrt(distanceSq(p1, p2));
}

/**
 * Anchor that centers a sprite of the given size on its position
 */
export function centerAnchor(size: Area2D): Point2D {
  return { x: size.width / 2, y: size.height / 2 };
}
