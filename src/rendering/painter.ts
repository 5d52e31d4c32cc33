/**
 * Painter - draw commands bound to an explicit surface
 *
 * Each method builds the command for one shape and submits it to the
 * surface the painter was created with. Settings are read on every call,
 * so config updates apply to the next shape drawn.
 */

import type { GeometryConfig } from "@/geometry/vocabulary/schemas/config";
import { defaultGeometryConfig } from "@/geometry/vocabulary/schemas/config";
import type { EllipseOptions } from "@/geometry/vocabulary/schemas/tessellation";
import {
  circleCommand,
  circleOutlineCommand,
  ellipseCommand,
  ellipseOutlineCommand,
  frameCommand,
  gridCommand,
  lineCommand,
  lineLoopCommand,
  ngonCommand,
  ngonOutlineCommand,
  pointsCommand,
  polygonCommand,
  quadCommand,
  rectCommand,
  rectOutlineCommand,
  type DrawCommand,
  type NumberList,
} from "./drawCommands";
import type { DrawSurface } from "./surfaces";

export type PainterSettings = Pick<
  GeometryConfig,
  "gridSpacing" | "chordLength" | "maxStepAngle" | "minRadius"
>;

export const createPainter = (
  surface: DrawSurface,
  getSettings: () => PainterSettings = () => defaultGeometryConfig
) => {
  const submit = (command: DrawCommand): DrawCommand => {
    surface.submit(command);
    return command;
  };

  const api = {
    line: (x1: number, y1: number, x2: number, y2: number, colors?: NumberList) =>
      submit(lineCommand(x1, y1, x2, y2, colors)),

    lineLoop: (points: NumberList, colors?: NumberList) =>
      submit(lineLoopCommand(points, colors)),

    points: (points: NumberList, colors?: NumberList) =>
      submit(pointsCommand(points, colors)),

    polygon: (points: NumberList, colors?: NumberList) =>
      submit(polygonCommand(points, colors)),

    quad: (points: NumberList, colors?: NumberList) => submit(quadCommand(points, colors)),

    rect: (x1: number, y1: number, x2: number, y2: number) =>
      submit(rectCommand(x1, y1, x2, y2)),

    rectOutline: (x1: number, y1: number, x2: number, y2: number) =>
      submit(rectOutlineCommand(x1, y1, x2, y2)),

    frame: (x: number, y: number, width: number, height: number) =>
      submit(frameCommand(x, y, width, height)),

    ellipse: (x1: number, y1: number, x2: number, y2: number, options?: EllipseOptions) =>
      submit(ellipseCommand(x1, y1, x2, y2, options, getSettings())),

    ellipseOutline: (
      x1: number,
      y1: number,
      x2: number,
      y2: number,
      options?: EllipseOptions
    ) => submit(ellipseOutlineCommand(x1, y1, x2, y2, options, getSettings())),

    circle: (x: number, y: number, radius: number, options?: EllipseOptions) =>
      submit(circleCommand(x, y, radius, options, getSettings())),

    circleOutline: (x: number, y: number, radius: number, options?: EllipseOptions) =>
      submit(circleOutlineCommand(x, y, radius, options, getSettings())),

    ngon: (x: number, y: number, radius: number, sides: number, startAngle?: number) =>
      submit(ngonCommand(x, y, radius, sides, startAngle)),

    ngonOutline: (
      x: number,
      y: number,
      radius: number,
      sides: number,
      startAngle?: number
    ) => submit(ngonOutlineCommand(x, y, radius, sides, startAngle)),

    grid: (x: number, y: number, width: number, height: number) =>
      submit(gridCommand(x, y, width, height, getSettings().gridSpacing)),
  };

  return api;
};

export type Painter = ReturnType<typeof createPainter>;
