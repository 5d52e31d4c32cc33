import { describe, expect, it } from "vitest";
import { createPainter } from "../src/rendering/painter";
import { createRecordingSurface } from "../src/rendering/surfaces";
import { defaultGeometryConfig } from "../src/geometry/vocabulary/schemas/config";
import { MalformedDrawCallError } from "../src/geometry/errors";

describe("painter", () => {
  it("submits each shape to its surface in order", () => {
    const surface = createRecordingSurface();
    const painter = createPainter(surface);

    painter.circle(0, 0, 10);
    painter.line(0, 0, 1, 1);
    painter.rectOutline(0, 0, 4, 4);

    expect(surface.commands().map((c) => c.primitive)).toEqual([
      "triangle fan",
      "lines",
      "line loop",
    ]);
  });

  it("returns the command it submitted", () => {
    const surface = createRecordingSurface();
    const command = createPainter(surface).ngon(0, 0, 1, 4, Math.PI / 4);
    expect(surface.commands()).toEqual([command]);
  });

  it("does not submit malformed commands", () => {
    const surface = createRecordingSurface();
    const painter = createPainter(surface);
    expect(() => painter.points([1, 2], [1, 1, 1])).toThrow(MalformedDrawCallError);
    expect(surface.commands()).toHaveLength(0);
  });

  it("reads the grid spacing on every call", () => {
    const surface = createRecordingSurface();
    let gridSpacing = 50;
    const painter = createPainter(surface, () => ({ ...defaultGeometryConfig, gridSpacing }));

    expect(painter.grid(0, 0, 50, 50).count).toBe(4);
    gridSpacing = 25;
    expect(painter.grid(0, 0, 50, 50).count).toBe(8);
  });

  it("tessellates curves with the configured cap", () => {
    const surface = createRecordingSurface();
    const painter = createPainter(surface, () => ({
      ...defaultGeometryConfig,
      maxStepAngle: Math.PI / 4,
    }));
    expect(painter.circleOutline(0, 0, 10).count).toBe(9);
  });

  it("clears recorded commands", () => {
    const surface = createRecordingSurface();
    createPainter(surface).frame(0, 0, 1, 1);
    surface.clear();
    expect(surface.commands()).toEqual([]);
  });
});
