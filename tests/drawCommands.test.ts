import { describe, expect, it } from "vitest";
import {
  circleCommand,
  circleOutlineCommand,
  createDrawCommand,
  ellipseOutlineCommand,
  frameCommand,
  gridCommand,
  lineCommand,
  ngonCommand,
  ngonOutlineCommand,
  pointsCommand,
  polygonCommand,
  quadCommand,
  rectCommand,
  rectOutlineCommand,
} from "../src/rendering/drawCommands";
import { MalformedDrawCallError, TessellationConfigError } from "../src/geometry/errors";

describe("createDrawCommand", () => {
  it("counts vertices from the flat buffer", () => {
    const command = createDrawCommand("points", [1, 2, 3, 4, 5, 6]);
    expect(command.primitive).toBe("points");
    expect(command.count).toBe(3);
    expect(Array.from(command.vertices)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(command.colors).toBeUndefined();
  });

  it("rejects a dangling coordinate", () => {
    expect(() => createDrawCommand("points", [1, 2, 3])).toThrow(MalformedDrawCallError);
  });

  it("accepts one color per vertex", () => {
    const command = lineCommand(0, 0, 3, 4, [1, 0, 0, 1, 0, 0, 1, 1]);
    expect(command.count).toBe(2);
    expect(Array.from(command.colors ?? [])).toEqual([1, 0, 0, 1, 0, 0, 1, 1]);
  });

  it("rejects color buffers that do not match the vertex count", () => {
    expect(() => lineCommand(0, 0, 3, 4, [1, 0, 0, 1])).toThrow(MalformedDrawCallError);
    expect(() => pointsCommand([0, 0], [1, 1, 1])).toThrow(
      "Color buffer holds 3 values for 1 vertices, expected 4"
    );
    expect(() => polygonCommand([0, 0, 1, 0, 1, 1], new Array(16).fill(1))).toThrow(
      MalformedDrawCallError
    );
  });

  it("copies its input buffers", () => {
    const vertices = [0, 0, 1, 1];
    const command = createDrawCommand("lines", vertices);
    vertices[0] = 99;
    expect(command.vertices[0]).toBe(0);
  });
});

describe("quads", () => {
  it("fills a rectangle between two corners", () => {
    const command = rectCommand(0, 0, 2, 3);
    expect(command.primitive).toBe("quads");
    expect(command.count).toBe(4);
    expect(Array.from(command.vertices)).toEqual([0, 0, 0, 3, 2, 3, 2, 0]);
  });

  it("requires whole quads", () => {
    expect(() => quadCommand([0, 0, 1, 0, 1, 1, 0, 1, 2, 2, 3, 3])).toThrow(
      "Quad list needs a multiple of 4 vertices, got 6"
    );
    expect(quadCommand([0, 0, 1, 0, 1, 1, 0, 1]).count).toBe(4);
  });
});

describe("outlines", () => {
  it("normalizes rectangle corners", () => {
    const command = rectOutlineCommand(10, 20, 0, 5);
    expect(command.primitive).toBe("line loop");
    expect(Array.from(command.vertices)).toEqual([0, 5, 0, 20, 10, 20, 10, 5]);
  });

  it("frames a box from its origin and size", () => {
    expect(Array.from(frameCommand(1, 2, 3, 4).vertices)).toEqual([1, 2, 4, 2, 4, 6, 1, 6]);
  });
});

describe("curves", () => {
  it("fans a filled circle from its first outline vertex", () => {
    const command = circleCommand(0, 0, 10);
    expect(command.primitive).toBe("triangle fan");
    expect(command.count).toBe(33);
    expect(command.vertices).toHaveLength(66);
    expect(command.vertices[0]).toBe(10);
    expect(command.vertices[1]).toBe(0);
  });

  it("outlines a dashed circle at half density", () => {
    const command = circleOutlineCommand(0, 0, 10, { dashed: true });
    expect(command.primitive).toBe("line loop");
    expect(command.count).toBe(17);
  });

  it("passes tessellation errors through", () => {
    expect(() => ellipseOutlineCommand(0, 0, 10, 10, { da: 0.2, step: 8 })).toThrow(
      TessellationConfigError
    );
    expect(() => ngonCommand(0, 0, 1, 2)).toThrow(TessellationConfigError);
  });

  it("outlines a square as a closed loop", () => {
    const command = ngonOutlineCommand(0, 0, 1, 4, Math.PI / 4);
    expect(command.count).toBe(5);
    expect(command.vertices[0]).toBeCloseTo(Math.SQRT1_2, 6);
    expect(command.vertices[1]).toBeCloseTo(Math.SQRT1_2, 6);
  });
});

describe("gridCommand", () => {
  it("emits one line pair per grid line", () => {
    const command = gridCommand(5, 5, 100, 100, 50);
    expect(command.primitive).toBe("lines");
    expect(command.count).toBe(12);
    expect(Array.from(command.vertices)).toEqual([
      0, 0, 0, 100,
      50, 0, 50, 100,
      100, 0, 100, 100,
      5, 0, 105, 0,
      5, 50, 105, 50,
      5, 100, 105, 100,
    ]);
  });
});
