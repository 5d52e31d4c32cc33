import { defineResource, type StartedResource } from "braided";
import { createPainter } from "@/rendering/painter";
import type { DrawSurface } from "@/rendering/surfaces";
import type { GeometryConfigResource } from "./config";

/**
 * Painter resource
 *
 * Depends on: config (tessellation and grid settings), surface
 */
export const painter = defineResource({
  dependencies: ["config", "surface"],
  start: ({
    config,
    surface,
  }: {
    config: GeometryConfigResource;
    surface: DrawSurface;
  }) => {
    return createPainter(surface, config.getConfig);
  },
  halt: () => {},
});

export type PainterResource = StartedResource<typeof painter>;
