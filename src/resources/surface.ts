import { defineResource } from "braided";
import type { DrawSurface } from "@/rendering/surfaces";

/**
 * Surface resource - owns the rendering collaborator for the system.
 */
export const createSurfaceResource = <TSurface extends DrawSurface>(
  createSurface: () => TSurface
) => {
  return defineResource({
    start: (): TSurface => {
      const surface = createSurface();
      console.log("[surface] Drawing surface ready");
      return surface;
    },
    halt: () => {
      console.log("[surface] Drawing surface released");
    },
  });
};
