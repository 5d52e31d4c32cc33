import type { StartedSystem } from "braided";
import type { GeometryConfig } from "@/geometry/vocabulary/schemas/config";
import type { DrawSurface } from "@/rendering/surfaces";
import { createRecordingSurface } from "@/rendering/surfaces";
import { createGeometryConfigResource } from "./resources/config";
import { createSurfaceResource } from "./resources/surface";
import { painter } from "./resources/painter";
import { backgroundLoop } from "./resources/backgroundLoop";

type GeometrySystemOptions<TSurface extends DrawSurface> = {
  config?: Partial<GeometryConfig>;
  createSurface: () => TSurface;
};

export const createGeometrySystemConfig = <TSurface extends DrawSurface>(
  options: GeometrySystemOptions<TSurface>
) => ({
  config: createGeometryConfigResource(options.config),
  surface: createSurfaceResource(options.createSurface),
  painter,
  backgroundLoop,
});

/** Headless system: draws into an in-memory recording surface. */
export const createHeadlessSystemConfig = (config?: Partial<GeometryConfig>) =>
  createGeometrySystemConfig({ config, createSurface: createRecordingSurface });

export type HeadlessSystemConfig = ReturnType<typeof createHeadlessSystemConfig>;
export type HeadlessSystem = StartedSystem<HeadlessSystemConfig>;
