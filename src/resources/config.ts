import { defineResource, type StartedResource } from "braided";
import {
  defaultGeometryConfig,
  geometryConfigSchema,
  type GeometryConfig,
} from "@/geometry/vocabulary/schemas/config";
import { createAtom } from "@/lib/state";

/**
 * Geometry config resource. Overrides are merged over the defaults and
 * validated once at definition time; a bad override throws the ZodError.
 */
export const createGeometryConfigResource = (
  overrides: Partial<GeometryConfig> = {}
) => {
  const initialConfig = geometryConfigSchema.parse({
    ...defaultGeometryConfig,
    ...overrides,
  });

  return defineResource({
    start: () => {
      const config = createAtom<GeometryConfig>(initialConfig);

      const api = {
        getConfig: () => config.get(),
        updateConfig: (patch: Partial<GeometryConfig>) =>
          config.set(geometryConfigSchema.parse({ ...config.get(), ...patch })),
        reset: () => config.set(initialConfig),
        watch: config.subscribe,
      };

      return api;
    },
    halt: () => {},
  });
};

export type GeometryConfigResource = StartedResource<
  ReturnType<typeof createGeometryConfigResource>
>;
