import { defineResource, type StartedResource } from "braided";
import {
  createStoppableLoop,
  type StoppableLoop,
} from "@/lib/stoppableLoop";
import type { GeometryConfigResource } from "./config";

/**
 * Background Loop Resource
 *
 * Spawns cooperative polling loops and stops them all when the system halts.
 * Nothing in the geometry path uses it; collaborators that need a polling
 * task on the side ask it for one.
 *
 * Depends on: config (poll interval)
 */
export const backgroundLoop = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: GeometryConfigResource }) => {
    const loops = new Set<StoppableLoop>();

    const api = {
      spawn: (
        onTick: () => void = () => console.debug("[backgroundLoop] running"),
        intervalMs: number = config.getConfig().loopIntervalMs
      ): StoppableLoop => {
        const loop = createStoppableLoop({ intervalMs, onTick });
        loops.add(loop);
        loop.start();
        return loop;
      },
      count: () => loops.size,
      joinAll: async () => {
        const pending = Array.from(loops);
        loops.clear();
        await Promise.all(pending.map((loop) => loop.join()));
      },
    };

    return api;
  },
  halt: async (loops) => {
    await loops.joinAll();
  },
});

export type BackgroundLoopResource = StartedResource<typeof backgroundLoop>;
