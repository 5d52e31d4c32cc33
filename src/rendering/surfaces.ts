import type { DrawCommand } from "./drawCommands";

/**
 * Drawing surface - the rendering collaborator
 *
 * Whatever actually puts pixels on screen (a regl context, a canvas, a test
 * recorder) implements this. Geometry code never reaches for an ambient
 * context; the surface is always handed in.
 */
export interface DrawSurface {
  submit: (command: DrawCommand) => void;
}

export interface RecordingSurface extends DrawSurface {
  commands: () => DrawCommand[];
  clear: () => void;
}

/**
 * In-memory surface that keeps every submitted command in order.
 * Used for headless runs and tests.
 */
export const createRecordingSurface = (): RecordingSurface => {
  const recorded: DrawCommand[] = [];

  return {
    submit: (command) => {
      recorded.push(command);
    },
    commands: () => [...recorded],
    clear: () => {
      recorded.length = 0;
    },
  };
};
