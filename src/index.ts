export * from "./geometry/vocabulary/keywords";
export * from "./geometry/vocabulary/schemas/primitives";
export * from "./geometry/vocabulary/schemas/config";
export * from "./geometry/vocabulary/schemas/tessellation";
export * from "./geometry/errors";
export * from "./geometry/transform";
export * from "./geometry/tessellation";
export * from "./rendering/drawCommands";
export * from "./rendering/surfaces";
export * from "./rendering/painter";
export * from "./lib/stopSignal";
export * from "./lib/stoppableLoop";
export * from "./resources/config";
export * from "./resources/surface";
export * from "./resources/painter";
export * from "./resources/backgroundLoop";
export * from "./system";
