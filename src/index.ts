export * from "./graph/model.js";
export * from "./graph/weights.js";
export * from "./graph/errors.js";
export * from "./graph/render.js";
export * from "./algorithms/eulerian.js";
export * from "./algorithms/minHeap.js";
export * from "./algorithms/dijkstra.js";
export * from "./io/edgeList.js";
export { StructuredLogger, LOG_LEVELS, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { loadSettings, type GraphSettings } from "./config/settings.js";
export { describeError, type NormalisedError } from "./errors.js";
