export * from "./assemble";
export * from "./client";
export * from "./payload";
export {
  ConfigError,
  HttpStatusError,
  IncompleteCoverageError,
  InvalidShapeError,
  MalformedLayoutError,
  MalformedPayloadError,
  OutOfBoundsError,
  type BoundsSide,
  UsageError,
} from "./core/errors";
export { computeStrides, type Shape2D, sizeOf } from "./core/shape";
export { type Config, loadConfig } from "./config";
export { createLogger, getLogLevel, type Logger, type LogLevel, setLogLevel } from "./log";
export {
  encodeNpy,
  encodeSlice,
  formatCsv,
  formatJson,
  type OutputFormat,
  type SliceSummary,
  summarize,
  writeSlice,
} from "./output";
