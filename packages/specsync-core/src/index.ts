export * from "./model/SpecDocument.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./parser.js";
export * from "./matcher.js";
export * from "./scanner.js";
export * from "./traceability.js";
export * from "./writers/matrix.js";
export * from "./writers/status.js";
export * from "./writers/architecture.js";
export * from "./compose.js";
export * from "./validate.js";
export * from "./sync.js";
