/**
 * Core module exports for @weft/core
 *
 * This package provides the ambient pieces every weft package shares:
 * - Configuration (env, config files, programmatic)
 * - Scoped logging
 * - Runtime safety primitives (invariant, unreachable)
 * - Identifier hygiene for generated code
 */

// Runtime Safety Primitives
export { invariant, unreachable, InvariantError } from "./safety.js";

// Configuration System
export { config, defineConfig, type WeftConfig, type CompileConfig } from "./config.js";

// Logging
export { createLogger, consoleSink, type Logger, type LogLevel, type LogSink } from "./logger.js";

// Hygiene
export { HygieneContext } from "./hygiene.js";
