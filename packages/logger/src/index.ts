export {
  type ConsoleMethod,
  type ConsoleTarget,
  redirectConsole,
} from "./adapters/console/console-redirect"
export {
  createNullLogger,
  disabledInfoLogger,
  NoopInfoLogger,
  NullLogger,
} from "./adapters/null/null-logger"
export {
  customLevels,
  defaultOpenSink,
  type LoggerDeps,
  type PinoEngine,
} from "./adapters/pino/pino-engine"
export { createLogger, PinoInfoLogger, PinoLogger } from "./adapters/pino/pino-logger"
export { LogWriter, type LogWriterSeverity } from "./adapters/stream/log-writer"
export { contextFields, currentLogContext, runWithLogContext } from "./core/context"
export * from "./core/default-logger"
export { LoggerBuildError, LogOptionsError, type LogOptionsErrorCode, PanicError } from "./core/errors"
export { field, isField } from "./core/fields"
export { type LoadLoggerOptions, loadLoggerOptions } from "./core/load-options"
export { parseSeverity, severityForVerbosity } from "./core/levels"
export {
  newOptions,
  optionsToString,
  parseFormat,
  parseOptions,
  type SerializedLoggerOptions,
  validateOptions,
} from "./core/options"
export type { Field, FieldType } from "./ports/field"
export {
  type ContextKey,
  ContextKeys,
  type LogContextSource,
  type LogContextValues,
} from "./ports/log-context"
export {
  type CallSeverity,
  type EscalatingSeverity,
  type Severity,
  severityNames,
  Verbosity,
} from "./ports/log-level"
export type { InfoLogger, Logger } from "./ports/logger"
export type { LogFormat, LoggerOptions } from "./ports/logger-options"
export type { LogSink } from "./ports/sink"
