export type { CoreInstrumentationOptions, CoreInstrumentOptions } from "./metrics.js";
export { getCoreMeter, createCoreCounter, createCoreHistogram } from "./metrics.js";

export type { CoreLogger, CoreLoggerOptions, CoreLogLevel, CoreLogSink, LogFields } from "./logging.js";
export { CORE_LOG_LEVELS, REDACTED_FIELDS, createCoreLogger, createSilentLogger } from "./logging.js";

export type { CoreTracer } from "./tracing.js";
export { getCoreTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
