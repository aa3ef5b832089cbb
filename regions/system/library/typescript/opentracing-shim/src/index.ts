export { toLowerBase16, renderId } from './id-render.js';
export { classifyValue, attributeFromValue, stringFromValue, type LegacyValue } from './value.js';
export { SpanContextShim, type BaggageVisitor } from './span-context-shim.js';
export { SpanShim, type EventEntry, type SpanShimOptions } from './span-shim.js';
export { TracerShim, createTracerShim, type TracerShimOptions } from './tracer-shim.js';
export { ContextCell } from './context-cell.js';
export { toHrTime } from './time.js';
export { ShimError, type ShimErrorCode } from './error.js';
export {
  ShimConfigSchema,
  LogConfigSchema,
  loadConfig,
  type ShimConfig,
  type LogConfig,
} from './config.js';
export { createLogger, spanLogger, silentLogger } from './logger.js';
export {
  ERROR_TAG,
  EVENT_FIELD,
  DEFAULT_EVENT_NAME,
  EXCEPTION_EVENT_NAME,
  EXCEPTION_FIELD_KEYS,
} from './constants.js';
