export { generateRunId, isUuid } from './id.js';
export {
  epochMicros,
  formatMicrosIso,
  formatMicrosCompact,
  parseMicrosCompact,
} from './clock.js';
export {
  RuntrailError,
  ConfigError,
  TransportError,
  TracingDisabledError,
  SerializationError,
  RunValidationError,
  RunAlreadyFinalizedError,
  ScopeConsumedError,
  OrderingKeyError,
  errorMessage,
} from './errors.js';
export {
  isJsonObject,
  toJsonValue,
  ensureObject,
  ensureInputsObject,
  ensureOutputsObject,
} from './serialization.js';
export { validateRunCreate } from './validation.js';
export { tokenMetrics, costMetrics, mergeMetrics } from './metrics.js';
