export { formatDay, resolveAsOf } from './as-of';
export { DEFAULT_CENTRAL_WAREHOUSE_MARKER, resolveEngineSettings } from './engine-settings';
export { classifyRunError, mapEngineError } from './error-mapper';
