export { Logger, logger, createLogger, LogLevelSchema, type LogLevel } from './logger';
export { RegionLinkError, DecodeError, InvalidArgumentError, UnsupportedFormatError, ImageIOError } from './errors';
export { loadRuntimeConfig, configure, summarizeIssues, type RuntimeConfig } from './config';
export { partition } from './chunk';
export {
    selectExecution,
    dispatchMap,
    dispatchFlatMap,
    type ExecutionStrategy,
    type DispatchOptions,
} from './dispatch';
export { base64Encode } from './base64';
