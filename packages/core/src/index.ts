export * from './expression';
export * from './shape';
export * from './tracker';
export * from './graph';
export * from './errors';
export { Logger, isLogLevel, type ChildLogger, type LogHandler, type LogLevel, type LoggerConfig } from './logger';
export {
  DEFAULT_UNBOUNDED_SENTINEL,
  resolveGraphOptions,
  type GraphOptions,
  type ResolvedGraphOptions,
} from './config';
