export { createLogger, setLogLevel, log, type Logger, type LogLevel } from './logger';
export { bigIntReplacer, safeStringify } from './serialization';
