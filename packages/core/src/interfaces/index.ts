export type { Logger } from './logger.js';
export type { TracingOptions } from './tracing-options.js';
