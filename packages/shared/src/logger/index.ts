export { ConsoleLogger } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
export type { Logger, LoggerOptions, MaybePromise } from './types';
