export const name = '@examplecheck/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';
