export const name = '@swiftlaunch/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './concurrency';
export * from './fs/io';
export * from './fs/path';
export * from './lru-cache';
export * from './observability/event-hub';
