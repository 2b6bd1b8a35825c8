export const name = '@swiftlaunch/daemon';

export * from './protocol';
export * from './handler';
export * from './server';
export * from './client';
export * from './service';
