export const name = '@swiftlaunch/core';

export * from './config/loader';
export * from './registry';
export * from './exec/template';
export * from './exec/executor';
export * from './launcher/history';
export * from './launcher/launcher-app';
export * from './query/normalize';
export * from './query/fanout';
export * from './query/session';
export * from './query/session-manager';
export * from './daemon';
