export const name = '@swiftlaunch/catalog';

export * from './entry';
export * from './scanner';
export * from './icons/resolver';
export * from './indexing/store';
export * from './indexing/cache';
export * from './indexing/indexer';
export * from './search/score';
export * from './search/top-k';
export * from './search/matcher';
export * from './watch/watcher';
