export { printTable } from './table';
export { OutputRenderer } from './renderer';
export type { ResultRow, ViewLike, StatusLike, ScanLike } from './renderer';
