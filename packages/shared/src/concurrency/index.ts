export { CancellationSource, NEVER_CANCELLED, type CancellationToken } from './cancellation';
export { SerialQueue } from './serial-queue';
