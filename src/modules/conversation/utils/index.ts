export { KeyedMutex } from './keyed-mutex';
export type { KeyedMutexOptions } from './keyed-mutex';
