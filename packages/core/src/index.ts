export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './values.js';
export * from './schema.js';
export * from './schemas.js';
export * from './inference.js';
export * from './prune.js';
export * from './convert.js';
export * from './partition.js';
export * from './filter.js';
export { MemoSlot } from './utils/memo.js';
