export type * from './types/index.js';
export * from './utils/index.js';
export * from './constants.js';
export * from './schemas/config.schema.js';
export * from './schemas/memory.schema.js';
