export type * from './config.js';
export type * from './model.js';
export type * from './memory.js';
export type * from './question.js';
export type * from './tool.js';
export type * from './trace.js';
export type * from './delivery.js';
