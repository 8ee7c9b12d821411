export type * from './message.js';
export type * from './artifact.js';
