export * from './constants.js';
export * from './types/render.js';
export * from './types/position.js';
