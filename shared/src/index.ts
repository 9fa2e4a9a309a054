export * from './sync/kinds.js';
export * from './sync/timestamps.js';
export * from './sync/dto.js';
export * from './sync/registry.js';
