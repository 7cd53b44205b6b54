export * from './utils/decimal-utils.js';
export * from './utils/error-utils.js';
export * from './utils/zod-utils.js';
export * from './schemas/primitives.js';
