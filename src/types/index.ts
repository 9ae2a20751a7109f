export * from './enums.js';
export * from './parsed-query.js';
