export * from './domains.js';
export * from './table.js';
