export * from './bson.js';
export * from './store.js';
export * from './connection.js';
export * from './translate.js';
export * from './executor.js';
export * from './relation.js';
