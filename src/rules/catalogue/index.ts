/**
 * Rule catalogue
 *
 * @module catalogue
 */

export * from './contest-rules.js';
export * from './election-rules.js';
export * from './gpunit-rules.js';
export * from './identifier-rules.js';
export * from './ocd-rules.js';
export * from './party-rules.js';
export * from './person-office-rules.js';
export * from './schema-rules.js';
export * from './text-rules.js';
export * from './uri-rules.js';
