export * from './enums.js';
export * from './battle-session.js';
