// Re-export all shared types
export * from './transcript.js';
export * from './quality.js';
export * from './survey.js';
export * from './api.js';
export * from './utilities.js';
