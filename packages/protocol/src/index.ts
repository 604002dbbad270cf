// Re-export payload parsing helpers
export * from './payload.js';

// Re-export task types, schemas and payload parsers
export * from './task.js';

// Re-export account payloads
export * from './account.js';

// Re-export the response envelope
export * from './envelope.js';
