export * from './common.js';
export * from './memory.js';
export * from './conversation.js';
export * from './webhook.js';
