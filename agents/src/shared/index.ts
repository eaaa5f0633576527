export * from './base-agent.js';
export * from './types.js';
export * from './agent-logs.js';
export * from './terms.js';
