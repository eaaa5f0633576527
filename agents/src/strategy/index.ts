/**
 * Strategy - application approach, timing, follow-up and advantages
 */

export * from './strategy-generator.js';
export * from './competitive-advantages.js';
