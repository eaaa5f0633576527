/**
 * Apply - tailored application content from a finished analysis
 */

export * from './application-writer.js';
export * from './cover-letter-templates.js';
