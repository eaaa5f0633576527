/**
 * Extract - raw posting documents to structured JobPosting records
 */

export * from './job-posting-extractor.js';
export * from './document.js';
export * from './text.js';
export * from './json-ld.js';
export * from './field-rules.js';
export * from './requirements.js';
export * from './classifiers.js';
