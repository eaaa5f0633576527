/**
 * Profile - candidate profile loading and validation
 */

export * from './candidate-profile-loader.js';
