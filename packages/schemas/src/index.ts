/**
 * @jobscope/schemas - Record schemas shared by every package
 */

export * from './enums';
export * from './candidate';
export * from './job';
export * from './company';
export * from './analysis';
export * from './application';
