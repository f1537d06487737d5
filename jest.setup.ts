/**
 * Jest setup file.
 * Runs before each test file so that config and chalk read a quiet, colourless environment.
 */

process.env.LOG_LEVEL = 'silent';
process.env.FORCE_COLOR = '0';

export {};
