/**
 * @streamgate/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';

// Time utilities
export * from './time/sleep';

// Validation utilities
export * from './validation/env-validator';
