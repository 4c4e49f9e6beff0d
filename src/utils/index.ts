/**
 * Utility functions for logging, errors, and subprocesses
 */

export { getLogger } from './logger';

export { InvalidInputError, DownloadFailedError, handleError } from './errors';
