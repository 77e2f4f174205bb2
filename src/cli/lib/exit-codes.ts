/**
 * Process exit codes and the errors that map onto them
 *
 * @module cli/lib/exit-codes
 */

import { ConfigError, DatasetError, FeedParseError, SchemaParseError } from '../../core/errors.js';
import { isTransportError } from '../../core/http-client.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
  UNKNOWN_COMMAND: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that ended a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError || error instanceof SchemaParseError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof FeedParseError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  if (error instanceof DatasetError || isTransportError(error)) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
