/**
 * Validator Error Types
 *
 * Fatal conditions that stop a run, or a rule's setup, before any issue can
 * be reported. Rule findings are never thrown; they go through the issue
 * collector (see issues.ts).
 */

/**
 * Feed document could not be read or is not well-formed XML.
 *
 * RECOVERY:
 * - Check the reported parser messages for the first malformed line
 * - Confirm the XML declaration names the encoding the bytes use
 */
export class FeedParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly parserMessages: readonly string[] = []
  ) {
    super(message);
    this.name = 'FeedParseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FeedParseError);
    }
  }

  getSummary(): string {
    const lines = [`${this.message}: ${this.filePath}`];
    for (const parserMessage of this.parserMessages.slice(0, 5)) {
      lines.push(`  - ${parserMessage}`);
    }
    if (this.parserMessages.length > 5) {
      lines.push(`  ... and ${this.parserMessages.length - 5} more`);
    }
    return lines.join('\n');
  }
}

/**
 * Schema document is malformed, or declares types it never defines.
 */
export class SchemaParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly unresolvedTypes: readonly string[] = []
  ) {
    super(message);
    this.name = 'SchemaParseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaParseError);
    }
  }
}

/**
 * Reference dataset could not be fetched, read or cached.
 */
export class DatasetError extends Error {
  constructor(
    message: string,
    public readonly countryCode: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatasetError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetError);
    }
  }
}

/**
 * Downloaded dataset failed verification. The previous cache file is
 * untouched when this is thrown.
 */
export class DatasetVerificationError extends DatasetError {
  constructor(message: string, countryCode: string) {
    super(message, countryCode);
    this.name = 'DatasetVerificationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetVerificationError);
    }
  }
}

/**
 * Invalid configuration file, environment variable or CLI option.
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}
