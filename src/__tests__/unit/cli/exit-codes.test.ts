/**
 * Exit code mapping tests
 */

import { describe, it, expect } from 'vitest';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import { ConfigError, DatasetError, DatasetVerificationError, FeedParseError, SchemaParseError } from '../../../core/errors.js';
import { HTTPError, HTTPNetworkError, HTTPTimeoutError } from '../../../core/http-client.js';

describe('exitCodeFor', () => {
  it('maps configuration and schema problems to the config code', () => {
    expect(exitCodeFor(new ConfigError('bad option', 'cli'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(new SchemaParseError('bad schema', 'a.xsd'))).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  it('maps an unreadable feed to the data integrity code', () => {
    expect(exitCodeFor(new FeedParseError('bad feed', 'feed.xml'))).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
  });

  it('maps dataset and transport failures to the network code', () => {
    expect(exitCodeFor(new DatasetError('offline', 'us'))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new DatasetVerificationError('corrupt', 'us'))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new HTTPNetworkError('https://example.test', new Error('reset')))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new HTTPTimeoutError('https://example.test', 10))).toBe(EXIT_CODES.NETWORK_ERROR);
  });

  it('treats anything else as an error exit', () => {
    expect(exitCodeFor(new HTTPError('HTTP 404: Not Found', 404, 'https://example.test'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor(new Error('unexpected'))).toBe(EXIT_CODES.ERRORS);
  });
});
