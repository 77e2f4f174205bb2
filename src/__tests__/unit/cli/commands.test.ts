/**
 * validate and list-rules command tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { listRulesCommand } from '../../../cli/commands/list-rules.js';
import { validateCommand, type CommandContext } from '../../../cli/commands/validate.js';
import { loadConfig, type ConfigOverrides } from '../../../cli/lib/config.js';
import { EXIT_CODES } from '../../../cli/lib/exit-codes.js';
import { CLILogger } from '../../../cli/lib/logger.js';
import { ConfigError } from '../../../core/errors.js';

const XSD_PATH = fileURLToPath(new URL('../../fixtures/mini-election.xsd', import.meta.url));
const FEED_PATH = fileURLToPath(new URL('../../fixtures/sample-feed.xml', import.meta.url));
const OCD_CSV_PATH = fileURLToPath(new URL('../../fixtures/country-us.csv', import.meta.url));

describe('commands', () => {
  let dir: string;
  let output: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'feed-validator-cli-'));
    output = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function context(overrides: ConfigOverrides = {}): Promise<CommandContext> {
    const config = await loadConfig({ env: {}, cwd: dir, overrides: { ocdIdFile: OCD_CSV_PATH, ...overrides } });
    return {
      config,
      logger: new CLILogger({ level: 'error', json: false }, () => undefined),
      print: (text) => output.push(text),
    };
  }

  describe('validate', () => {
    it('passes a clean feed', async () => {
      const code = await validateCommand({ feed: FEED_PATH, xsd: XSD_PATH }, await context());

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output).toEqual([
        [
          'Feed contents',
          '  Party: 1',
          '  Person: 1',
          '  Candidate: 0',
          '  Office: 0',
          '  GpUnit: 1',
          '  Contest: 0',
          '',
          'Validation passed: 0 errors, 0 warnings, 0 info',
        ].join('\n'),
      ]);
    });

    it('exits with the warnings code when only warnings are found', async () => {
      const datasetPath = join(dir, 'country-us.csv');
      await writeFile(datasetPath, 'id,name\nocd-division/country:us,United States\n');

      const code = await validateCommand(
        { feed: FEED_PATH, xsd: XSD_PATH, stats: false },
        await context({ ocdIdFile: datasetPath })
      );

      expect(code).toBe(EXIT_CODES.WARNINGS);
      expect(output).toEqual([
        [
          'WARNINGS (1)',
          '  [GpUnitOcdId] line 8: The OCD ID ocd-division/country:us/state:va of GpUnit ru1 is not valid',
          '',
          'Validation passed: 0 errors, 1 warnings, 0 info',
        ].join('\n'),
      ]);
    });

    it('exits with the errors code when an override raises a warning', async () => {
      const datasetPath = join(dir, 'country-us.csv');
      await writeFile(datasetPath, 'id,name\nocd-division/country:us,United States\n');

      const code = await validateCommand(
        { feed: FEED_PATH, xsd: XSD_PATH },
        await context({ ocdIdFile: datasetPath, severity: { GpUnitOcdId: 'error' } })
      );

      expect(code).toBe(EXIT_CODES.ERRORS);
    });

    it('writes a JSON report', async () => {
      await validateCommand({ feed: FEED_PATH, xsd: XSD_PATH, stats: false }, await context({ json: true }));

      const report: unknown = JSON.parse(output.join(''));
      expect(report).toMatchObject({ passed: true, counts: { error: 0, warning: 0, info: 0 }, issues: [] });
      expect(report).not.toHaveProperty('stats');
    });

    it('rejects unknown rule ids before reading anything', async () => {
      const failure = await validateCommand(
        { feed: join(dir, 'missing.xml'), xsd: XSD_PATH, include: ['NoSuchRule'] },
        await context()
      ).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ConfigError);
      expect(failure).toMatchObject({ message: 'Unknown rule ids: NoSuchRule. Run list-rules to see them.' });
    });

    it('reports an unreadable dataset against the rules that need it', async () => {
      await validateCommand(
        { feed: FEED_PATH, xsd: XSD_PATH, exclude: ['GpUnitOcdId'] },
        await context({ json: true, ocdIdFile: join(dir, 'absent.csv') })
      );

      const report: unknown = JSON.parse(output.join(''));
      expect(report).toMatchObject({
        passed: false,
        issues: [
          {
            ruleId: 'ElectoralDistrictOcdId',
            severity: 'error',
            message: `Rule ElectoralDistrictOcdId could not be set up: Could not read OCD dataset ${join(dir, 'absent.csv')}`,
          },
        ],
      });
    });
  });

  describe('list-rules', () => {
    it('prints a table of one rule set', async () => {
      const code = await listRulesCommand({ ruleSet: 'officeholder' }, await context());

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const lines = output.join('\n').split('\n');
      expect(lines).toHaveLength(2 + 39);
      expect(lines[0]?.startsWith('Rule ')).toBe(true);
    });

    it('lists every rule as JSON', async () => {
      await listRulesCommand({}, await context({ json: true }));

      const rows: unknown = JSON.parse(output.join(''));
      expect(Array.isArray(rows) ? rows.length : 0).toBe(51);
      expect(Array.isArray(rows) ? rows[0] : null).toEqual({
        id: 'Schema',
        scope: 'common',
        description: 'Feed conforms to the XSD',
      });
    });
  });
});
