/**
 * List Rules Command
 *
 * Usage:
 *   feed-validator list-rules [--rule-set <name>]
 *
 * @module cli/commands/list-rules
 */

import { RULES, selectRules, type RuleSetName } from '../../rules/registry.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatTable, printOutput, type TableColumn } from '../lib/output.js';
import type { CommandContext } from './validate.js';

export interface ListRulesOptions {
  /** Only rules of this set; every rule when absent */
  readonly ruleSet?: RuleSetName;
}

interface RuleRow {
  readonly id: string;
  readonly scope: string;
  readonly description: string;
}

const RULE_COLUMNS: TableColumn<RuleRow>[] = [
  { key: 'id', header: 'Rule' },
  { key: 'scope', header: 'Feeds' },
  { key: 'description', header: 'Checks' },
];

export async function listRulesCommand(options: ListRulesOptions, context: CommandContext): Promise<ExitCode> {
  const print = context.print ?? printOutput;
  const definitions = options.ruleSet === undefined ? RULES : selectRules({ ruleSet: options.ruleSet });
  const rows: RuleRow[] = definitions.map(({ id, scope, description }) => ({ id, scope, description }));

  print(context.config.json ? formatJson(rows) : formatTable(rows, RULE_COLUMNS));
  return EXIT_CODES.SUCCESS;
}
