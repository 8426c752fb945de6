import { z } from 'zod';
import { ConfigError } from './report/errors.js';
import type { PersistentConfig } from './config-manager.js';

export const DEFAULT_OUTPUT = 'capex_report.csv';
export const DEFAULT_CAPEX_COLUMN = 'capex';
export const DEFAULT_CAPEX_THRESHOLD = 0;

const ReportConfig = z.object({
  input: z.string().min(1, 'Input file path is required'),
  output: z.string().min(1, 'Output file path must not be empty'),
  capexColumn: z.string().min(1, 'CAPEX column name must not be empty'),
  capexThreshold: z.number('CAPEX threshold must be a finite number'),
  groupBy: z.string().min(1, 'Group-by column name must not be empty').optional(),
  sortGroups: z.boolean(),
  log: z.boolean(),
  verbose: z.boolean(),
});

export type ReportConfig = z.infer<typeof ReportConfig>;

/**
 * Builds the run configuration. Options given on the command line win over
 * stored defaults, which win over the built-in ones.
 *
 * @throws {ConfigError} with every validation issue listed.
 */
export function resolveReportConfig(
  cliArgs: {
    input: string;
    output?: string;
    capexColumn?: string;
    capexThreshold?: number;
    groupBy?: string;
    sortGroups?: boolean;
    log?: boolean;
    verbose?: boolean;
  },
  persisted: PersistentConfig = {},
): ReportConfig {
  const result = ReportConfig.safeParse({
    input: cliArgs.input,
    output: cliArgs.output ?? persisted.output ?? DEFAULT_OUTPUT,
    capexColumn:
      cliArgs.capexColumn ?? persisted.capexColumn ?? DEFAULT_CAPEX_COLUMN,
    capexThreshold:
      cliArgs.capexThreshold ??
      persisted.capexThreshold ??
      DEFAULT_CAPEX_THRESHOLD,
    groupBy: cliArgs.groupBy ?? persisted.groupBy,
    sortGroups: cliArgs.sortGroups ?? false,
    log: cliArgs.log ?? false,
    verbose: cliArgs.verbose ?? false,
  });

  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration:\n${z.prettifyError(result.error)}`,
    );
  }

  return result.data;
}
