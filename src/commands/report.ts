import chalk from 'chalk';
import * as path from 'path';
import { loadPersistentConfig } from '../config-manager.js';
import { resolveReportConfig, type ReportConfig } from '../config.js';
import { aggregate } from '../report/aggregator.js';
import { parseDataFile, writeReport } from '../report/data-io.js';
import { exitCodeFor } from '../report/errors.js';
import {
  logDebug,
  logError,
  logInfoTee,
  logVerbose,
  openRunLog,
} from '../report/logger.js';
import type { AggregationResult } from '../report/types.js';
import type { Command } from './types.js';

export interface ReportArgs {
  input: string;
  output?: string;
  'group-by'?: string;
  'capex-column'?: string;
  'capex-threshold'?: number;
  'sort-groups': boolean;
  log: boolean;
  verbose: boolean;
}

const command: Command<ReportArgs> = {
  command: 'report',
  describe: 'Classify rows as CAPEX and write a summary report',

  builder: (yargs) => {
    return yargs
      .option('input', {
        alias: 'i',
        describe: 'Input file path (CSV or YAML)',
        type: 'string',
        demandOption: true,
      })
      .option('output', {
        alias: 'o',
        describe: 'Output file path (CSV or YAML) [default: capex_report.csv]',
        type: 'string',
      })
      .option('group-by', {
        alias: 'g',
        describe: 'Optional column to group by (e.g. project, department)',
        type: 'string',
      })
      .option('capex-column', {
        alias: 'c',
        describe: 'Name of the CAPEX column [default: capex]',
        type: 'string',
      })
      .option('capex-threshold', {
        alias: 't',
        describe: 'Values strictly above the threshold are CAPEX [default: 0]',
        type: 'number',
      })
      .option('sort-groups', {
        describe: 'Sort groups by key instead of first-seen order',
        type: 'boolean',
        default: false,
      })
      .option('log', {
        describe: 'Write a log file beside the output',
        type: 'boolean',
        default: false,
      })
      .option('verbose', {
        describe: 'Record per-group details in the log file',
        type: 'boolean',
        default: false,
      })
      .example(
        '$0 report -i data.csv -o report.csv',
        'Summarize all CAPEX rows',
      )
      .example(
        '$0 report -i data.csv -o report.csv -g project',
        'Summarize CAPEX per project',
      )
      .example(
        '$0 report -i data.yaml -o report.yaml -c amount -t 1000',
        'Treat amounts above 1000 as CAPEX',
      );
  },

  handler: async (argv) => {
    try {
      const config = resolveReportConfig(
        {
          input: argv.input,
          output: argv.output,
          groupBy: argv['group-by'],
          capexColumn: argv['capex-column'],
          capexThreshold: argv['capex-threshold'],
          sortGroups: argv['sort-groups'],
          log: argv.log,
          verbose: argv.verbose,
        },
        await loadPersistentConfig(),
      );

      if (config.log) {
        await openRunLog(getLogFilePath(config.output), {
          verbose: config.verbose,
        });
      }

      const result = await runReport(config);
      await printSummary(result, config.output);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await logError(message);
      process.exit(exitCodeFor(error));
    }
  },
};

export default command;

/**
 * Loads the input, aggregates it and writes the report. Nothing is written
 * when loading or aggregation fails.
 */
export async function runReport(
  config: ReportConfig,
): Promise<AggregationResult> {
  await logDebug(`Input file: ${config.input}`);
  await logDebug(`Output file: ${config.output}`);
  await logDebug(
    `CAPEX column: ${config.capexColumn}, threshold: ${config.capexThreshold}`,
  );

  const table = await parseDataFile(config.input);
  await logDebug(
    `Read ${table.rows.length} rows with columns: ${table.columns.join(', ')}`,
  );

  if (config.groupBy && !table.columns.includes(config.groupBy)) {
    await logDebug(
      `Group-by column "${config.groupBy}" not found, writing overall summary`,
    );
  }

  const result = aggregate(table, {
    capexColumn: config.capexColumn,
    threshold: config.capexThreshold,
    groupBy: config.groupBy,
    sortGroups: config.sortGroups,
  });

  if (result.report.kind === 'grouped') {
    await logDebug(`Aggregated ${result.report.records.length} groups`);
    for (const group of result.report.records) {
      await logVerbose(
        `${String(group.group_key)}: ${group.capex_count}/${group.total_count} CAPEX rows, amount ${group.capex_amount}`,
      );
    }
  }

  await writeReport(result.report, config.output);
  await logDebug('Report written');
  return result;
}

async function printSummary(
  { summary }: AggregationResult,
  outputPath: string,
): Promise<void> {
  await logInfoTee(`Processed ${summary.total_rows} rows`);
  await logInfoTee(`CAPEX rows: ${summary.capex_rows}`);
  await logInfoTee(
    `Total CAPEX amount: ${summary.total_capex_amount}`,
  );
  await logInfoTee(chalk.green(`Report written to: ${outputPath}`));
}

function getLogFilePath(outputPath: string): string {
  const outputDir = path.dirname(outputPath);
  const outputName = path.basename(outputPath, path.extname(outputPath));
  return path.join(outputDir, `${outputName}.log`);
}
