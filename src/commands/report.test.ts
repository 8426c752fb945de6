import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import type { ArgumentsCamelCase } from 'yargs';
import { resolveReportConfig } from '../config.js';
import { MissingColumnError, exitCodeFor } from '../report/errors.js';
import { closeRunLog, openRunLog } from '../report/logger.js';
import { stripAnsi } from '../report/util.js';
import reportCommand, { runReport, type ReportArgs } from './report.js';

const PROJECTS_CSV = 'project,capex\nA,yes\nA,0\nB,5.5\n';

describe('runReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'capex-report-run-'));
    await writeFile(path.join(dir, 'data.csv'), PROJECTS_CSV, 'utf-8');
  });

  afterEach(async () => {
    closeRunLog();
    await rm(dir, { recursive: true, force: true });
  });

  function configFor(options: {
    output: string;
    groupBy?: string;
    capexColumn?: string;
    capexThreshold?: number;
  }) {
    return resolveReportConfig({
      input: path.join(dir, 'data.csv'),
      ...options,
      output: path.join(dir, options.output),
    });
  }

  it('writes a grouped report and returns the overall summary', async () => {
    const config = configFor({ output: 'report.csv', groupBy: 'project' });

    const { summary } = await runReport(config);

    expect(summary).toEqual({
      total_rows: 3,
      capex_rows: 2,
      total_capex_amount: 6.5,
    });
    expect(await readFile(config.output, 'utf-8')).toBe(
      'project,capex_count,capex_amount,total_count\nA,1,1,2\nB,1,5.5,1\n',
    );
  });

  it('writes the overall summary when the group column is absent', async () => {
    const config = configFor({ output: 'report.csv', groupBy: 'department' });

    await runReport(config);

    expect(await readFile(config.output, 'utf-8')).toBe(
      'total_rows,capex_rows,total_capex_amount\n3,2,6.5\n',
    );
  });

  it('applies the configured threshold', async () => {
    const config = configFor({ output: 'report.yaml', capexThreshold: 1 });

    const { summary } = await runReport(config);

    expect(summary).toEqual({
      total_rows: 3,
      capex_rows: 1,
      total_capex_amount: 5.5,
    });
    expect(await readFile(config.output, 'utf-8')).toBe(
      '- total_rows: 3\n  capex_rows: 1\n  total_capex_amount: 5.5\n',
    );
  });

  it('fails on a missing CAPEX column without writing output', async () => {
    const config = configFor({ output: 'report.csv', capexColumn: 'amount' });

    const failure = runReport(config);

    await expect(failure).rejects.toBeInstanceOf(MissingColumnError);
    await expect(failure).rejects.toThrow(
      "CAPEX column 'amount' not found in input",
    );
    expect(await readdir(dir)).toEqual(['data.csv']);
  });

  it('exits with status 2 for missing input and columns', async () => {
    const config = resolveReportConfig({
      input: path.join(dir, 'absent.csv'),
      output: path.join(dir, 'report.csv'),
    });

    const error: unknown = await runReport(config).catch((e: unknown) => e);

    expect(exitCodeFor(error)).toBe(2);
    expect(exitCodeFor(new MissingColumnError('capex'))).toBe(2);
    expect(exitCodeFor(new Error('disk full'))).toBe(1);
    expect(await readdir(dir)).toEqual(['data.csv']);
  });

  it('records per-group details in a verbose log', async () => {
    const logPath = path.join(dir, 'report.log');
    await openRunLog(logPath, { verbose: true });

    await runReport(configFor({ output: 'report.csv', groupBy: 'project' }));

    const log = await readFile(logPath, 'utf-8');
    expect(log).toContain('Read 3 rows with columns: project, capex');
    expect(log).toContain('Aggregated 2 groups');
    expect(log).toContain('[VERBOSE] A: 1/2 CAPEX rows, amount 1\n');
    expect(log).toContain('[VERBOSE] B: 1/1 CAPEX rows, amount 5.5\n');
  });
});

describe('report command', () => {
  let dir: string;
  let previousConfigDir: string | undefined;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'capex-report-cmd-'));
    await writeFile(path.join(dir, 'data.csv'), PROJECTS_CSV, 'utf-8');
    previousConfigDir = process.env.CAPEX_REPORT_CONFIG_DIR;
    process.env.CAPEX_REPORT_CONFIG_DIR = path.join(dir, 'config');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (previousConfigDir === undefined) {
      delete process.env.CAPEX_REPORT_CONFIG_DIR;
    } else {
      process.env.CAPEX_REPORT_CONFIG_DIR = previousConfigDir;
    }
    await rm(dir, { recursive: true, force: true });
  });

  function reportArgs(options: {
    input: string;
    output: string;
    groupBy?: string;
    capexColumn?: string;
  }): ArgumentsCamelCase<ReportArgs> {
    return {
      _: ['report'],
      $0: 'capex-report',
      input: options.input,
      output: options.output,
      'group-by': options.groupBy,
      groupBy: options.groupBy,
      'capex-column': options.capexColumn,
      capexColumn: options.capexColumn,
      'capex-threshold': undefined,
      capexThreshold: undefined,
      'sort-groups': false,
      sortGroups: false,
      log: false,
      verbose: false,
    };
  }

  function printed(stream: 'log' | 'error'): string[] {
    return vi
      .mocked(console[stream])
      .mock.calls.map(([message]) => stripAnsi(String(message)));
  }

  it('prints the summary and the output path', async () => {
    const output = path.join(dir, 'report.csv');

    await reportCommand.handler(
      reportArgs({
        input: path.join(dir, 'data.csv'),
        output,
        groupBy: 'project',
      }),
    );

    expect(printed('log')).toEqual([
      'Processed 3 rows',
      'CAPEX rows: 2',
      'Total CAPEX amount: 6.5',
      `Report written to: ${output}`,
    ]);
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('prints large totals with every digit', async () => {
    const input = path.join(dir, 'large.csv');
    await writeFile(input, 'capex\n1234567890123.45\nno\n', 'utf-8');

    await reportCommand.handler(
      reportArgs({ input, output: path.join(dir, 'report.csv') }),
    );

    expect(printed('log')).toContain('Total CAPEX amount: 1234567890123.45');
  });

  it('exits with 2 and one error line for a missing CAPEX column', async () => {
    const output = path.join(dir, 'report.csv');

    await expect(
      reportCommand.handler(
        reportArgs({
          input: path.join(dir, 'data.csv'),
          output,
          capexColumn: 'amount',
        }),
      ),
    ).rejects.toThrow('process.exit(2)');

    expect(printed('error')).toEqual([
      "✗ Error: CAPEX column 'amount' not found in input",
    ]);
    expect(printed('log')).toEqual([]);
    expect(await readdir(dir)).toEqual(['data.csv']);
  });

  it('exits with 2 for a missing input file', async () => {
    const input = path.join(dir, 'absent.csv');

    await expect(
      reportCommand.handler(
        reportArgs({ input, output: path.join(dir, 'report.csv') }),
      ),
    ).rejects.toThrow('process.exit(2)');

    expect(printed('error')).toEqual([
      `✗ Error: Input file not found: ${input}`,
    ]);
  });

  it('exits with 1 for an unsupported input format', async () => {
    await expect(
      reportCommand.handler(
        reportArgs({
          input: path.join(dir, 'data.txt'),
          output: path.join(dir, 'report.csv'),
        }),
      ),
    ).rejects.toThrow('process.exit(1)');

    expect(printed('error')).toEqual([
      '✗ Error: Unsupported file extension: .txt. Use .csv, .yaml, or .yml',
    ]);
    expect(await readdir(dir)).toEqual(['data.csv']);
  });
});
