import { writeFile, appendFile } from 'fs/promises';
import chalk from 'chalk';
import { stripAnsi } from './util.js';

/**
 * Where the current report run records its audit trail. Console output is
 * unaffected; without a run log only the console is written.
 */
type RunLog = {
  path: string;
  verbose: boolean;
};

let runLog: RunLog | null = null;

/**
 * Starts a fresh run log, truncating any log left by an earlier report.
 */
export async function openRunLog(
  path: string,
  options: { verbose?: boolean } = {},
): Promise<void> {
  runLog = { path, verbose: options.verbose ?? false };
  await writeFile(path, '', 'utf-8');
}

export function closeRunLog(): void {
  runLog = null;
}

/**
 * Appends a timestamped line to the run log. Colour codes are stripped.
 */
export async function logDebug(message: string): Promise<void> {
  if (!runLog) return;

  const line = `[${new Date().toISOString()}] ${stripAnsi(message)}\n`;
  try {
    await appendFile(runLog.path, line, 'utf-8');
  } catch (error) {
    // A broken log file must not fail the report
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Failed to write to log file: ${errorMsg}`));
  }
}

export function logInfo(message: string): void {
  console.log(message);
}

/**
 * Prints to the console and records the trimmed message in the run log.
 */
export async function logInfoTee(message: string): Promise<void> {
  logInfo(message);

  const trimmed = message.trim();
  if (trimmed) {
    await logDebug(trimmed);
  }
}

/**
 * One-line error on stderr, also kept in the run log.
 */
export async function logError(message: string): Promise<void> {
  console.error(`${chalk.red('✗ Error:')} ${message}`);
  await logDebug(`ERROR: ${message}`);
}

/**
 * Per-group detail, recorded only when the run log is verbose.
 */
export async function logVerbose(message: string): Promise<void> {
  if (!runLog?.verbose) return;
  await logDebug(`[VERBOSE] ${message}`);
}
