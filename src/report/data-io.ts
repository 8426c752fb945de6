import { readFile, writeFile, rename, mkdtemp, rm } from 'fs/promises';
import Papa from 'papaparse';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { InputNotFoundError, InputParseError } from './errors.js';
import { isNodeError } from './util.js';
import type { CellValue, ReportTable, Row, Table } from './types.js';

const SUPPORTED_EXTENSIONS = '.csv, .yaml, or .yml';

// Any JS number, `.nan` and `.inf` included: the normalizer maps those to 0
const YamlNumber = z.custom<number>((value) => typeof value === 'number');

const YamlRows = z.array(
  z.record(
    z.string(),
    z.union([z.string(), YamlNumber, z.boolean(), z.null()]),
  ),
);

/**
 * Atomically writes a file by writing to a temp file first, then renaming.
 * The temp directory sits beside the target so the rename never crosses
 * filesystems.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
): Promise<void> {
  const dir = await mkdtemp(
    path.join(path.dirname(path.resolve(filePath)), '.capex-report-'),
  );
  const tmpPath = path.join(dir, path.basename(filePath));
  try {
    await writeFile(tmpPath, data, 'utf-8');
    await rename(tmpPath, filePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

async function readInput(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new InputNotFoundError(filePath);
    }
    throw error;
  }
}

/**
 * Parses a data file (CSV or YAML) into a table.
 *
 * CSV cells stay text, with empty cells read as missing. YAML must hold a
 * list of records whose values are scalars.
 */
export async function parseDataFile(filePath: string): Promise<Table> {
  const extension = path.extname(filePath).toLowerCase();
  if (extension !== '.csv' && extension !== '.yml' && extension !== '.yaml') {
    throw new InputParseError(
      `Unsupported file extension: ${extension || '(none)'}. Use ${SUPPORTED_EXTENSIONS}`,
    );
  }

  const fileContent = await readInput(filePath);
  return extension === '.csv' ? parseCsv(fileContent) : parseYaml(fileContent);
}

export function parseCsv(content: string): Table {
  const parseResult = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: true,
  });
  // A single-column file has no delimiter to detect; papaparse defaults to ','.
  // Short rows are kept, their trailing cells read as missing.
  const errors = parseResult.errors.filter(
    (e) => e.type !== 'Delimiter' && e.code !== 'TooFewFields',
  );
  if (errors.length > 0) {
    const [first] = errors;
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : '';
    throw new InputParseError(`CSV parsing error${where}: ${first.message}`);
  }

  const columns = parseResult.meta.fields ?? [];
  const rows = parseResult.data.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const column of columns) {
      const value = record[column];
      row[column] = value === undefined || value === '' ? null : value;
    }
    return row;
  });
  return { columns, rows };
}

export function parseYaml(content: string): Table {
  let data: unknown;
  try {
    // Core schema keeps timestamps as text
    data = yaml.load(content, { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputParseError(`YAML parsing error: ${message}`);
  }

  const result = YamlRows.safeParse(data ?? []);
  if (!result.success) {
    throw new InputParseError(
      `YAML content must be a list of records with scalar values:\n${z.prettifyError(result.error)}`,
    );
  }

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of result.data) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  const rows: Row[] = result.data;
  return { columns, rows };
}

/**
 * Flattens the report into one array of cells per record, in column order.
 * Keys that differ only in type (`1` and `"1"` from YAML) stay separate
 * groups but render as identical CSV cells.
 */
export function reportRows(report: ReportTable): CellValue[][] {
  if (report.kind === 'overall') {
    return report.records.map((summary) => [
      summary.total_rows,
      summary.capex_rows,
      summary.total_capex_amount,
    ]);
  }
  return report.records.map((group) => [
    group.group_key,
    group.capex_count,
    group.capex_amount,
    group.total_count,
  ]);
}

/**
 * Serializes the report to a string (CSV or YAML) chosen by extension.
 */
export function serializeReport(report: ReportTable, filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  const columns = [...report.columns];
  const rows = reportRows(report);

  if (extension === '.csv') {
    return (
      Papa.unparse(
        { fields: columns, data: rows },
        { newline: '\n', header: true },
      ) + '\n'
    );
  } else if (extension === '.yml' || extension === '.yaml') {
    const records = rows.map((cells) =>
      Object.fromEntries(columns.map((column, i) => [column, cells[i] ?? null])),
    );
    return yaml.dump(records, { lineWidth: -1 });
  } else {
    throw new Error(
      `Unsupported file extension: ${extension || '(none)'}. Use ${SUPPORTED_EXTENSIONS}`,
    );
  }
}

export async function writeReport(
  report: ReportTable,
  filePath: string,
): Promise<void> {
  await atomicWriteFile(filePath, serializeReport(report, filePath));
}
