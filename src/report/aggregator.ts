import { isCapex, normalize } from './normalizer.js';
import { MissingColumnError } from './errors.js';
import {
  GROUP_VALUE_COLUMNS,
  OVERALL_COLUMNS,
  type AggregationResult,
  type CellValue,
  type GroupKey,
  type GroupSummary,
  type ReportTable,
  type Summary,
  type Table,
} from './types.js';

export interface AggregateOptions {
  capexColumn: string;
  /** Amounts strictly above this are CAPEX. Defaults to 0. */
  threshold?: number;
  /** Column to group by. Ignored when the table has no such column. */
  groupBy?: string;
  /** Sort groups by key instead of keeping first-seen order. */
  sortGroups?: boolean;
}

type GroupAccumulator = Omit<GroupSummary, 'group_key'>;

/**
 * Classifies every row of the table and summarizes the CAPEX rows, overall
 * and, when `groupBy` names a column of the table, per group.
 *
 * @throws {MissingColumnError} if `capexColumn` is not a column of the table.
 */
export function aggregate(
  table: Table,
  options: AggregateOptions,
): AggregationResult {
  const { capexColumn, threshold = 0, groupBy, sortGroups = false } = options;

  if (!table.columns.includes(capexColumn)) {
    throw new MissingColumnError(capexColumn);
  }

  const amounts = normalize(table.rows.map((row) => row[capexColumn]));
  const grouping =
    groupBy !== undefined && table.columns.includes(groupBy)
      ? groupBy
      : undefined;

  const summary: Summary = {
    total_rows: 0,
    capex_rows: 0,
    total_capex_amount: 0,
  };
  const groups = new Map<GroupKey, GroupAccumulator>();

  table.rows.forEach((row, index) => {
    const amount = amounts[index];
    const capex = isCapex(amount, threshold);

    summary.total_rows += 1;
    if (capex) {
      summary.capex_rows += 1;
      summary.total_capex_amount += amount;
    }

    if (grouping === undefined) return;

    const key = toGroupKey(row[grouping]);
    let acc = groups.get(key);
    if (!acc) {
      acc = { capex_count: 0, capex_amount: 0, total_count: 0 };
      groups.set(key, acc);
    }
    acc.total_count += 1;
    if (capex) {
      acc.capex_count += 1;
      acc.capex_amount += amount;
    }
  });

  if (grouping === undefined) {
    return {
      summary,
      report: {
        kind: 'overall',
        columns: OVERALL_COLUMNS,
        records: [{ ...summary }],
      },
    };
  }

  const records: GroupSummary[] = [...groups].map(([group_key, acc]) => ({
    group_key,
    ...acc,
  }));
  if (sortGroups) {
    records.sort((a, b) => compareGroupKeys(a.group_key, b.group_key));
  }

  const report: ReportTable = {
    kind: 'grouped',
    groupBy: grouping,
    columns: [grouping, ...GROUP_VALUE_COLUMNS],
    records,
  };
  return { summary, report };
}

/**
 * Collapses both flavours of missing value into a single `null` key.
 */
function toGroupKey(value: CellValue): GroupKey {
  return value === undefined ? null : value;
}

function keyRank(key: GroupKey): number {
  if (typeof key === 'number') return 0;
  if (typeof key === 'string') return 1;
  if (typeof key === 'boolean') return 2;
  return 3;
}

/**
 * Orders keys numbers first (NaN last among them), then strings by code
 * unit, then booleans, with the missing key last.
 */
export function compareGroupKeys(a: GroupKey, b: GroupKey): number {
  const rankDiff = keyRank(a) - keyRank(b);
  if (rankDiff !== 0) return rankDiff;

  if (typeof a === 'number' && typeof b === 'number') {
    // NaN sorts after every other number
    if (Number.isNaN(a) || Number.isNaN(b)) {
      return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
    }
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  return 0;
}
