/**
 * A single cell as read from the input. `null` and `undefined` both mean
 * the value is missing.
 */
export type CellValue = string | number | boolean | null | undefined;

export type Row = Readonly<Record<string, CellValue>>;

/**
 * An in-memory table. `columns` is the ordered column set, which may name
 * columns some rows leave out.
 */
export type Table = {
  columns: readonly string[];
  rows: readonly Row[];
};

export type Summary = {
  total_rows: number;
  capex_rows: number;
  total_capex_amount: number;
};

export type GroupKey = string | number | boolean | null;

export type GroupSummary = {
  group_key: GroupKey;
  capex_count: number;
  capex_amount: number;
  total_count: number;
};

export const OVERALL_COLUMNS = [
  'total_rows',
  'capex_rows',
  'total_capex_amount',
] as const;

export const GROUP_VALUE_COLUMNS = [
  'capex_count',
  'capex_amount',
  'total_count',
] as const;

/**
 * Report produced by the aggregator: either the overall summary as a single
 * record, or one record per group keyed by the group column's name.
 */
export type ReportTable =
  | {
      kind: 'overall';
      columns: typeof OVERALL_COLUMNS;
      records: [Summary];
    }
  | {
      kind: 'grouped';
      groupBy: string;
      columns: readonly [string, ...typeof GROUP_VALUE_COLUMNS];
      records: GroupSummary[];
    };

export type AggregationResult = {
  summary: Summary;
  report: ReportTable;
};
