import type {
  CategoricalColumnSummary,
  DescribeResult,
  Dataset,
  NumericColumnSummary,
} from './types';

const NUMERIC_ROWS: Array<[string, keyof Omit<NumericColumnSummary, 'column'>]> = [
  ['count', 'count'],
  ['mean', 'mean'],
  ['std', 'std'],
  ['min', 'min'],
  ['25%', 'p25'],
  ['50%', 'p50'],
  ['75%', 'p75'],
  ['max', 'max'],
];

const CATEGORICAL_ROWS: Array<[string, keyof Omit<CategoricalColumnSummary, 'column'>]> = [
  ['count', 'count'],
  ['unique', 'unique'],
  ['top', 'top'],
  ['freq', 'freq'],
];

/** Percentile with linear interpolation between closest ranks; `sorted` must be ascending. */
export function percentile(sorted: number[], fraction: number): number | null {
  if (sorted.length === 0) return null;
  const position = (sorted.length - 1) * fraction;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function summarizeNumeric(column: string, values: number[]): NumericColumnSummary {
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = count > 0 ? sorted.reduce((sum, v) => sum + v, 0) / count : null;

  let std: number | null = null;
  if (mean !== null && count > 1) {
    const squared = sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0);
    std = Math.sqrt(squared / (count - 1));
  }

  return {
    column,
    count,
    mean,
    std,
    min: count > 0 ? sorted[0] : null,
    p25: percentile(sorted, 0.25),
    p50: percentile(sorted, 0.5),
    p75: percentile(sorted, 0.75),
    max: count > 0 ? sorted[count - 1] : null,
  };
}

export function summarizeCategorical(column: string, values: string[]): CategoricalColumnSummary {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  // First value reaching the highest count wins ties.
  let top: string | null = null;
  let freq = 0;
  for (const [value, count] of counts) {
    if (count > freq) {
      top = value;
      freq = count;
    }
  }

  return { column, count: values.length, unique: counts.size, top, freq };
}

/**
 * Descriptive statistics of a dataset. Numeric columns are summarized when
 * there are any; otherwise every column gets count/unique/top/freq.
 */
export function describe(dataset: Dataset): DescribeResult {
  const numericIndexes = dataset.columnTypes
    .map((type, index) => (type === 'string' ? -1 : index))
    .filter(index => index >= 0);

  if (numericIndexes.length > 0) {
    return {
      kind: 'numeric',
      columns: numericIndexes.map(index =>
        summarizeNumeric(dataset.headers[index], columnNumbers(dataset, index))
      ),
    };
  }

  return {
    kind: 'categorical',
    columns: dataset.headers.map((header, index) =>
      summarizeCategorical(
        header,
        dataset.data.flatMap(row => (row[index] === null ? [] : [String(row[index])]))
      )
    ),
  };
}

export function columnNumbers(dataset: Dataset, index: number): number[] {
  return dataset.data.flatMap(row => {
    const value = row[index];
    return typeof value === 'number' ? [value] : [];
  });
}

export function formatStatValue(value: number | string | null): string {
  if (value === null) return 'NaN';
  if (typeof value === 'string') return value;
  if (Number.isInteger(value)) return value.toString();
  return Number(value.toFixed(6)).toString();
}

/** Renders a describe result as a fixed-width table, one statistic per line. */
export function formatDescribe(result: DescribeResult): string {
  const labels = result.kind === 'numeric'
    ? NUMERIC_ROWS.map(([label]) => label)
    : CATEGORICAL_ROWS.map(([label]) => label);

  const columns = result.kind === 'numeric'
    ? result.columns.map(summary => ({
        name: summary.column,
        cells: NUMERIC_ROWS.map(([, key]) => formatStatValue(summary[key])),
      }))
    : result.columns.map(summary => ({
        name: summary.column,
        cells: CATEGORICAL_ROWS.map(([, key]) => formatStatValue(summary[key])),
      }));

  const labelWidth = Math.max(...labels.map(label => label.length));
  const widths = columns.map(col => Math.max(col.name.length, ...col.cells.map(cell => cell.length)));

  const header = [' '.repeat(labelWidth), ...columns.map((col, i) => col.name.padStart(widths[i]))];
  const lines = labels.map((label, row) => [
    label.padEnd(labelWidth),
    ...columns.map((col, i) => col.cells[row].padStart(widths[i])),
  ]);

  return [header, ...lines].map(cells => cells.join('  ')).join('\n');
}
