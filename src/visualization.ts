import { DataProcessor } from './dataProcessor';
import { AppError, NotFoundError } from './errors';
import { columnNumbers } from './statistics';
import type { Dataset, Histogram, HistogramBin } from './types';

export const MAX_BINS = 1000;

export function sturgesBinCount(count: number): number {
  if (count <= 1) return 1;
  return Math.ceil(Math.log2(count)) + 1;
}

/** Equal-width bins from min to max; the last bin includes max. */
export function computeBins(values: number[], binCount: number): HistogramBin[] {
  if (values.length === 0) return [];

  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }

  if (min === max) {
    return [{ start: min, end: max, count: values.length }];
  }

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const value of values) {
    const index = Math.min(Math.floor((value - min) / width), binCount - 1);
    bins[index].count++;
  }
  return bins;
}

export class Visualization {
  static buildHistogram(dataset: Dataset, column?: string, binCount?: number): Histogram {
    const numeric = DataProcessor.numericColumns(dataset);
    if (numeric.length === 0) {
      throw new AppError('The dataset has no numeric columns to visualize', 400);
    }

    const target = column ?? numeric[0];
    const index = dataset.headers.indexOf(target);
    if (index < 0) {
      throw new NotFoundError(`Column "${target}" not found`);
    }
    if (dataset.columnTypes[index] === 'string') {
      throw new AppError(`Column "${target}" is not numeric`, 400);
    }
    if (binCount !== undefined && (!Number.isInteger(binCount) || binCount < 1 || binCount > MAX_BINS)) {
      throw new AppError(`bins must be an integer between 1 and ${MAX_BINS}`, 400);
    }

    const values = columnNumbers(dataset, index);
    const bins = computeBins(values, binCount ?? sturgesBinCount(values.length));

    return {
      column: target,
      bins,
      figure: {
        data: [{ type: 'histogram', x: values, name: target }],
        layout: {
          title: { text: `Distribution of ${target}` },
          xaxis: { title: { text: target } },
          yaxis: { title: { text: 'count' } },
          bargap: 0.05,
        },
      },
    };
  }
}
