/**
 * Dataset Profiler
 *
 * Column-level summary of a dataset for the model to orient itself before
 * querying: types, null counts, numeric summaries, frequent values, data
 * quality issues and the strongest correlations between numeric columns.
 */

import type {
  Cell,
  ColumnProfile,
  Correlation,
  DataQualityIssue,
  Dataset,
  DatasetProfile,
  NumericSummary,
} from '../core/types.js';

const SAMPLE_ROWS = 5;
const TOP_VALUES = 5;
const HIGH_MISSING_RATIO = 0.5;
const HIGH_CARDINALITY_RATIO = 0.9;
const TOP_CORRELATIONS = 15;

export function round(value: number, digits = 4): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

export function summarizeNumbers(values: readonly number[]): NumericSummary | undefined {
  if (values.length === 0) return undefined;

  const sorted = [...values].sort((a, b) => a - b);
  const mean = sorted.reduce((sum, v) => sum + v, 0) / sorted.length;
  const middle = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
  // Sample standard deviation, 0 for a single value
  const variance =
    sorted.length > 1 ? sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (sorted.length - 1) : 0;

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: round(mean),
    median: round(median),
    std: round(Math.sqrt(variance)),
  };
}

function topValues(values: readonly Cell[]): { value: string; count: number }[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value === null) continue;
    const key = String(value);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, TOP_VALUES)
    .map(([value, count]) => ({ value, count }));
}

function profileColumn(dataset: Dataset, name: string): ColumnProfile {
  const column = dataset.schema.find(c => c.name === name);
  const type = column?.type ?? 'string';
  const values = dataset.rows.map(row => row[name] ?? null);
  const present = values.filter(v => v !== null);

  const profile: ColumnProfile = {
    name,
    type,
    nullCount: values.length - present.length,
    distinctCount: new Set(present).size,
  };

  if (type === 'number') {
    profile.numeric = summarizeNumbers(present.filter((v): v is number => typeof v === 'number'));
  } else {
    profile.topValues = topValues(present);
  }

  return profile;
}

function assessQuality(dataset: Dataset, columns: ColumnProfile[]): DataQualityIssue[] {
  const issues: DataQualityIssue[] = [];
  const rowCount = dataset.rows.length;
  if (rowCount === 0) return issues;

  const highMissing = columns.filter(c => c.nullCount / rowCount > HIGH_MISSING_RATIO).map(c => c.name);
  if (highMissing.length > 0) {
    issues.push({ type: 'high_missing_values', columns: highMissing, severity: 'high' });
  }

  const seen = new Set<string>();
  let duplicates = 0;
  for (const row of dataset.rows) {
    const key = JSON.stringify(dataset.schema.map(c => row[c.name] ?? null));
    if (seen.has(key)) {
      duplicates++;
    } else {
      seen.add(key);
    }
  }
  if (duplicates > 0) {
    issues.push({
      type: 'duplicate_rows',
      count: duplicates,
      percentage: round((duplicates / rowCount) * 100, 2),
      severity: 'medium',
    });
  }

  for (const column of columns) {
    if (column.numeric && column.numeric.std === 0 && rowCount > 1) {
      issues.push({ type: 'zero_variance', column: column.name, severity: 'low' });
    }
    if (column.type === 'string' && rowCount > 1) {
      const uniqueRatio = column.distinctCount / rowCount;
      if (uniqueRatio > HIGH_CARDINALITY_RATIO) {
        issues.push({
          type: 'high_cardinality',
          column: column.name,
          uniqueRatio: round(uniqueRatio, 2),
          severity: 'medium',
        });
      }
    }
  }

  return issues;
}

/**
 * Pearson correlation over the rows where both values are present; null
 * when fewer than two such rows exist or either side is constant.
 */
export function pearson(xs: readonly (number | null)[], ys: readonly (number | null)[]): number | null {
  const pairs: [number, number][] = [];
  xs.forEach((x, i) => {
    const y = ys[i] ?? null;
    if (x !== null && y !== null) pairs.push([x, y]);
  });
  if (pairs.length < 2) return null;

  const meanX = pairs.reduce((sum, [x]) => sum + x, 0) / pairs.length;
  const meanY = pairs.reduce((sum, [, y]) => sum + y, 0) / pairs.length;
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (const [x, y] of pairs) {
    covariance += (x - meanX) * (y - meanY);
    varianceX += (x - meanX) ** 2;
    varianceY += (y - meanY) ** 2;
  }
  if (varianceX === 0 || varianceY === 0) return null;
  return covariance / Math.sqrt(varianceX * varianceY);
}

function topCorrelations(dataset: Dataset): Correlation[] {
  const numeric = dataset.schema
    .filter(column => column.type === 'number')
    .map(column => ({
      name: column.name,
      values: dataset.rows.map(row => {
        const value = row[column.name] ?? null;
        return typeof value === 'number' ? value : null;
      }),
    }));

  const pairs: Correlation[] = [];
  for (let i = 0; i < numeric.length; i++) {
    for (let j = i + 1; j < numeric.length; j++) {
      const r = pearson(numeric[i].values, numeric[j].values);
      if (r !== null) {
        pairs.push({ column1: numeric[i].name, column2: numeric[j].name, correlation: round(r) });
      }
    }
  }
  // Array sort is stable, so equal strengths keep column order
  return pairs.sort((a, b) => Math.abs(b.correlation) - Math.abs(a.correlation)).slice(0, TOP_CORRELATIONS);
}

export function profileDataset(dataset: Dataset): DatasetProfile {
  const columns = dataset.schema.map(column => profileColumn(dataset, column.name));

  return {
    datasetId: dataset.identifier,
    rowCount: dataset.rows.length,
    columnCount: dataset.schema.length,
    fingerprint: dataset.fingerprint,
    columns,
    sampleRows: dataset.rows.slice(0, SAMPLE_ROWS),
    issues: assessQuality(dataset, columns),
    correlations: topCorrelations(dataset),
  };
}
