/**
 * Chart Rendering
 *
 * Charts are rendered to Chart.js configurations and kept in an artifact
 * store; tool results carry only the handle.
 */

import type { ChartConfiguration } from 'chart.js';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, RenderError } from '../core/errors.js';
import type { Cell, ChartType, ColumnSchema } from '../core/types.js';
import type { QueryTable } from './query.js';

export type ChartConfig =
  | ChartConfiguration<'bar', number[], string>
  | ChartConfiguration<'line', number[], string>
  | ChartConfiguration<'pie', number[], string>
  | ChartConfiguration<'scatter', { x: number; y: number }[]>;

export interface ChartSpec {
  chartType: ChartType;
  x: string;
  y: string;
  title?: string;
}

export interface ChartArtifact {
  handle: string;
  chartType: ChartType;
  title: string;
  dataPoints: number;
  config: ChartConfig;
  sessionId?: string;
  createdAt: Date;
}

function requireColumn(columns: readonly ColumnSchema[], name: string, axis: 'x' | 'y'): ColumnSchema {
  const column = columns.find(c => c.name === name) ?? columns.find(c => c.name.toLowerCase() === name.toLowerCase());
  if (!column) {
    throw new RenderError(`Unknown ${axis} column '${name}'`, {
      axis,
      column: name,
      available: columns.map(c => c.name),
    });
  }
  return column;
}

function label(value: Cell): string {
  return value === null ? '(empty)' : String(value);
}

/**
 * Build a Chart.js configuration from tabular data. Rows with an empty y
 * value are skipped.
 */
export function renderChart(table: QueryTable, spec: ChartSpec): { config: ChartConfig; title: string; dataPoints: number } {
  const xColumn = requireColumn(table.columns, spec.x, 'x');
  const yColumn = requireColumn(table.columns, spec.y, 'y');

  if (yColumn.type !== 'number') {
    throw new RenderError(`y column '${yColumn.name}' must be numeric, it is ${yColumn.type}`, { column: yColumn.name });
  }
  if (spec.chartType === 'scatter' && xColumn.type !== 'number') {
    throw new RenderError(`scatter needs a numeric x column, '${xColumn.name}' is ${xColumn.type}`, {
      column: xColumn.name,
    });
  }

  const points: { x: Cell; y: number }[] = [];
  for (const row of table.rows) {
    const y = row[yColumn.name] ?? null;
    if (typeof y === 'number') {
      points.push({ x: row[xColumn.name] ?? null, y });
    }
  }
  if (points.length === 0) {
    throw new RenderError('No data points to plot', { x: xColumn.name, y: yColumn.name });
  }

  const title = spec.title ?? `${yColumn.name} by ${xColumn.name}`;
  const plugins = { title: { display: true, text: title } };

  switch (spec.chartType) {
    case 'scatter': {
      const data: { x: number; y: number }[] = [];
      for (const point of points) {
        if (typeof point.x === 'number') data.push({ x: point.x, y: point.y });
      }
      if (data.length === 0) {
        throw new RenderError('No data points to plot', { x: xColumn.name, y: yColumn.name });
      }
      return {
        title,
        dataPoints: data.length,
        config: {
          type: 'scatter',
          data: { datasets: [{ label: yColumn.name, data }] },
          options: {
            plugins,
            scales: {
              x: { title: { display: true, text: xColumn.name } },
              y: { title: { display: true, text: yColumn.name } },
            },
          },
        },
      };
    }
    case 'pie':
      return {
        title,
        dataPoints: points.length,
        config: {
          type: 'pie',
          data: { labels: points.map(p => label(p.x)), datasets: [{ label: yColumn.name, data: points.map(p => p.y) }] },
          options: { plugins },
        },
      };
    case 'bar':
      return {
        title,
        dataPoints: points.length,
        config: {
          type: 'bar',
          data: { labels: points.map(p => label(p.x)), datasets: [{ label: yColumn.name, data: points.map(p => p.y) }] },
          options: { plugins },
        },
      };
    case 'line':
      return {
        title,
        dataPoints: points.length,
        config: {
          type: 'line',
          data: { labels: points.map(p => label(p.x)), datasets: [{ label: yColumn.name, data: points.map(p => p.y) }] },
          options: { plugins },
        },
      };
  }
}

export interface ArtifactStoreOptions {
  /** Oldest artifacts are evicted beyond this many */
  maxArtifacts?: number;
}

/**
 * In-memory chart store. Artifacts live until their session is removed or
 * they are evicted as the oldest beyond `maxArtifacts`.
 */
export class ArtifactStore {
  private artifacts = new Map<string, ChartArtifact>();
  private readonly maxArtifacts: number;

  constructor(options: ArtifactStoreOptions = {}) {
    this.maxArtifacts = options.maxArtifacts ?? 500;
  }

  save(artifact: Omit<ChartArtifact, 'handle' | 'createdAt'>): ChartArtifact {
    const stored: ChartArtifact = { ...artifact, handle: `chart_${uuidv4()}`, createdAt: new Date() };
    this.artifacts.set(stored.handle, stored);
    // Map iteration follows insertion order, oldest first
    for (const handle of this.artifacts.keys()) {
      if (this.artifacts.size <= this.maxArtifacts) break;
      this.artifacts.delete(handle);
    }
    return stored;
  }

  /**
   * Drop every artifact produced in a session; returns how many were dropped.
   */
  removeSession(sessionId: string): number {
    let removed = 0;
    for (const [handle, artifact] of this.artifacts) {
      if (artifact.sessionId === sessionId) {
        this.artifacts.delete(handle);
        removed++;
      }
    }
    return removed;
  }

  get(handle: string): ChartArtifact {
    const artifact = this.artifacts.get(handle);
    if (!artifact) {
      throw new NotFoundError('artifact', handle);
    }
    return artifact;
  }

  has(handle: string): boolean {
    return this.artifacts.has(handle);
  }

  get size(): number {
    return this.artifacts.size;
  }
}
