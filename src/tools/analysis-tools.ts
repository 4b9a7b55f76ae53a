/**
 * Analysis Tools
 *
 * The fixed toolset offered to the reasoning engine: dataset listing and
 * profiling, queries across joined datasets, single-column statistics,
 * market-basket co-occurrence and charts.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, QueryError } from '../core/errors.js';
import type { JSONSchema, Logger } from '../core/types.js';
import type { DatasetReader } from '../datasets/provider.js';
import { buildTable } from '../datasets/parser.js';
import { profileDataset } from '../datasets/profiler.js';
import { ArtifactStore, renderChart } from './charts.js';
import { compileFilter } from './filter-expression.js';
import { coOccurrence } from './basket.js';
import { runQuery, type JoinSpec, type QueryTable } from './query.js';
import { defineTool, ToolRegistry, type AnalysisTool } from './registry.js';
import { assertApplicable, computeStatistic, STATISTIC_OPS } from './statistics.js';

export interface AnalysisToolDeps {
  datasets: DatasetReader;
  artifacts: ArtifactStore;
}

const CHART_TYPES = ['bar', 'line', 'scatter', 'pie'] as const;

function newResultId(): string {
  return `res_${uuidv4().slice(0, 8)}`;
}

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// =============================================================================
// LIST / DESCRIBE
// =============================================================================

function listDatasetsTool({ datasets }: AnalysisToolDeps): AnalysisTool {
  return defineTool({
    name: 'list_datasets',
    description: 'List the datasets available for analysis with their identifiers and file types.',
    inputSchema: { type: 'object', properties: {} },
    args: z.object({}),
    async execute(_args, context) {
      return { kind: 'datasets', datasets: await datasets.list(context.signal) };
    },
  });
}

function describeDatasetTool({ datasets }: AnalysisToolDeps): AnalysisTool {
  return defineTool({
    name: 'describe_dataset',
    description:
      'Profile a dataset: row and column counts, column types, null counts, numeric summaries, ' +
      'frequent values, sample rows and data quality issues. Use it before querying an unfamiliar dataset.',
    inputSchema: {
      type: 'object',
      properties: {
        dataset_id: { type: 'string', description: 'Dataset identifier, e.g. "orders"' },
      },
      required: ['dataset_id'],
    },
    args: z.object({ dataset_id: z.string().min(1) }),
    async execute(args, context) {
      const dataset = await datasets.load(args.dataset_id, context.signal);
      return { kind: 'profile', profile: profileDataset(dataset) };
    },
  });
}

// =============================================================================
// QUERY
// =============================================================================

const joinArgs = z.object({
  dataset_id: z.string().min(1),
  left_on: z.string().min(1),
  right_on: z.string().min(1),
  how: z.enum(['inner', 'left']).default('left'),
  columns: z.array(z.string().min(1)).optional(),
});

const joinSchema: JSONSchema = {
  type: 'object',
  properties: {
    dataset_id: { type: 'string', description: 'Dataset to join in' },
    left_on: { type: 'string', description: 'Key column of the rows so far' },
    right_on: { type: 'string', description: 'Key column of the joined dataset' },
    how: { type: 'string', enum: ['inner', 'left'], description: 'left (default) keeps unmatched rows' },
    columns: { type: 'array', items: { type: 'string' }, description: 'Joined columns to keep' },
  },
  required: ['dataset_id', 'left_on', 'right_on'],
};

async function loadJoins(
  datasets: DatasetReader,
  joins: z.infer<typeof joinArgs>[],
  signal: AbortSignal | undefined
): Promise<JoinSpec[]> {
  return Promise.all(
    joins.map(async join => {
      const dataset = await datasets.load(join.dataset_id, signal);
      return {
        name: dataset.identifier,
        table: { columns: dataset.schema, rows: dataset.rows },
        leftOn: join.left_on,
        rightOn: join.right_on,
        how: join.how,
        columns: join.columns,
      };
    })
  );
}

const queryArgs = z.object({
  dataset_id: z.string().min(1),
  join: z.array(joinArgs).optional(),
  filter_expr: z.string().optional(),
  group_by: z.array(z.string().min(1)).optional(),
  aggregate: z
    .array(
      z.object({
        column: z.string().min(1).optional(),
        op: z.enum(STATISTIC_OPS),
        as: z.string().min(1).optional(),
      })
    )
    .optional(),
  having: z.string().optional(),
  columns: z.array(z.string().min(1)).optional(),
  order_by: z
    .array(z.object({ column: z.string().min(1), direction: z.enum(['asc', 'desc']).default('asc') }))
    .optional(),
  limit: z.number().int().min(0).optional(),
});

function queryTool({ datasets }: AnalysisToolDeps): AnalysisTool {
  return defineTool({
    name: 'query',
    description:
      'Join, filter, group and aggregate datasets. join merges other datasets in by key, in order, before ' +
      'filtering (e.g. order lines with products on product_id). filter_expr compares columns with literals: ' +
      "=, !=, <, >, <=, >=, CONTAINS, IN (...), NOT IN (...), combined with AND, OR, NOT and parentheses, e.g. " +
      "category = 'Electronics' AND price > 100. having filters the grouped rows the same way, e.g. count >= 10. " +
      'Returns a table with a result_id that chart can reference.',
    inputSchema: {
      type: 'object',
      properties: {
        dataset_id: { type: 'string', description: 'Dataset identifier' },
        join: { type: 'array', items: joinSchema, description: 'Datasets to join in, applied in order' },
        filter_expr: { type: 'string', description: 'Row filter expression' },
        group_by: { type: 'array', items: { type: 'string' }, description: 'Columns to group by' },
        aggregate: {
          type: 'array',
          description: 'Aggregates per group (a row count when grouping without aggregates)',
          items: {
            type: 'object',
            properties: {
              column: { type: 'string', description: 'Column to aggregate; omit to count rows' },
              op: { type: 'string', enum: [...STATISTIC_OPS] },
              as: { type: 'string', description: 'Output column name' },
            },
            required: ['op'],
          },
        },
        having: { type: 'string', description: 'Filter expression over grouped rows and aggregates' },
        columns: { type: 'array', items: { type: 'string' }, description: 'Columns to return when not grouping' },
        order_by: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              column: { type: 'string' },
              direction: { type: 'string', enum: ['asc', 'desc'] },
            },
            required: ['column'],
          },
        },
        limit: { type: 'integer', minimum: 0, description: 'Maximum number of rows' },
      },
      required: ['dataset_id'],
    },
    args: queryArgs,
    async execute(args, context) {
      const [dataset, joins] = await Promise.all([
        datasets.load(args.dataset_id, context.signal),
        loadJoins(datasets, args.join ?? [], context.signal),
      ]);
      const output = runQuery(
        { columns: dataset.schema, rows: dataset.rows },
        {
          joins,
          filter: args.filter_expr,
          groupBy: args.group_by,
          aggregate: args.aggregate,
          having: args.having,
          columns: args.columns,
          orderBy: args.order_by,
          limit: args.limit,
        }
      );
      return {
        kind: 'table',
        resultId: newResultId(),
        datasetId: dataset.identifier,
        columns: output.columns,
        rows: output.rows,
        rowCount: output.rows.length,
      };
    },
  });
}

// =============================================================================
// STATISTIC
// =============================================================================

function statisticTool({ datasets }: AnalysisToolDeps): AnalysisTool {
  return defineTool({
    name: 'statistic',
    description:
      'Compute one statistic (sum, mean, count, min, max, distinct_count) over a dataset column, ' +
      'optionally after a filter_expr. count counts non-empty cells.',
    inputSchema: {
      type: 'object',
      properties: {
        dataset_id: { type: 'string', description: 'Dataset identifier' },
        column: { type: 'string', description: 'Column name' },
        op: { type: 'string', enum: [...STATISTIC_OPS] },
        filter_expr: { type: 'string', description: 'Optional row filter expression' },
      },
      required: ['dataset_id', 'column', 'op'],
    },
    args: z.object({
      dataset_id: z.string().min(1),
      column: z.string().min(1),
      op: z.enum(STATISTIC_OPS),
      filter_expr: z.string().optional(),
    }),
    async execute(args, context) {
      const dataset = await datasets.load(args.dataset_id, context.signal);
      const clause = `statistic ${args.op}(${args.column})`;
      const target =
        dataset.schema.find(c => c.name === args.column) ??
        dataset.schema.find(c => c.name.toLowerCase() === args.column.toLowerCase());
      if (!target) {
        throw new QueryError(`Unknown column '${args.column}'`, clause);
      }
      assertApplicable(target, args.op, clause);

      const predicate = compileFilter(args.filter_expr, dataset.schema);
      const rows = dataset.rows.filter(predicate);
      return {
        kind: 'scalar',
        datasetId: dataset.identifier,
        column: target.name,
        op: args.op,
        value: computeStatistic(
          rows.map(row => row[target.name] ?? null),
          args.op
        ),
        rowsConsidered: rows.length,
      };
    },
  });
}

// =============================================================================
// CO-OCCURRENCE
// =============================================================================

function coOccurrenceTool({ datasets }: AnalysisToolDeps): AnalysisTool {
  return defineTool({
    name: 'co_occurrence',
    description:
      'Find the items most often bought together with one item. dataset_id holds one row per basket line ' +
      '(e.g. order_id, product_id); item is the target value of item_column. lookup joins a dataset keyed by ' +
      'the item column to add labels such as product names. Returns a table of items with the number of ' +
      "shared baskets and their share of the target's baskets.",
    inputSchema: {
      type: 'object',
      properties: {
        dataset_id: { type: 'string', description: 'Dataset of basket lines' },
        basket_column: { type: 'string', description: 'Column identifying the basket, e.g. order_id' },
        item_column: { type: 'string', description: 'Column identifying the item, e.g. product_id' },
        item: { anyOf: [{ type: 'string' }, { type: 'number' }], description: 'Target item value' },
        lookup: {
          type: 'object',
          properties: {
            dataset_id: { type: 'string' },
            right_on: { type: 'string', description: 'Key column matching item_column' },
            columns: { type: 'array', items: { type: 'string' } },
          },
          required: ['dataset_id', 'right_on'],
        },
        limit: { type: 'integer', minimum: 0, description: 'Maximum number of items (default 10)' },
      },
      required: ['dataset_id', 'basket_column', 'item_column', 'item'],
    },
    args: z.object({
      dataset_id: z.string().min(1),
      basket_column: z.string().min(1),
      item_column: z.string().min(1),
      item: z.union([z.string().min(1), z.number()]),
      lookup: z
        .object({
          dataset_id: z.string().min(1),
          right_on: z.string().min(1),
          columns: z.array(z.string().min(1)).optional(),
        })
        .optional(),
      limit: z.number().int().min(0).optional(),
    }),
    async execute(args, context) {
      const [dataset, joins] = await Promise.all([
        datasets.load(args.dataset_id, context.signal),
        loadJoins(
          datasets,
          args.lookup ? [{ ...args.lookup, left_on: args.item_column, how: 'left' }] : [],
          context.signal
        ),
      ]);
      const pairs = coOccurrence(
        { columns: dataset.schema, rows: dataset.rows },
        { basketColumn: args.basket_column, itemColumn: args.item_column, item: args.item, limit: args.limit }
      );
      const output = runQuery(pairs, { joins });
      return {
        kind: 'table',
        resultId: newResultId(),
        datasetId: dataset.identifier,
        columns: output.columns,
        rows: output.rows,
        rowCount: output.rows.length,
      };
    },
  });
}

// =============================================================================
// CHART
// =============================================================================

const chartArgs = z
  .object({
    chart_type: z.enum(CHART_TYPES),
    x: z.string().min(1),
    y: z.string().min(1),
    result_id: z.string().min(1).optional(),
    rows: z.array(z.record(cellSchema)).min(1).optional(),
    title: z.string().optional(),
  })
  .refine(args => (args.result_id === undefined) !== (args.rows === undefined), {
    message: 'Provide exactly one of result_id or rows',
  });

function tableFromRows(rows: Record<string, z.infer<typeof cellSchema>>[]): QueryTable {
  const header: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!header.includes(key)) header.push(key);
    }
  }
  const table = buildTable(
    header,
    rows.map(row => header.map(key => row[key] ?? null))
  );
  return { columns: table.schema, rows: table.rows };
}

function chartTool({ artifacts }: AnalysisToolDeps): AnalysisTool {
  return defineTool({
    name: 'chart',
    description:
      'Render a bar, line, scatter or pie chart from a table result (result_id) or inline rows. ' +
      'x names the label column (numeric for scatter), y a numeric column. Returns an artifact handle.',
    inputSchema: {
      type: 'object',
      properties: {
        chart_type: { type: 'string', enum: [...CHART_TYPES] },
        x: { type: 'string', description: 'Column for the x axis or pie labels' },
        y: { type: 'string', description: 'Numeric column for values' },
        result_id: { type: 'string', description: 'result_id of an earlier query result' },
        rows: { type: 'array', items: { type: 'object' }, description: 'Inline data rows' },
        title: { type: 'string' },
      },
      required: ['chart_type', 'x', 'y'],
    },
    args: chartArgs,
    async execute(args, context) {
      let table: QueryTable;
      if (args.result_id !== undefined) {
        const source = context.lookupTable(args.result_id);
        if (!source) {
          throw new NotFoundError('result', args.result_id);
        }
        table = { columns: source.columns, rows: source.rows };
      } else {
        table = tableFromRows(args.rows ?? []);
      }

      const rendered = renderChart(table, { chartType: args.chart_type, x: args.x, y: args.y, title: args.title });
      const artifact = artifacts.save({
        chartType: args.chart_type,
        title: rendered.title,
        dataPoints: rendered.dataPoints,
        config: rendered.config,
        sessionId: context.sessionId,
      });
      return {
        kind: 'chart',
        handle: artifact.handle,
        chartType: artifact.chartType,
        title: artifact.title,
        dataPoints: artifact.dataPoints,
      };
    },
  });
}

// =============================================================================
// REGISTRY
// =============================================================================

export function createAnalysisTools(deps: AnalysisToolDeps): AnalysisTool[] {
  return [
    listDatasetsTool(deps),
    describeDatasetTool(deps),
    queryTool(deps),
    statisticTool(deps),
    coOccurrenceTool(deps),
    chartTool(deps),
  ];
}

export function createToolRegistry(deps: AnalysisToolDeps, logger?: Logger): ToolRegistry {
  return new ToolRegistry(createAnalysisTools(deps), logger);
}
