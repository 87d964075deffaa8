import { Logger } from '@nestjs/common';
import { ClickHouseSettings } from '@clickhouse/client';
import { ConfigurationError, LoadingError, toErrorMessage } from '../../common/errors';
import { retry } from '../../common/retry';
import { DataRecord, Loader, LoadReport, RunContext } from '../stages/stage.interface';
import { isTransientWriteError } from './clickhouse-errors';
import { chunk, collapseByKey } from './dedupe';
import { InsertRow, normalizeRecord } from './record-normalizer';
import { getColumn, paramTypeOf, TableDefinition } from './table-definition';

/** The part of ClickHouseService the loaders write through. */
export interface RowWriter {
  insert(table: string, rows: InsertRow[]): Promise<void>;
  command(
    sql: string,
    params?: Record<string, unknown>,
    settings?: ClickHouseSettings,
  ): Promise<void>;
}

export interface LoaderOptions {
  batchSize: number;
  /** Extra attempts per batch on transient failures. */
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs?: number;
  now?: () => Date;
  randomFn?: () => number;
}

export interface LoadedReport extends LoadReport {
  /** In-batch duplicates dropped in favour of a higher version. */
  collapsed: number;
}

/**
 * Shared write path: normalize, drop blank keys, collapse duplicates,
 * then write fixed-size batches with bounded retries.
 */
export abstract class IdempotentLoader implements Loader<DataRecord> {
  readonly kind = 'loader';
  readonly name: string;
  protected readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    protected readonly table: TableDefinition,
    protected readonly writer: RowWriter,
    private readonly options: LoaderOptions,
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new ConfigurationError(`Batch size for ${table.name} must be a positive integer`, {
        table: table.name,
      });
    }
    if (table.upsertKey.length === 0) {
      throw new ConfigurationError(`${table.name} needs an upsert key`, { table: table.name });
    }
    [...table.upsertKey, table.versionColumn].forEach((column) => {
      try {
        getColumn(table, column);
      } catch (err) {
        throw new ConfigurationError(toErrorMessage(err), { table: table.name, column });
      }
    });

    this.name = `load:${table.name}`;
    this.logger = new Logger(`${new.target.name}:${table.name}`);
    this.now = options.now ?? (() => new Date());
  }

  protected abstract writeBatch(rows: InsertRow[]): Promise<void>;

  async load(records: DataRecord[], ctx: RunContext): Promise<LoadedReport> {
    const loadedAt = this.now();
    const rows: InsertRow[] = [];
    let skipped = 0;

    records.forEach((record, index) => {
      const result = normalizeRecord(this.table, record, loadedAt);
      if (!result.ok) {
        skipped += 1;
        this.logger.warn(`Skipping record #${index}: ${result.reason}`);
        return;
      }
      if (result.coerced.length > 0) {
        this.logger.debug(`Record #${index}: replaced unusable ${result.coerced.join(', ')}`);
      }
      rows.push(result.row);
    });

    const unique = collapseByKey(rows, this.table.upsertKey, this.table.versionColumn);
    const batches = chunk(unique, this.options.batchSize);
    let written = 0;

    for (const [index, batch] of batches.entries()) {
      if (ctx.signal.aborted) {
        throw new LoadingError(`Load into ${this.table.name} aborted after ${written} rows`, {
          table: this.table.name,
          written,
        });
      }
      await this.writeWithRetry(batch, index);
      written += batch.length;
      this.logger.debug(`Batch ${index + 1}/${batches.length}: wrote ${batch.length} rows`);
    }

    return {
      received: records.length,
      written,
      skipped,
      collapsed: rows.length - unique.length,
      batches: batches.length,
    };
  }

  private async writeWithRetry(batch: InsertRow[], index: number): Promise<void> {
    try {
      await retry(() => this.writeBatch(batch), {
        retries: this.options.maxRetries,
        minDelayMs: this.options.retryDelayMs,
        maxDelayMs: this.options.maxRetryDelayMs ?? 30_000,
        randomFn: this.options.randomFn,
        shouldRetry: isTransientWriteError,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
          this.logger.warn(
            `Batch ${index + 1} attempt ${attempt}/${maxAttempts} failed: ${toErrorMessage(error)}; retrying in ${delayMs}ms`,
          ),
      });
    } catch (err) {
      if (err instanceof LoadingError) throw err;
      throw new LoadingError(
        `Writing batch ${index + 1} (${batch.length} rows) into ${this.table.name} failed: ${toErrorMessage(err)}`,
        {
          table: this.table.name,
          batch: index + 1,
          rows: batch.length,
          transient: isTransientWriteError(err),
        },
        err,
      );
    }
  }
}

/** Append only. ReplacingMergeTree keeps the highest version per key at merge time. */
export class ReplacingMergeLoader extends IdempotentLoader {
  protected async writeBatch(rows: InsertRow[]): Promise<void> {
    await this.writer.insert(this.table.name, rows);
  }
}

export interface DeleteStatement {
  sql: string;
  params: Record<string, unknown>;
}

export function buildDeleteStatement(table: TableDefinition, rows: InsertRow[]): DeleteStatement {
  const keyColumns = table.upsertKey.map((name) => getColumn(table, name));

  if (keyColumns.length === 1) {
    const [column] = keyColumns;
    return {
      sql: `ALTER TABLE ${table.name} DELETE WHERE ${column.name} IN {keys:Array(${paramTypeOf(column)})}`,
      params: { keys: rows.map((row) => row[column.name]) },
    };
  }

  const params: Record<string, unknown> = {};
  const clauses = rows.map((row, r) => {
    const parts = keyColumns.map((column, c) => {
      const param = `k${r}_${c}`;
      params[param] = row[column.name];
      return `${column.name} = {${param}:${paramTypeOf(column)}}`;
    });
    return `(${parts.join(' AND ')})`;
  });

  return {
    sql: `ALTER TABLE ${table.name} DELETE WHERE ${clauses.join(' OR ')}`,
    params,
  };
}

/** Deletes the batch's keys, then inserts the batch. Assumes a single writer per key set. */
export class DeleteInsertLoader extends IdempotentLoader {
  protected async writeBatch(rows: InsertRow[]): Promise<void> {
    const { sql, params } = buildDeleteStatement(this.table, rows);
    await this.writer.command(sql, params, { mutations_sync: '2' });
    await this.writer.insert(this.table.name, rows);
  }
}

export function createIdempotentLoader(
  table: TableDefinition,
  writer: RowWriter,
  options: LoaderOptions,
): IdempotentLoader {
  return table.strategy === 'delete_insert'
    ? new DeleteInsertLoader(table, writer, options)
    : new ReplacingMergeLoader(table, writer, options);
}
