import type { Database, SqlValue } from 'sql.js';

import {
  CellValue,
  ColumnAggregateType,
  PageRequest,
  PageResult,
  Schema,
  SchemaColumn,
  SortSpec,
} from '../models/tabular-source';
import { isSortableType, normalizeDeclaredType } from '../utils/column-types';
import { normalizeSearchQuery } from '../utils/display';
import { validateSort } from '../utils/page-planner';
import { LIKE_ESCAPE_CHAR, quote, toContainsPattern } from '../utils/sql';
import { interpolate, quantilePosition, QUANTILES, sampleStdDev } from '../utils/statistics';
import { SourceUnavailableError } from './errors';
import { TableEngine } from './table-engine';

type SqlParam = string | number;

type Filter = {
  conditions: string[];
  params: SqlParam[];
};

const NUMERIC_VALUE = (column: string): string => `typeof(${column}) IN ('integer', 'real')`;

/**
 * Integers beyond the safe range are read a second time as text, so they
 * can be returned as exact `bigint` values.
 */
const wideIntegerText = (expression: string): string =>
  `CASE WHEN typeof(${expression}) = 'integer' AND (${expression} > ${Number.MAX_SAFE_INTEGER} ` +
  `OR ${expression} < -${Number.MAX_SAFE_INTEGER}) THEN CAST(${expression} AS TEXT) END`;

function selectRows(db: Database, sql: string, params: readonly SqlParam[] = []): SqlValue[][] {
  const statement = db.prepare(sql);

  try {
    statement.bind([...params]);
    const rows: SqlValue[][] = [];
    while (statement.step()) {
      rows.push(statement.get());
    }
    return rows;
  } finally {
    statement.free();
  }
}

function selectValue(db: Database, sql: string, params: readonly SqlParam[] = []): SqlValue {
  return selectRows(db, sql, params)[0]?.[0] ?? null;
}

function toCount(value: SqlValue): number {
  const count = Number(value ?? 0);
  return Number.isFinite(count) ? count : 0;
}

function toCellValue(value: SqlValue, wideText: SqlValue, column: SchemaColumn): CellValue {
  const exact = typeof wideText === 'string' ? BigInt(wideText) : value;

  if (exact === null) {
    return null;
  }

  if (column.type === 'boolean' && (typeof exact === 'number' || typeof exact === 'bigint')) {
    return Number(exact) !== 0;
  }

  return exact;
}

const whereClause = ({ conditions }: Filter): string =>
  conditions.length === 0 ? '' : ` WHERE ${conditions.join(' AND ')}`;

/**
 * User tables and views of a database, internal tables left out.
 */
export function listSqliteTables(db: Database): string[] {
  return selectRows(
    db,
    `SELECT name FROM sqlite_master WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' ORDER BY name`,
  )
    .map((row) => row[0])
    .filter((name): name is string => typeof name === 'string');
}

/**
 * A table or view of an SQLite database. Ordering, filtering, slicing and
 * aggregation all run in the database.
 */
export class SqliteTableEngine implements TableEngine {
  public readonly schema: Schema;
  private readonly table: string;
  private readonly hasRowid: boolean;

  constructor(
    private readonly db: Database,
    tableName: string,
  ) {
    this.table = quote(tableName);

    const columns: Schema = selectRows(db, `PRAGMA table_info(${quote(tableName)})`)
      .filter((row) => typeof row[1] === 'string')
      .map((row, index) => {
        const declaredType = typeof row[2] === 'string' ? row[2] : '';
        return {
          name: String(row[1]),
          declaredType,
          type: normalizeDeclaredType(declaredType),
          index,
        };
      });

    if (columns.length === 0) {
      throw new SourceUnavailableError(`Table "${tableName}" does not exist`, { operation: 'open' });
    }

    const definition = selectValue(
      db,
      `SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?`,
      [tableName],
    );
    // Views and WITHOUT ROWID tables have no rowid to break ties with
    this.hasRowid = typeof definition === 'string' && !/WITHOUT\s+ROWID/i.test(definition);
    this.schema = columns;
  }

  rowCount(searchQuery: string | null): number {
    const filter = this.buildFilter(searchQuery);
    return toCount(selectValue(this.db, `SELECT COUNT(*) FROM ${this.table}${whereClause(filter)}`, filter.params));
  }

  fetchPage(request: PageRequest): PageResult {
    const { schema } = this;

    const sortError = validateSort(request.sort, schema);
    if (sortError) {
      throw sortError;
    }

    const filter = this.buildFilter(request.searchQuery);
    const rowOffset = request.pageIndex * request.pageSize;
    const totalRowCount = this.rowCount(request.searchQuery);

    const selected = schema.flatMap((column) => [quote(column.name), wideIntegerText(quote(column.name))]);
    const rawRows = selectRows(
      this.db,
      `SELECT ${selected.join(', ')} FROM ${this.table}` +
        `${whereClause(filter)}${this.buildOrderBy(request.sort)} LIMIT ? OFFSET ?`,
      [...filter.params, request.pageSize, rowOffset],
    );

    const rows = rawRows.map((row) =>
      schema.map((column) =>
        toCellValue(row[column.index * 2] ?? null, row[column.index * 2 + 1] ?? null, column),
      ),
    );

    return { request, schema, rows, totalRowCount, rowOffset };
  }

  aggregate(columnIndex: number, aggType: ColumnAggregateType, searchQuery: string | null): CellValue {
    const column = this.schema[columnIndex];

    if (!column) {
      throw new RangeError(`Column index ${columnIndex} is out of bounds`);
    }

    const name = quote(column.name);
    const filter = this.buildFilter(searchQuery);

    switch (aggType) {
      case 'count':
        return toCount(
          selectValue(this.db, `SELECT COUNT(${name}) FROM ${this.table}${whereClause(filter)}`, filter.params),
        );
      case 'sum':
      case 'avg':
        return column.type === 'numeric' ? this.aggregateValue(aggType.toUpperCase(), column, filter) : null;
      case 'min':
      case 'max':
        return isSortableType(column.type) ? this.aggregateValue(aggType.toUpperCase(), column, filter) : null;
      case 'std':
        return column.type === 'numeric' ? this.stdDev(name, filter) : null;
      case 'q25':
      case 'median':
      case 'q75':
        return column.type === 'numeric' ? this.quantile(name, filter, QUANTILES[aggType]) : null;
      default: {
        const _: never = aggType;
        return _;
      }
    }
  }

  close(): void {
    this.db.close();
  }

  private aggregateValue(fn: string, column: SchemaColumn, filter: Filter): CellValue {
    const [row] = selectRows(
      this.db,
      `SELECT value, ${wideIntegerText('value')} FROM ` +
        `(SELECT ${fn}(${quote(column.name)}) AS value FROM ${this.table}${whereClause(filter)})`,
      filter.params,
    );

    return row ? toCellValue(row[0] ?? null, row[1] ?? null, column) : null;
  }

  /**
   * Two passes: count and mean first, then the squared deviations.
   */
  private stdDev(column: string, filter: Filter): number | null {
    const numeric = this.withCondition(filter, NUMERIC_VALUE(column));
    const [summary] = selectRows(
      this.db,
      `SELECT COUNT(${column}), AVG(${column}) FROM ${this.table}${whereClause(numeric)}`,
      numeric.params,
    );
    const count = toCount(summary?.[0] ?? null);
    const mean = Number(summary?.[1] ?? 0);

    if (count < 2) {
      return null;
    }

    const sumOfSquares = Number(
      selectValue(
        this.db,
        `SELECT SUM((${column} - ?) * (${column} - ?)) FROM ${this.table}${whereClause(numeric)}`,
        [mean, mean, ...numeric.params],
      ) ?? 0,
    );

    return sampleStdDev(count, sumOfSquares);
  }

  private quantile(column: string, filter: Filter, q: number): number | null {
    const numeric = this.withCondition(filter, NUMERIC_VALUE(column));
    const count = toCount(
      selectValue(this.db, `SELECT COUNT(${column}) FROM ${this.table}${whereClause(numeric)}`, numeric.params),
    );

    if (count === 0) {
      return null;
    }

    const { lower, fraction } = quantilePosition(count, q);
    const neighbours = selectRows(
      this.db,
      `SELECT ${column} FROM ${this.table}${whereClause(numeric)} ORDER BY ${column} ASC LIMIT 2 OFFSET ?`,
      [...numeric.params, lower],
    ).map((row) => Number(row[0]));

    return interpolate(neighbours[0], neighbours[1], fraction);
  }

  private withCondition(filter: Filter, condition: string): Filter {
    return { conditions: [...filter.conditions, condition], params: filter.params };
  }

  private buildFilter(searchQuery: string | null): Filter {
    const query = normalizeSearchQuery(searchQuery);

    if (query === null) {
      return { conditions: [], params: [] };
    }

    const searchable = this.schema.filter((column) => column.type !== 'blob');
    if (searchable.length === 0) {
      return { conditions: ['0'], params: [] };
    }

    const pattern = toContainsPattern(query);
    const escape = quote(LIKE_ESCAPE_CHAR, { single: true });
    const matches = searchable.map(
      (column) => `CAST(${quote(column.name)} AS TEXT) LIKE ? ESCAPE ${escape}`,
    );

    return {
      conditions: [`(${matches.join(' OR ')})`],
      params: searchable.map(() => pattern),
    };
  }

  private buildOrderBy(sort: SortSpec): string {
    const tieBreak = this.hasRowid ? 'rowid ASC' : null;

    if (sort === null) {
      return tieBreak ? ` ORDER BY ${tieBreak}` : '';
    }

    const column = quote(this.schema[sort.columnIndex].name);
    const direction = sort.direction === 'asc' ? 'ASC' : 'DESC';
    const terms = [`(${column} IS NULL) ASC`, `${column} ${direction}`];
    if (tieBreak) {
      terms.push(tieBreak);
    }

    return ` ORDER BY ${terms.join(', ')}`;
  }
}
