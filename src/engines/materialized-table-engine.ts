import { SOURCE_WORKER } from '../config/constants';
import {
  CellValue,
  ColumnAggregateType,
  DataRow,
  PageRequest,
  PageResult,
  Schema,
  SchemaColumn,
  SortSpec,
} from '../models/tabular-source';
import { isSortableType } from '../utils/column-types';
import { makeRowMatcher, normalizeSearchQuery } from '../utils/display';
import { LruMap } from '../utils/lru-map';
import { validateSort } from '../utils/page-planner';
import { sortRowIndices, toSortKey } from '../utils/sort';
import { quantile, QUANTILES, stdDev } from '../utils/statistics';
import { TableEngine } from './table-engine';

export interface MaterializedTable {
  schema: Schema;
  rows: DataRow[];
}

/**
 * Builds a schema from column names and types, replacing empty and
 * duplicate names with positional ones.
 */
export function buildSchema(
  names: readonly string[],
  columns: readonly Pick<SchemaColumn, 'declaredType' | 'type'>[],
): Schema {
  const seen = new Set<string>();

  return columns.map((column, index) => {
    let name = names[index]?.trim() || `column_${index + 1}`;
    if (seen.has(name)) {
      name = `${name}_${index + 1}`;
    }
    seen.add(name);

    return { name, declaredType: column.declaredType, type: column.type, index };
  });
}

/**
 * Table held fully in memory for sources that can't sort natively. Rows
 * are sorted with the schema's comparator and sliced into the requested
 * window.
 *
 * Row orders are memoised per sort spec and search query, bounded to the
 * most recently used ones, so paging through a sorted view sorts only once.
 */
export class MaterializedTableEngine implements TableEngine {
  private readonly orders: LruMap<string, number[]>;

  constructor(
    private readonly table: MaterializedTable,
    maxMemoisedOrders: number = SOURCE_WORKER.MAX_MEMOISED_ORDERS,
  ) {
    this.orders = new LruMap(maxMemoisedOrders);
  }

  get schema(): Schema {
    return this.table.schema;
  }

  get memoisedOrderCount(): number {
    return this.orders.size;
  }

  rowCount(searchQuery: string | null): number {
    return this.getOrder(null, searchQuery).length;
  }

  fetchPage(request: PageRequest): PageResult {
    const { schema, rows: tableRows } = this.table;

    const sortError = validateSort(request.sort, schema);
    if (sortError) {
      throw sortError;
    }

    const order = this.getOrder(request.sort, request.searchQuery);
    const rowOffset = request.pageIndex * request.pageSize;
    const rows = order
      .slice(rowOffset, rowOffset + request.pageSize)
      .map((rowIndex) => tableRows[rowIndex].slice());

    return { request, schema, rows, totalRowCount: order.length, rowOffset };
  }

  aggregate(columnIndex: number, aggType: ColumnAggregateType, searchQuery: string | null): CellValue {
    const column = this.table.schema[columnIndex];

    if (!column) {
      throw new RangeError(`Column index ${columnIndex} is out of bounds`);
    }

    const values = this.getOrder(null, searchQuery)
      .map((rowIndex) => this.table.rows[rowIndex][columnIndex] ?? null)
      .filter((value): value is Exclude<CellValue, null> => value !== null);

    return aggregateValues(values, column, aggType);
  }

  close(): void {
    this.orders.clear();
  }

  private getOrder(sort: SortSpec, searchQuery: string | null): number[] {
    const query = normalizeSearchQuery(searchQuery);
    const key = JSON.stringify([sort?.columnIndex ?? null, sort?.direction ?? null, query]);
    const cached = this.orders.get(key);

    if (cached) {
      return cached;
    }

    const { rows, schema } = this.table;
    let order: number[];

    if (sort === null) {
      const matches = makeRowMatcher(query);
      order = [];
      rows.forEach((row, index) => {
        if (!matches || matches(row)) {
          order.push(index);
        }
      });
    } else {
      // Sort only the rows that pass the filter
      const filtered = this.getOrder(null, query);
      order = sortRowIndices(rows, sort.columnIndex, schema[sort.columnIndex].type, sort.direction, filtered);
    }

    this.orders.set(key, order);
    return order;
  }
}

const toNumbers = (values: readonly Exclude<CellValue, null>[]): number[] =>
  values.map(Number).filter((value) => !Number.isNaN(value));

function aggregateValues(
  values: Exclude<CellValue, null>[],
  column: SchemaColumn,
  aggType: ColumnAggregateType,
): CellValue {
  switch (aggType) {
    case 'count':
      return values.length;
    case 'sum':
    case 'avg': {
      if (column.type !== 'numeric') {
        return null;
      }
      const numbers = toNumbers(values);
      if (numbers.length === 0) {
        return null;
      }
      const sum = numbers.reduce((acc, value) => acc + value, 0);
      return aggType === 'sum' ? sum : sum / numbers.length;
    }
    case 'std':
      return column.type === 'numeric' ? stdDev(toNumbers(values)) : null;
    case 'q25':
    case 'median':
    case 'q75': {
      if (column.type !== 'numeric') {
        return null;
      }
      const sorted = toNumbers(values).sort((a, b) => a - b);
      return quantile(sorted, QUANTILES[aggType]);
    }
    case 'min':
    case 'max': {
      if (!isSortableType(column.type)) {
        return null;
      }
      const sign = aggType === 'min' ? 1 : -1;
      let best: Exclude<CellValue, null> | null = null;
      let bestKey: number | string | null = null;

      for (const value of values) {
        const key = toSortKey(value, column.type);
        if (key === null) continue;
        if (bestKey === null || compareSortKeys(key, bestKey) * sign < 0) {
          best = value;
          bestKey = key;
        }
      }

      return best;
    }
    default: {
      const _: never = aggType;
      return _;
    }
  }
}

function compareSortKeys(a: number | string, b: number | string): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}
