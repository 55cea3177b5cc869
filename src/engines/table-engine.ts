import {
  CellValue,
  ColumnAggregateType,
  PageRequest,
  PageResult,
  Schema,
} from '../models/tabular-source';

/**
 * Synchronous query surface over one opened table. Engines live inside a
 * source worker thread and are only reached through task pool messages.
 */
export interface TableEngine {
  readonly schema: Schema;

  rowCount(searchQuery: string | null): number;

  /**
   * @throws InvalidSortError if the sort column is out of bounds or not sortable
   */
  fetchPage(request: PageRequest): PageResult;

  aggregate(columnIndex: number, aggType: ColumnAggregateType, searchQuery: string | null): CellValue;

  close(): void;
}
