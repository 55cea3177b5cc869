/**
 * Source worker thread
 *
 * Hosts the table engines of all sources, so parsing, sorting, counting and
 * SQL run off the calling thread. Requests arrive through the task pool,
 * each with an id the reply carries back. Every request names the session
 * (source id, revision and where the data lives) it works on; a thread
 * that hasn't seen that revision yet opens it first.
 */
import { readFileSync } from 'fs';
import { MessagePort, parentPort } from 'worker_threads';

import initSqlJs, { type SqlJsStatic } from 'sql.js';

import { SOURCE_WORKER } from '../config/constants';
import { getLogger } from '../engines/debug-logger';
import { serializeError } from '../engines/errors';
import { MaterializedTableEngine } from '../engines/materialized-table-engine';
import { listSqliteTables, SqliteTableEngine } from '../engines/sqlite-table-engine';
import {
  listSpreadsheetSheets,
  loadDelimitedTable,
  loadSpreadsheetTable,
} from '../engines/table-loaders';
import type { TableEngine } from '../engines/table-engine';
import type {
  WorkerEnvelope,
  WorkerErrorReply,
  WorkerSuccessReply,
} from '../engines/task-pool';
import type {
  CellValue,
  ColumnAggregateType,
  PageRequest,
  PageResult,
  Schema,
} from '../models/tabular-source';
import { LruMap } from '../utils/lru-map';

/**
 * Where the bytes of a source live. Inline data is usually backed by a
 * `SharedArrayBuffer`, so posting it doesn't copy it.
 */
export type TableContent = { path: string } | { data: Uint8Array };

export type TableDescriptor =
  | { kind: 'table'; content: TableContent; tableName: string }
  | { kind: 'delimited-file'; content: TableContent; delimiter?: string }
  | { kind: 'spreadsheet'; content: TableContent; sheetName: string };

export interface SessionRef {
  id: string;
  /**
   * Bumped by every refresh of the source.
   */
  revision: number;
  descriptor: TableDescriptor;
}

export interface OpenRequest {
  type: 'open';
  session: SessionRef;
}

export interface RowCountRequest {
  type: 'rowCount';
  session: SessionRef;
  searchQuery: string | null;
}

export interface FetchPageRequest {
  type: 'fetchPage';
  session: SessionRef;
  request: PageRequest;
}

export interface AggregateRequest {
  type: 'aggregate';
  session: SessionRef;
  columnIndex: number;
  aggType: ColumnAggregateType;
  searchQuery: string | null;
}

export interface ListTablesRequest {
  type: 'listTables';
  kind: 'table' | 'spreadsheet';
  content: TableContent;
}

export interface ReleaseRequest {
  type: 'release';
  sessionId: string;
}

export type SourceWorkerRequest =
  | OpenRequest
  | RowCountRequest
  | FetchPageRequest
  | AggregateRequest
  | ListTablesRequest
  | ReleaseRequest;

export interface OpenResult {
  schema: Schema;
  /**
   * Field delimiter of a delimited file, detected or given.
   */
  delimiter?: string;
}

export interface SourceWorkerResults {
  open: OpenResult;
  rowCount: number;
  fetchPage: PageResult;
  aggregate: CellValue;
  listTables: string[];
  release: boolean;
}

export type SourceWorkerResult<R extends SourceWorkerRequest> = SourceWorkerResults[R['type']];

type Session = {
  revision: number;
  engine: TableEngine;
  delimiter?: string;
};

const logger = getLogger('source-worker');

let sqlJs: Promise<SqlJsStatic> | null = null;

function ensureSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

const sessions = new LruMap<string, Session>(SOURCE_WORKER.MAX_SESSIONS, (id, session) => {
  session.engine.close();
  logger.debug('Dropped least recently used session', { sessionId: id });
});

function readContent(content: TableContent): Uint8Array {
  if ('path' in content) {
    return readFileSync(content.path);
  }
  // Private copy, the engines must not write into shared memory
  return content.data.slice();
}

const decodeText = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');

async function loadSession(ref: SessionRef): Promise<Session> {
  const { descriptor } = ref;
  const bytes = readContent(descriptor.content);

  switch (descriptor.kind) {
    case 'table': {
      const SQL = await ensureSqlJs();
      const db = new SQL.Database(bytes);
      try {
        return { revision: ref.revision, engine: new SqliteTableEngine(db, descriptor.tableName) };
      } catch (error) {
        db.close();
        throw error;
      }
    }
    case 'delimited-file': {
      const table = loadDelimitedTable(decodeText(bytes), descriptor.delimiter);
      return {
        revision: ref.revision,
        engine: new MaterializedTableEngine(table),
        delimiter: table.delimiter,
      };
    }
    case 'spreadsheet':
      return {
        revision: ref.revision,
        engine: new MaterializedTableEngine(loadSpreadsheetTable(bytes, descriptor.sheetName)),
      };
    default: {
      const _: never = descriptor;
      return _;
    }
  }
}

async function openSession(ref: SessionRef): Promise<Session> {
  const current = sessions.get(ref.id);
  if (current?.revision === ref.revision) {
    return current;
  }

  current?.engine.close();
  const session = await loadSession(ref);
  sessions.set(ref.id, session);

  logger.debug('Opened session', {
    sessionId: ref.id,
    revision: ref.revision,
    kind: ref.descriptor.kind,
    columns: session.engine.schema.length,
  });

  return session;
}

async function listTables(request: ListTablesRequest): Promise<string[]> {
  const bytes = readContent(request.content);

  if (request.kind === 'spreadsheet') {
    return listSpreadsheetSheets(bytes);
  }

  const SQL = await ensureSqlJs();
  const db = new SQL.Database(bytes);
  try {
    return listSqliteTables(db);
  } finally {
    db.close();
  }
}

function release(sessionId: string): boolean {
  const session = sessions.get(sessionId);
  session?.engine.close();
  return sessions.delete(sessionId);
}

async function handle(request: SourceWorkerRequest): Promise<SourceWorkerResult<SourceWorkerRequest>> {
  switch (request.type) {
    case 'open': {
      const session = await openSession(request.session);
      return { schema: session.engine.schema, delimiter: session.delimiter };
    }
    case 'rowCount':
      return (await openSession(request.session)).engine.rowCount(request.searchQuery);
    case 'fetchPage':
      return (await openSession(request.session)).engine.fetchPage(request.request);
    case 'aggregate':
      return (await openSession(request.session)).engine.aggregate(
        request.columnIndex,
        request.aggType,
        request.searchQuery,
      );
    case 'listTables':
      return listTables(request);
    case 'release':
      return release(request.sessionId);
    default: {
      const _: never = request;
      return _;
    }
  }
}

async function respond(
  port: MessagePort,
  envelope: WorkerEnvelope<SourceWorkerRequest>,
): Promise<void> {
  try {
    const result = await handle(envelope.request);
    port.postMessage({
      id: envelope.id,
      success: true,
      result,
    } satisfies WorkerSuccessReply<SourceWorkerResult<SourceWorkerRequest>>);
  } catch (error) {
    port.postMessage({
      id: envelope.id,
      success: false,
      error: serializeError(error),
    } satisfies WorkerErrorReply);
  }
}

const port = parentPort;

if (port) {
  port.on('message', (envelope: WorkerEnvelope<SourceWorkerRequest>) => {
    void respond(port, envelope);
  });
}
