// Data store
// SQLite connection used by the database tools; opened lazily so a missing file only fails the calls that need it

import Database from 'better-sqlite3';

export const MAX_RESULT_ROWS = 50;

export interface DataStoreOptions {
  path: string;
  readonly: boolean;
}

export interface ColumnInfo {
  name: string;
  type: string;
}

export interface TableInfo {
  name: string;
  columns: ColumnInfo[];
  rowCount: number;
}

export interface QueryRows {
  columns: string[];
  rows: unknown[][];
}

interface SchemaRow {
  table_name: string;
  column_name: string;
  data_type: string;
}

// Statements that write, or that return rows while writing (INSERT ... RETURNING)
export class QueryRejectedError extends Error {
  constructor() {
    super('Only read-only queries are allowed');
    this.name = 'QueryRejectedError';
  }
}

const SCHEMA_QUERY = `
  SELECT m.name AS table_name, p.name AS column_name, p.type AS data_type
  FROM sqlite_master m
  JOIN pragma_table_info(m.name) p
  WHERE m.type = 'table' AND m.name NOT LIKE 'sqlite_%'
  ORDER BY m.name, p.cid
`;

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class DataStore {
  private readonly options: DataStoreOptions;
  private db: Database.Database | null = null;

  constructor(options: DataStoreOptions) {
    this.options = options;
  }

  connection(): Database.Database {
    if (!this.db) {
      this.db = new Database(this.options.path, {
        readonly: this.options.readonly,
        fileMustExist: this.options.readonly,
      });
    }
    return this.db;
  }

  describeTables(): TableInfo[] {
    const db = this.connection();
    const rows = db.prepare<[], SchemaRow>(SCHEMA_QUERY).all();
    const tables: TableInfo[] = [];

    for (const row of rows) {
      let table = tables[tables.length - 1];
      if (!table || table.name !== row.table_name) {
        table = { name: row.table_name, columns: [], rowCount: 0 };
        tables.push(table);
      }
      table.columns.push({ name: row.column_name, type: row.data_type || 'ANY' });
    }

    for (const table of tables) {
      const count = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(table.name)}`)
        .get();
      table.rowCount = count?.count ?? 0;
    }

    return tables;
  }

  query(sql: string): QueryRows {
    const statement = this.connection().prepare(sql);
    if (!statement.reader || !statement.readonly) {
      throw new QueryRejectedError();
    }

    const columns = statement.columns().map(column => column.name);
    const rows = statement
      .raw(true)
      .all()
      .map(row => (Array.isArray(row) ? row : []));
    return { columns, rows };
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}

export function formatSchema(tables: TableInfo[]): string {
  if (tables.length === 0) return 'No tables found';

  return tables
    .map(table =>
      [
        `-- Table: ${table.name}`,
        ...table.columns.map(column => `  ${column.name} (${column.type})`),
        `  -- Total rows: ${table.rowCount}`,
      ].join('\n'),
    )
    .join('\n\n');
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (Buffer.isBuffer(value)) return `<blob ${value.length} bytes>`;
  return String(value);
}

export function formatQueryResults(result: QueryRows, maxRows = MAX_RESULT_ROWS): string {
  if (result.rows.length === 0) return 'Query returned no results.';

  const header = result.columns.join(' | ');
  const lines = [header, '-'.repeat(header.length)];

  for (const row of result.rows.slice(0, maxRows)) {
    lines.push(row.map(formatCell).join(' | '));
  }

  if (result.rows.length > maxRows) {
    lines.push(`\n... (${result.rows.length - maxRows} more rows)`);
  }

  return lines.join('\n');
}
