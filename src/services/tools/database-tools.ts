// Database Tools
// Schema lookup and read-only SQL over the data store, optionally served by the remote tool endpoint

import { errorMessage } from '../../utils/errors.js';
import { DataStore, formatQueryResults, formatSchema, QueryRejectedError } from '../database.js';
import { errorResult, okResult, type ToolDefinition } from './types.js';

export interface DatabaseToolOptions {
  /** Remote endpoint serving the same tools; the local handlers become its fallback */
  endpoint?: string;
}

export function createDatabaseTools(store: DataStore, options: DatabaseToolOptions = {}): ToolDefinition[] {
  const schemaTool: ToolDefinition = {
    name: 'get_database_schema',
    description:
      'Get the database schema: every table with its column names, column types and total row count. ' +
      'Call this FIRST before writing any SQL query.',
    parameters: [],
    execute: async () => {
      try {
        return okResult(formatSchema(store.describeTables()));
      } catch (error) {
        return errorResult('ApplicationError', `Schema Error: ${errorMessage(error)}`);
      }
    },
  };

  const queryTool: ToolDefinition = {
    name: 'execute_sql_query',
    description:
      'Execute a read-only SQL query (SELECT, COUNT, JOIN, GROUP BY) and return the rows as a table. ' +
      'Results are limited to 50 rows.',
    parameters: [
      {
        name: 'sql',
        type: 'string',
        description: 'SQL query, e.g. "SELECT COUNT(*) AS count FROM customers"',
        required: true,
      },
    ],
    execute: async args => {
      const sql = typeof args.sql === 'string' ? args.sql.trim() : '';
      if (!sql) {
        return errorResult('ValidationError', 'SQL query is required');
      }

      try {
        return okResult(formatQueryResults(store.query(sql)));
      } catch (error) {
        if (error instanceof QueryRejectedError) {
          return errorResult('ValidationError', error.message);
        }
        return errorResult('ApplicationError', `SQL Error: ${errorMessage(error)}`);
      }
    },
  };

  if (options.endpoint) {
    schemaTool.endpoint = options.endpoint;
    queryTool.endpoint = options.endpoint;
  }

  return [schemaTool, queryTool];
}
