import type { Project, Table, Column, Index, Ref, Enum } from './model';
import { DEFAULT_SCHEMA, RelTypes, RefActions, isRefAction, qualifiedKey } from './model';

/**
 * Database client interface - compatible with both pg.Client and PGlite
 */
export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

export interface ExtractOptions {
  /** Database schema to read. Defaults to `public`. */
  readonly schema?: string;
  /** Project name. Defaults to the schema name. */
  readonly name?: string;
}

/**
 * Extract a project from a PostgreSQL database.
 *
 * Foreign keys become standalone many-to-one refs from the referencing table.
 */
export async function extractProject(client: DbClient, options: ExtractOptions = {}): Promise<Project> {
  const schemaName = options.schema ?? DEFAULT_SCHEMA;
  const enums = await extractEnums(client, schemaName);
  const tables = await extractTables(client, schemaName);
  const refs = await extractRefs(client, schemaName);

  return {
    name: options.name ?? schemaName,
    databaseType: 'PostgreSQL',
    tables: new Map(tables.map(t => [qualifiedKey(t.schema, t.name), t])),
    enums: new Map(enums.map(e => [qualifiedKey(e.schema, e.name), e])),
    refs,
    tableGroups: [],
  };
}

async function extractTables(client: DbClient, schemaName: string): Promise<Table[]> {
  const tablesResult = await client.query<{ table_name: string }>(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = $1
      AND table_type = 'BASE TABLE'
    ORDER BY table_name
  `, [schemaName]);

  const tables: Table[] = [];

  for (const { table_name } of tablesResult.rows) {
    const primaryKey = await extractPrimaryKey(client, schemaName, table_name);
    // A single-column key is marked on the column; a composite one needs an index
    const inlinePk = primaryKey.length === 1 ? primaryKey[0] : undefined;
    const columns = await extractColumns(client, schemaName, table_name, inlinePk);
    const indexes: Index[] = primaryKey.length > 1
      ? [{ columns: primaryKey.map(name => ({ name })), unique: false, primaryKey: true }]
      : [];

    tables.push({
      schema: schemaName,
      name: table_name,
      settings: new Map(),
      columns,
      indexes,
    });
  }

  return tables;
}

async function extractColumns(
  client: DbClient,
  schemaName: string,
  tableName: string,
  primaryKeyColumn: string | undefined
): Promise<Column[]> {
  const result = await client.query<{
    column_name: string;
    data_type: string;
    udt_name: string;
    is_nullable: string;
    column_default: string | null;
    is_identity: string;
  }>(`
    SELECT
      column_name,
      data_type,
      udt_name,
      is_nullable,
      column_default,
      is_identity
    FROM information_schema.columns
    WHERE table_schema = $1 AND table_name = $2
    ORDER BY ordinal_position
  `, [schemaName, tableName]);

  return result.rows.map(row => {
    const isSequence = row.column_default !== null && row.column_default.startsWith('nextval(');
    return {
      name: row.column_name,
      // Array types are reported as `_elem`
      type: row.data_type === 'ARRAY' ? `${row.udt_name.replace(/^_/, '')}[]` : row.udt_name,
      settings: {
        primaryKey: row.column_name === primaryKeyColumn,
        nullable: row.is_nullable === 'YES',
        unique: false,
        increment: isSequence || row.is_identity === 'YES',
        default: row.column_default !== null && !isSequence ? row.column_default : undefined,
      },
    };
  });
}

async function extractPrimaryKey(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ column_name: string }>(`
    SELECT a.attname as column_name
    FROM pg_index i
    JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)
    JOIN pg_class c ON c.oid = i.indrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE i.indisprimary
      AND n.nspname = $1
      AND c.relname = $2
    ORDER BY array_position(i.indkey, a.attnum)
  `, [schemaName, tableName]);

  return result.rows.map(r => r.column_name);
}

async function extractEnums(client: DbClient, schemaName: string): Promise<Enum[]> {
  const result = await client.query<{ enum_name: string; label: string }>(`
    SELECT t.typname AS enum_name, e.enumlabel AS label
    FROM pg_type t
    JOIN pg_enum e ON e.enumtypid = t.oid
    JOIN pg_namespace n ON n.oid = t.typnamespace
    WHERE n.nspname = $1
    ORDER BY t.typname, e.enumsortorder
  `, [schemaName]);

  const values = new Map<string, string[]>();
  for (const row of result.rows) {
    const labels = values.get(row.enum_name) ?? [];
    labels.push(row.label);
    values.set(row.enum_name, labels);
  }

  return [...values].map(([name, labels]) => ({ schema: schemaName, name, values: labels }));
}

/**
 * Parse a PostgreSQL array string like "{a,b,c}" into a JavaScript array.
 * Handles the case where pg driver returns arrays as strings.
 */
function parsePostgresArray(value: string | string[]): string[] {
  if (Array.isArray(value)) {
    return value;
  }
  // PostgreSQL array format: {element1,element2,...}
  if (typeof value === 'string' && value.startsWith('{') && value.endsWith('}')) {
    const inner = value.slice(1, -1);
    if (inner === '') return [];
    return inner.split(',');
  }
  return [value];
}

/** `NO ACTION` is the default and is left out. */
function toRefAction(rule: string): string | undefined {
  const action = rule.toLowerCase();
  return isRefAction(action) && action !== RefActions.noAction ? action : undefined;
}

async function extractRefs(client: DbClient, schemaName: string): Promise<Ref[]> {
  const result = await client.query<{
    constraint_name: string;
    from_table: string;
    from_columns: string | string[];
    to_schema: string;
    to_table: string;
    to_columns: string | string[];
    delete_rule: string;
    update_rule: string;
  }>(`
    SELECT
      c.conname AS constraint_name,
      cl.relname AS from_table,
      ARRAY(
        SELECT a.attname
        FROM unnest(c.conkey) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = c.conrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS from_columns,
      n2.nspname AS to_schema,
      cl2.relname AS to_table,
      ARRAY(
        SELECT a.attname
        FROM unnest(c.confkey) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = c.confrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS to_columns,
      CASE c.confdeltype
        WHEN 'a' THEN 'NO ACTION'
        WHEN 'r' THEN 'RESTRICT'
        WHEN 'c' THEN 'CASCADE'
        WHEN 'n' THEN 'SET NULL'
        WHEN 'd' THEN 'SET DEFAULT'
      END AS delete_rule,
      CASE c.confupdtype
        WHEN 'a' THEN 'NO ACTION'
        WHEN 'r' THEN 'RESTRICT'
        WHEN 'c' THEN 'CASCADE'
        WHEN 'n' THEN 'SET NULL'
        WHEN 'd' THEN 'SET DEFAULT'
      END AS update_rule
    FROM pg_constraint c
    JOIN pg_class cl ON cl.oid = c.conrelid
    JOIN pg_class cl2 ON cl2.oid = c.confrelid
    JOIN pg_namespace n ON n.oid = cl.relnamespace
    JOIN pg_namespace n2 ON n2.oid = cl2.relnamespace
    WHERE c.contype = 'f'
      AND n.nspname = $1
    ORDER BY c.conname
  `, [schemaName]);

  return result.rows.map(row => ({
    type: RelTypes.manyToOne,
    name: row.constraint_name,
    left: { schema: schemaName, table: row.from_table, columns: parsePostgresArray(row.from_columns) },
    right: { schema: row.to_schema, table: row.to_table, columns: parsePostgresArray(row.to_columns) },
    onDelete: toRefAction(row.delete_rule),
    onUpdate: toRefAction(row.update_rule),
  }));
}
