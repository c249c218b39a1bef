/**
 * Core data model types for dbml-kit.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 * Optional fields are absent (`undefined`) when unset; an empty string is a set value.
 */

/** Schema name that is elided from qualified names. */
export const DEFAULT_SCHEMA = 'public';

// === Vocabularies ===

export const RelTypes = {
  oneToMany: '<',
  manyToOne: '>',
  oneToOne: '-',
  manyToMany: '<>',
} as const;

export type RelType = (typeof RelTypes)[keyof typeof RelTypes];

export const RefActions = {
  cascade: 'cascade',
  restrict: 'restrict',
  setNull: 'set null',
  setDefault: 'set default',
  noAction: 'no action',
} as const;

export type RefAction = (typeof RefActions)[keyof typeof RefActions];

const relTypeValues: readonly string[] = Object.values(RelTypes);
const refActionValues: readonly string[] = Object.values(RefActions);

export function isRelType(value: string): value is RelType {
  return relTypeValues.includes(value);
}

export function isRefAction(value: string): value is RefAction {
  return refActionValues.includes(value);
}

// === Schema Types ===

export interface Project {
  readonly name: string;
  /** "PostgreSQL", "MySQL", ... */
  readonly databaseType?: string;
  readonly note?: string;
  /** Keyed by `schema.table`. */
  readonly tables: ReadonlyMap<string, Table>;
  /** Keyed by `schema.enum`. */
  readonly enums: ReadonlyMap<string, Enum>;
  readonly refs: readonly Ref[];
  readonly tableGroups: readonly TableGroup[];
}

export interface Table {
  readonly schema: string;
  readonly name: string;
  readonly alias?: string;
  readonly note?: string;
  /** Free-form header settings such as `headercolor`, rendered in insertion order. */
  readonly settings: ReadonlyMap<string, string>;
  readonly columns: readonly Column[];
  readonly indexes: readonly Index[];
}

export interface Column {
  readonly name: string;
  readonly type: string;
  readonly settings: ColumnSettings;
  readonly note?: string;
  readonly inlineRef?: InlineRef;
}

export interface ColumnSettings {
  readonly primaryKey: boolean;
  readonly nullable: boolean;
  readonly unique: boolean;
  readonly increment: boolean;
  /** Emitted verbatim, so string literals carry their own quotes. */
  readonly default?: string;
  readonly check?: string;
}

export interface Index {
  readonly columns: readonly IndexColumn[];
  readonly name?: string;
  /** Index method, e.g. `btree` or `hash`. */
  readonly type?: string;
  readonly unique: boolean;
  readonly primaryKey: boolean;
  readonly note?: string;
}

/** Exactly one of `name` (a plain column) or `expression` must be set. */
export interface IndexColumn {
  readonly name?: string;
  readonly expression?: string;
}

export interface Ref {
  /** One of {@link RelTypes}; anything else is rejected by the validator. */
  readonly type: string;
  readonly left?: RefEndpoint;
  readonly right?: RefEndpoint;
  readonly name?: string;
  /** One of {@link RefActions}. */
  readonly onDelete?: string;
  readonly onUpdate?: string;
  readonly color?: string;
}

export interface RefEndpoint {
  readonly schema: string;
  readonly table: string;
  /** More than one column for composite keys. */
  readonly columns: readonly string[];
}

export interface InlineRef {
  readonly type: string;
  readonly schema: string;
  readonly table: string;
  readonly column: string;
}

export interface Enum {
  readonly schema: string;
  readonly name: string;
  /** Declaration order. */
  readonly values: readonly string[];
  readonly note?: string;
}

export interface TableGroup {
  readonly name: string;
  readonly tables: readonly TableRef[];
}

export interface TableRef {
  readonly schema: string;
  readonly name: string;
}

// === Helpers ===

export function qualifiedKey(schema: string, name: string): string {
  return `${schema}.${name}`;
}

export function createProject(
  name: string,
  entities: {
    tables?: Table[];
    enums?: Enum[];
    refs?: Ref[];
    tableGroups?: TableGroup[];
    databaseType?: string;
    note?: string;
  } = {}
): Project {
  return {
    name,
    databaseType: entities.databaseType,
    note: entities.note,
    tables: new Map((entities.tables ?? []).map(t => [qualifiedKey(t.schema, t.name), t])),
    enums: new Map((entities.enums ?? []).map(e => [qualifiedKey(e.schema, e.name), e])),
    refs: entities.refs ?? [],
    tableGroups: entities.tableGroups ?? [],
  };
}
