/**
 * Fluent builder API for assembling a schema graph.
 *
 * @example
 * ```ts
 * const dbml = generateDbml(
 *   project("shop")
 *     .databaseType("PostgreSQL")
 *     .addTable(
 *       table("users")
 *         .addColumn(column("id", "bigint").primaryKey().increment())
 *         .addColumn(column("email", "varchar(255)").unique())
 *     )
 *     .build()
 * );
 * ```
 *
 * Builders are mutable; `build()` returns an independent snapshot each time it is called.
 */

import type {
	Project,
	Table,
	Column,
	ColumnSettings,
	Index,
	IndexColumn,
	Ref,
	RefEndpoint,
	RelType,
	RefAction,
	InlineRef,
	Enum,
	TableGroup,
	TableRef,
} from "./model";
import { DEFAULT_SCHEMA, qualifiedKey } from "./model";

/** Either a finished entity or a builder that produces one. */
export type Buildable<T> = T | { build(): T };

function isBuilder<T extends object>(value: Buildable<T>): value is { build(): T } {
	return "build" in value;
}

function resolve<T extends object>(value: Buildable<T>): T {
	return isBuilder(value) ? value.build() : value;
}

// ============================================================
// Project
// ============================================================

export class ProjectBuilder {
	private _databaseType: string | undefined;
	private _note: string | undefined;
	private readonly _tables: Buildable<Table>[] = [];
	private readonly _enums: Buildable<Enum>[] = [];
	private readonly _refs: Buildable<Ref>[] = [];
	private readonly _tableGroups: Buildable<TableGroup>[] = [];

	constructor(private readonly _name: string) { }

	databaseType(databaseType: string): this {
		this._databaseType = databaseType;
		return this;
	}

	note(note: string): this {
		this._note = note;
		return this;
	}

	/**
	 * Adds a table. It is keyed by its `schema.name` at build time, and a later
	 * table with the same key replaces an earlier one in its position.
	 */
	addTable(table: Buildable<Table>): this {
		this._tables.push(table);
		return this;
	}

	/** Adds an enum, keyed like tables. */
	addEnum(enumType: Buildable<Enum>): this {
		this._enums.push(enumType);
		return this;
	}

	addRef(ref: Buildable<Ref>): this {
		this._refs.push(ref);
		return this;
	}

	addTableGroup(group: Buildable<TableGroup>): this {
		this._tableGroups.push(group);
		return this;
	}

	build(): Project {
		return {
			name: this._name,
			databaseType: this._databaseType,
			note: this._note,
			tables: keyBySchemaName(this._tables.map(resolve)),
			enums: keyBySchemaName(this._enums.map(resolve)),
			refs: this._refs.map(resolve),
			tableGroups: this._tableGroups.map(resolve),
		};
	}
}

function keyBySchemaName<T extends { readonly schema: string; readonly name: string }>(items: T[]): Map<string, T> {
	return new Map(items.map(item => [qualifiedKey(item.schema, item.name), item]));
}

export function project(name: string): ProjectBuilder {
	return new ProjectBuilder(name);
}

// ============================================================
// Table
// ============================================================

export class TableBuilder {
	private _schema = DEFAULT_SCHEMA;
	private _alias: string | undefined;
	private _note: string | undefined;
	private readonly _settings = new Map<string, string>();
	private readonly _columns: Buildable<Column>[] = [];
	private readonly _indexes: Buildable<Index>[] = [];

	constructor(private readonly _name: string) { }

	schema(schema: string): this {
		this._schema = schema;
		return this;
	}

	alias(alias: string): this {
		this._alias = alias;
		return this;
	}

	note(note: string): this {
		this._note = note;
		return this;
	}

	setting(key: string, value: string): this {
		this._settings.set(key, value);
		return this;
	}

	headerColor(color: string): this {
		return this.setting("headercolor", color);
	}

	addColumn(column: Buildable<Column>): this {
		this._columns.push(column);
		return this;
	}

	addIndex(index: Buildable<Index>): this {
		this._indexes.push(index);
		return this;
	}

	build(): Table {
		return {
			schema: this._schema,
			name: this._name,
			alias: this._alias,
			note: this._note,
			settings: new Map(this._settings),
			columns: this._columns.map(resolve),
			indexes: this._indexes.map(resolve),
		};
	}
}

export function table(name: string): TableBuilder {
	return new TableBuilder(name);
}

// ============================================================
// Column
// ============================================================

interface MutableColumnSettings {
	primaryKey: boolean;
	nullable: boolean;
	unique: boolean;
	increment: boolean;
	default?: string;
	check?: string;
}

export class ColumnBuilder {
	private readonly _settings: MutableColumnSettings = {
		primaryKey: false,
		nullable: false,
		unique: false,
		increment: false,
	};
	private _note: string | undefined;
	private _inlineRef: InlineRef | undefined;

	constructor(
		private readonly _name: string,
		private readonly _type: string
	) { }

	primaryKey(): this {
		this._settings.primaryKey = true;
		return this;
	}

	/** Columns are `not null` unless marked nullable. */
	nullable(): this {
		this._settings.nullable = true;
		return this;
	}

	unique(): this {
		this._settings.unique = true;
		return this;
	}

	increment(): this {
		this._settings.increment = true;
		return this;
	}

	/** The expression is emitted verbatim: pass `'pending'` (with quotes) for a string literal. */
	default(expression: string): this {
		this._settings.default = expression;
		return this;
	}

	check(expression: string): this {
		this._settings.check = expression;
		return this;
	}

	note(note: string): this {
		this._note = note;
		return this;
	}

	ref(type: RelType, schema: string, table: string, column: string): this {
		this._inlineRef = { type, schema, table, column };
		return this;
	}

	build(): Column {
		const settings: ColumnSettings = { ...this._settings };
		return {
			name: this._name,
			type: this._type,
			settings,
			note: this._note,
			inlineRef: this._inlineRef,
		};
	}
}

export function column(name: string, type: string): ColumnBuilder {
	return new ColumnBuilder(name, type);
}

// ============================================================
// Index
// ============================================================

export class IndexBuilder {
	private _name: string | undefined;
	private _type: string | undefined;
	private _note: string | undefined;
	private _unique = false;
	private _primaryKey = false;

	constructor(private readonly _columns: readonly IndexColumn[]) { }

	name(name: string): this {
		this._name = name;
		return this;
	}

	/** Index method such as `btree` or `hash`. */
	type(type: string): this {
		this._type = type;
		return this;
	}

	unique(): this {
		this._unique = true;
		return this;
	}

	primaryKey(): this {
		this._primaryKey = true;
		return this;
	}

	note(note: string): this {
		this._note = note;
		return this;
	}

	build(): Index {
		return {
			columns: [...this._columns],
			name: this._name,
			type: this._type,
			unique: this._unique,
			primaryKey: this._primaryKey,
			note: this._note,
		};
	}
}

/** Index over plain columns. */
export function index(...columns: string[]): IndexBuilder {
	return new IndexBuilder(columns.map(name => ({ name })));
}

/** Index over expressions such as `date(created_at)`. */
export function expressionIndex(...expressions: string[]): IndexBuilder {
	return new IndexBuilder(expressions.map(expression => ({ expression })));
}

// ============================================================
// Ref
// ============================================================

export class RefBuilder {
	private _name: string | undefined;
	private _left: RefEndpoint | undefined;
	private _right: RefEndpoint | undefined;
	private _onDelete: RefAction | undefined;
	private _onUpdate: RefAction | undefined;
	private _color: string | undefined;

	constructor(private readonly _type: RelType) { }

	name(name: string): this {
		this._name = name;
		return this;
	}

	from(schema: string, table: string, ...columns: string[]): this {
		this._left = { schema, table, columns };
		return this;
	}

	to(schema: string, table: string, ...columns: string[]): this {
		this._right = { schema, table, columns };
		return this;
	}

	onDelete(action: RefAction): this {
		this._onDelete = action;
		return this;
	}

	onUpdate(action: RefAction): this {
		this._onUpdate = action;
		return this;
	}

	color(color: string): this {
		this._color = color;
		return this;
	}

	build(): Ref {
		return {
			type: this._type,
			name: this._name,
			left: this._left && { ...this._left, columns: [...this._left.columns] },
			right: this._right && { ...this._right, columns: [...this._right.columns] },
			onDelete: this._onDelete,
			onUpdate: this._onUpdate,
			color: this._color,
		};
	}
}

export function ref(type: RelType): RefBuilder {
	return new RefBuilder(type);
}

// ============================================================
// Enum
// ============================================================

export class EnumBuilder {
	private _schema = DEFAULT_SCHEMA;
	private _note: string | undefined;

	constructor(
		private readonly _name: string,
		private readonly _values: readonly string[]
	) { }

	schema(schema: string): this {
		this._schema = schema;
		return this;
	}

	note(note: string): this {
		this._note = note;
		return this;
	}

	build(): Enum {
		return {
			schema: this._schema,
			name: this._name,
			values: [...this._values],
			note: this._note,
		};
	}
}

/** `enum` is reserved, hence the name. */
export function enumType(name: string, ...values: string[]): EnumBuilder {
	return new EnumBuilder(name, values);
}

// ============================================================
// TableGroup
// ============================================================

export class TableGroupBuilder {
	private readonly _tables: TableRef[] = [];

	constructor(private readonly _name: string) { }

	addTable(schema: string, name: string): this {
		this._tables.push({ schema, name });
		return this;
	}

	build(): TableGroup {
		return {
			name: this._name,
			tables: this._tables.map(t => ({ ...t })),
		};
	}
}

export function tableGroup(name: string): TableGroupBuilder {
	return new TableGroupBuilder(name);
}
