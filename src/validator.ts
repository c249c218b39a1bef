import type {
	Project,
	Table,
	Column,
	Index,
	Ref,
	RefEndpoint,
	InlineRef,
	Enum,
	TableGroup,
} from "./model";
import { isRelType, isRefAction } from "./model";

/**
 * The first structural problem found in a schema graph.
 *
 * `field` names the offending entity field (`Column.Type`), `detail` says what is wrong,
 * and `path` holds the location segments that ancestors prepended (`table public.users`, `column 1`).
 */
export class ValidationError extends Error {
	constructor(
		readonly field: string,
		readonly detail: string,
		readonly path: readonly string[] = []
	) {
		super([...path, field, detail].join(": "));
		this.name = "ValidationError";
	}

	/** The same error, located one level further down from `segment`. */
	withContext(segment: string): ValidationError {
		return new ValidationError(this.field, this.detail, [segment, ...this.path]);
	}

	/** Full location: path segments followed by the field. */
	get fieldPath(): string {
		return [...this.path, this.field].join(": ");
	}
}

export type ValidationResult = ValidationError | undefined;

/**
 * Validate a whole project, stopping at the first violation.
 *
 * Order: project fields, tables (map order), enums, refs, table groups.
 */
export function validateProject(project: Project): ValidationResult {
	if (project.name === "") {
		return new ValidationError("Project.Name", "name is required");
	}

	for (const [key, table] of project.tables) {
		const error = validateTable(table);
		if (error) {
			return error.withContext(`table ${key}`);
		}
	}

	for (const [key, enumType] of project.enums) {
		const error = validateEnum(enumType);
		if (error) {
			return error.withContext(`enum ${key}`);
		}
	}

	for (const [i, ref] of project.refs.entries()) {
		const error = validateRef(ref);
		if (error) {
			return error.withContext(`ref ${i}`);
		}
	}

	for (const [i, group] of project.tableGroups.entries()) {
		const error = validateTableGroup(group);
		if (error) {
			return error.withContext(`table_group ${i}`);
		}
	}

	return undefined;
}

/**
 * Throwing variant of {@link validateProject}.
 */
export function assertValidProject(project: Project): void {
	const error = validateProject(project);
	if (error) {
		throw error;
	}
}

export function validateTable(table: Table): ValidationResult {
	if (table.name === "") {
		return new ValidationError("Table.Name", "name is required");
	}
	if (table.schema === "") {
		return new ValidationError("Table.Schema", "schema is required");
	}
	if (table.columns.length === 0) {
		return new ValidationError("Table.Columns", "at least one column is required");
	}

	for (const [i, column] of table.columns.entries()) {
		const error = validateColumn(column);
		if (error) {
			return error.withContext(`column ${i}`);
		}
	}

	for (const [i, index] of table.indexes.entries()) {
		const error = validateIndex(index);
		if (error) {
			return error.withContext(`index ${i}`);
		}
	}

	return undefined;
}

export function validateColumn(column: Column): ValidationResult {
	if (column.name === "") {
		return new ValidationError("Column.Name", "name is required");
	}
	if (column.type === "") {
		return new ValidationError("Column.Type", "type is required");
	}

	if (column.inlineRef) {
		return validateInlineRef(column.inlineRef)?.withContext("inline_ref");
	}

	return undefined;
}

export function validateIndex(index: Index): ValidationResult {
	if (index.columns.length === 0) {
		return new ValidationError("Index.Columns", "at least one column is required");
	}

	for (const [i, column] of index.columns.entries()) {
		const hasName = column.name !== undefined;
		const hasExpression = column.expression !== undefined;
		if (!hasName && !hasExpression) {
			return new ValidationError(`Index.Columns[${i}]`, "either name or expression is required");
		}
		if (hasName && hasExpression) {
			return new ValidationError(`Index.Columns[${i}]`, "cannot have both name and expression");
		}
	}

	return undefined;
}

export function validateRef(ref: Ref): ValidationResult {
	if (!ref.left) {
		return new ValidationError("Ref.Left", "left endpoint is required");
	}
	if (!ref.right) {
		return new ValidationError("Ref.Right", "right endpoint is required");
	}

	const typeError = checkRelType("Ref.Type", ref.type);
	if (typeError) {
		return typeError;
	}

	const leftError = validateRefEndpoint(ref.left);
	if (leftError) {
		return leftError.withContext("left");
	}
	const rightError = validateRefEndpoint(ref.right);
	if (rightError) {
		return rightError.withContext("right");
	}

	if (ref.left.columns.length !== ref.right.columns.length) {
		return new ValidationError(
			"Ref.Columns",
			`column count mismatch: left has ${ref.left.columns.length}, right has ${ref.right.columns.length}`
		);
	}

	if (ref.onDelete !== undefined) {
		const error = checkRefAction(ref.onDelete);
		if (error) {
			return error.withContext("on_delete");
		}
	}
	if (ref.onUpdate !== undefined) {
		const error = checkRefAction(ref.onUpdate);
		if (error) {
			return error.withContext("on_update");
		}
	}

	return undefined;
}

export function validateRefEndpoint(endpoint: RefEndpoint): ValidationResult {
	if (endpoint.schema === "") {
		return new ValidationError("RefEndpoint.Schema", "schema is required");
	}
	if (endpoint.table === "") {
		return new ValidationError("RefEndpoint.Table", "table is required");
	}
	if (endpoint.columns.length === 0) {
		return new ValidationError("RefEndpoint.Columns", "at least one column is required");
	}
	return undefined;
}

export function validateInlineRef(ref: InlineRef): ValidationResult {
	if (ref.schema === "") {
		return new ValidationError("InlineRef.Schema", "schema is required");
	}
	if (ref.table === "") {
		return new ValidationError("InlineRef.Table", "table is required");
	}
	if (ref.column === "") {
		return new ValidationError("InlineRef.Column", "column is required");
	}
	return checkRelType("InlineRef.Type", ref.type);
}

export function validateEnum(enumType: Enum): ValidationResult {
	if (enumType.name === "") {
		return new ValidationError("Enum.Name", "name is required");
	}
	if (enumType.schema === "") {
		return new ValidationError("Enum.Schema", "schema is required");
	}
	if (enumType.values.length === 0) {
		return new ValidationError("Enum.Values", "at least one value is required");
	}
	return undefined;
}

export function validateTableGroup(group: TableGroup): ValidationResult {
	if (group.name === "") {
		return new ValidationError("TableGroup.Name", "name is required");
	}
	if (group.tables.length === 0) {
		return new ValidationError("TableGroup.Tables", "at least one table is required");
	}

	for (const [i, tableRef] of group.tables.entries()) {
		if (tableRef.schema === "") {
			return new ValidationError(`TableGroup.Tables[${i}].Schema`, "schema is required");
		}
		if (tableRef.name === "") {
			return new ValidationError(`TableGroup.Tables[${i}].Name`, "name is required");
		}
	}

	return undefined;
}

function checkRelType(field: string, type: string): ValidationResult {
	if (type === "") {
		return new ValidationError(field, "relationship type is required");
	}
	if (!isRelType(type)) {
		return new ValidationError(field, `invalid relationship type: ${type}`);
	}
	return undefined;
}

function checkRefAction(action: string): ValidationResult {
	if (!isRefAction(action)) {
		return new ValidationError("RefAction", `invalid referential action: ${action}`);
	}
	return undefined;
}
