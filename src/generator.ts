import type {
	Project,
	Table,
	Column,
	Index,
	IndexColumn,
	Ref,
	RefEndpoint,
	Enum,
	TableGroup,
} from "./model";
import { DEFAULT_SCHEMA } from "./model";

/**
 * Generate a DBML document from a project.
 *
 * Blocks are emitted as: project header, enums, tables, refs, table groups,
 * each followed by a blank line. Tables and enums follow map insertion order.
 * The graph is not validated here; incomplete fragments render degraded.
 */
export function generateDbml(project: Project): string {
	const blocks: string[] = [];

	if (project.name !== "") {
		blocks.push(generateProjectHeader(project));
	}
	for (const enumType of project.enums.values()) {
		blocks.push(generateEnum(enumType));
	}
	for (const table of project.tables.values()) {
		blocks.push(generateTable(table));
	}
	for (const ref of project.refs) {
		blocks.push(generateRef(ref));
	}
	for (const group of project.tableGroups) {
		blocks.push(generateTableGroup(group));
	}

	return blocks.map(block => `${block}\n`).join("");
}

function generateProjectHeader(project: Project): string {
	const lines = [`Project ${project.name} {`];
	if (project.databaseType !== undefined) {
		lines.push(`  database_type: '${project.databaseType}'`);
	}
	if (project.note !== undefined) {
		lines.push(`  Note: '${escapeString(project.note)}'`);
	}
	lines.push("}");
	return lines.map(line => `${line}\n`).join("");
}

export function generateTable(table: Table): string {
	let header = `Table ${qualifyName(table.schema, table.name)}`;
	if (table.alias !== undefined) {
		header += ` as ${table.alias}`;
	}
	if (table.settings.size > 0) {
		const settings = [...table.settings].map(([key, value]) => `${key}: ${value}`);
		header += ` [${settings.join(", ")}]`;
	}

	const lines = [`${header} {`];
	for (const column of table.columns) {
		lines.push(`  ${generateColumn(column)}`);
	}

	if (table.indexes.length > 0) {
		lines.push("", "  indexes {");
		for (const index of table.indexes) {
			lines.push(`    ${generateIndex(index)}`);
		}
		lines.push("  }");
	}

	if (table.note !== undefined) {
		lines.push("", `  Note: '${escapeString(table.note)}'`);
	}

	lines.push("}");
	return lines.map(line => `${line}\n`).join("");
}

/**
 * Render a single column line without indentation, e.g. `id bigint [pk, increment]`.
 */
export function generateColumn(column: Column): string {
	const { settings } = column;
	const attributes: string[] = [];

	if (settings.primaryKey) {
		attributes.push("pk");
	}
	if (settings.unique) {
		attributes.push("unique");
	}
	if (!settings.nullable) {
		attributes.push("not null");
	}
	if (settings.increment) {
		attributes.push("increment");
	}
	if (settings.default !== undefined) {
		attributes.push(`default: ${settings.default}`);
	}
	if (settings.check !== undefined) {
		attributes.push(`check: '${escapeString(settings.check)}'`);
	}
	if (column.inlineRef) {
		const { type, schema, table, column: target } = column.inlineRef;
		// Inline targets are always fully qualified
		attributes.push(`ref: ${type} ${schema}.${table}.${target}`);
	}
	if (column.note !== undefined) {
		attributes.push(`note: '${escapeString(column.note)}'`);
	}

	return `${column.name} ${column.type}${formatAttributes(attributes)}`;
}

export function generateIndex(index: Index): string {
	const columns = index.columns.flatMap(formatIndexColumn);
	const attributes: string[] = [];

	if (index.primaryKey) {
		attributes.push("pk");
	}
	if (index.unique) {
		attributes.push("unique");
	}
	if (index.type !== undefined) {
		attributes.push(`type: ${index.type}`);
	}
	if (index.name !== undefined) {
		attributes.push(`name: '${escapeString(index.name)}'`);
	}
	if (index.note !== undefined) {
		attributes.push(`note: '${escapeString(index.note)}'`);
	}

	return `(${columns.join(", ")})${formatAttributes(attributes)}`;
}

function formatIndexColumn(column: IndexColumn): string[] {
	if (column.name !== undefined) {
		return [column.name];
	}
	if (column.expression !== undefined) {
		return [`\`${column.expression}\``];
	}
	return [];
}

export function generateRef(ref: Ref): string {
	let header = ref.name !== undefined ? `Ref ${ref.name}` : "Ref";

	const attributes: string[] = [];
	if (ref.onDelete !== undefined) {
		attributes.push(`delete: ${ref.onDelete}`);
	}
	if (ref.onUpdate !== undefined) {
		attributes.push(`update: ${ref.onUpdate}`);
	}
	if (ref.color !== undefined) {
		attributes.push(`color: ${ref.color}`);
	}
	header += formatAttributes(attributes);

	const left = formatRefEndpoint(ref.left);
	const right = formatRefEndpoint(ref.right);

	return `${header} {\n  ${left} ${ref.type} ${right}\n}\n`;
}

export function generateEnum(enumType: Enum): string {
	const lines = [`Enum ${qualifyName(enumType.schema, enumType.name)} {`];

	for (const value of enumType.values) {
		lines.push(`  ${value.includes(" ") ? JSON.stringify(value) : value}`);
	}

	if (enumType.note !== undefined) {
		lines.push("", `  Note: '${escapeString(enumType.note)}'`);
	}

	lines.push("}");
	return lines.map(line => `${line}\n`).join("");
}

export function generateTableGroup(group: TableGroup): string {
	const lines = [`TableGroup ${group.name} {`];
	for (const table of group.tables) {
		lines.push(`  ${qualifyName(table.schema, table.name)}`);
	}
	lines.push("}");
	return lines.map(line => `${line}\n`).join("");
}

/**
 * Render an endpoint as `table.column` or `table.(a, b)` for composite keys.
 * A missing endpoint renders as an empty string.
 */
export function formatRefEndpoint(endpoint: RefEndpoint | undefined): string {
	if (!endpoint) {
		return "";
	}

	const tableName = qualifyName(endpoint.schema, endpoint.table);
	if (endpoint.columns.length === 1) {
		return `${tableName}.${endpoint.columns[0]}`;
	}
	return `${tableName}.(${endpoint.columns.join(", ")})`;
}

/**
 * Qualify a name with its schema, eliding the default schema.
 */
export function qualifyName(schema: string, name: string): string {
	return schema === DEFAULT_SCHEMA ? name : `${schema}.${name}`;
}

/**
 * Escape a value for a single-quoted DBML string. Only `'` is touched.
 */
export function escapeString(value: string): string {
	return value.replace(/'/g, "\\'");
}

function formatAttributes(attributes: readonly string[]): string {
	return attributes.length > 0 ? ` [${attributes.join(", ")}]` : "";
}
