import Ajv from "ajv";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import * as path from "path";
import type {
	Project,
	Table,
	Column,
	Index,
	Ref,
	RefEndpoint,
	Enum,
	TableGroup,
} from "./model";
import { DEFAULT_SCHEMA } from "./model";

export type DocumentFormat = "json" | "yaml";

// === Document Types ===
// Plain-data mirror of the model: maps become objects, optional collections may be omitted.

export interface ProjectDocument {
	name: string;
	databaseType?: string;
	note?: string;
	tables?: Record<string, TableDocument>;
	enums?: Record<string, EnumDocument>;
	refs?: RefDocument[];
	tableGroups?: TableGroupDocument[];
}

export interface TableDocument {
	schema?: string;
	name: string;
	alias?: string;
	note?: string;
	settings?: Record<string, string>;
	columns?: ColumnDocument[];
	indexes?: IndexDocument[];
}

export interface ColumnDocument {
	name: string;
	type: string;
	settings?: {
		primaryKey?: boolean;
		nullable?: boolean;
		unique?: boolean;
		increment?: boolean;
		default?: string;
		check?: string;
	};
	note?: string;
	inlineRef?: { type: string; schema: string; table: string; column: string };
}

export interface IndexDocument {
	columns?: { name?: string; expression?: string }[];
	name?: string;
	type?: string;
	unique?: boolean;
	primaryKey?: boolean;
	note?: string;
}

export interface RefEndpointDocument {
	schema: string;
	table: string;
	columns: string[];
}

export interface RefDocument {
	type: string;
	left?: RefEndpointDocument;
	right?: RefEndpointDocument;
	name?: string;
	onDelete?: string;
	onUpdate?: string;
	color?: string;
}

export interface EnumDocument {
	schema?: string;
	name: string;
	values?: string[];
	note?: string;
}

export interface TableGroupDocument {
	name: string;
	tables?: { schema?: string; name: string }[];
}

/**
 * Thrown when a document cannot be parsed or does not have the shape of a project.
 */
export class DocumentError extends Error {
	constructor(
		message: string,
		readonly problems: readonly string[] = []
	) {
		super(problems.length > 0 ? `${message}:\n${problems.map(p => `  - ${p}`).join("\n")}` : message);
		this.name = "DocumentError";
	}
}

// === JSON Schema ===

const str = { type: "string" } as const;
const bool = { type: "boolean" } as const;
const strArray = { type: "array", items: str } as const;

const endpointSchema = {
	type: "object",
	properties: { schema: str, table: str, columns: strArray },
	required: ["schema", "table", "columns"],
	additionalProperties: false,
} as const;

/**
 * Structural JSON Schema for project documents.
 * Semantic rules (non-empty names, known relationship types, ...) are left to the validator.
 */
export const projectDocumentSchema = {
	$schema: "http://json-schema.org/draft-07/schema#",
	type: "object",
	properties: {
		$schema: str,
		name: str,
		databaseType: str,
		note: str,
		tables: {
			type: "object",
			additionalProperties: {
				type: "object",
				properties: {
					schema: str,
					name: str,
					alias: str,
					note: str,
					settings: { type: "object", additionalProperties: str },
					columns: {
						type: "array",
						items: {
							type: "object",
							properties: {
								name: str,
								type: str,
								settings: {
									type: "object",
									properties: {
										primaryKey: bool,
										nullable: bool,
										unique: bool,
										increment: bool,
										default: str,
										check: str,
									},
									additionalProperties: false,
								},
								note: str,
								inlineRef: {
									type: "object",
									properties: { type: str, schema: str, table: str, column: str },
									required: ["type", "schema", "table", "column"],
									additionalProperties: false,
								},
							},
							required: ["name", "type"],
							additionalProperties: false,
						},
					},
					indexes: {
						type: "array",
						items: {
							type: "object",
							properties: {
								columns: {
									type: "array",
									items: {
										type: "object",
										properties: { name: str, expression: str },
										additionalProperties: false,
									},
								},
								name: str,
								type: str,
								unique: bool,
								primaryKey: bool,
								note: str,
							},
							additionalProperties: false,
						},
					},
				},
				required: ["name"],
				additionalProperties: false,
			},
		},
		enums: {
			type: "object",
			additionalProperties: {
				type: "object",
				properties: { schema: str, name: str, values: strArray, note: str },
				required: ["name"],
				additionalProperties: false,
			},
		},
		refs: {
			type: "array",
			items: {
				type: "object",
				properties: {
					type: str,
					left: endpointSchema,
					right: endpointSchema,
					name: str,
					onDelete: str,
					onUpdate: str,
					color: str,
				},
				required: ["type"],
				additionalProperties: false,
			},
		},
		tableGroups: {
			type: "array",
			items: {
				type: "object",
				properties: {
					name: str,
					tables: {
						type: "array",
						items: {
							type: "object",
							properties: { schema: str, name: str },
							required: ["name"],
							additionalProperties: false,
						},
					},
				},
				required: ["name"],
				additionalProperties: false,
			},
		},
	},
	required: ["name"],
	additionalProperties: false,
} as const;

// Plain YAML scalars such as `default: 0` load as numbers or booleans
const ajv = new Ajv({ allErrors: true, coerceTypes: true });
const checkProjectDocument = ajv.compile<ProjectDocument>(projectDocumentSchema);

// === Document <-> Model ===

/**
 * Build a project from a parsed document.
 * Only the structure is checked; call `validateProject` for the semantic rules.
 */
export function projectFromDocument(value: unknown): Project {
	if (!checkProjectDocument(value)) {
		const problems = (checkProjectDocument.errors ?? []).map(
			error => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`
		);
		throw new DocumentError("Document is not a valid project", problems);
	}

	return {
		name: value.name,
		databaseType: value.databaseType,
		note: value.note,
		tables: new Map(Object.entries(value.tables ?? {}).map(([key, table]) => [key, tableFromDocument(table)])),
		enums: new Map(Object.entries(value.enums ?? {}).map(([key, enumType]) => [key, enumFromDocument(enumType)])),
		refs: (value.refs ?? []).map(refFromDocument),
		tableGroups: (value.tableGroups ?? []).map(groupFromDocument),
	};
}

function tableFromDocument(doc: TableDocument): Table {
	return {
		schema: doc.schema ?? DEFAULT_SCHEMA,
		name: doc.name,
		alias: doc.alias,
		note: doc.note,
		settings: new Map(Object.entries(doc.settings ?? {})),
		columns: (doc.columns ?? []).map(columnFromDocument),
		indexes: (doc.indexes ?? []).map(indexFromDocument),
	};
}

function columnFromDocument(doc: ColumnDocument): Column {
	const settings = doc.settings ?? {};
	return {
		name: doc.name,
		type: doc.type,
		settings: {
			primaryKey: settings.primaryKey ?? false,
			nullable: settings.nullable ?? false,
			unique: settings.unique ?? false,
			increment: settings.increment ?? false,
			default: settings.default,
			check: settings.check,
		},
		note: doc.note,
		inlineRef: doc.inlineRef && { ...doc.inlineRef },
	};
}

function indexFromDocument(doc: IndexDocument): Index {
	return {
		columns: (doc.columns ?? []).map(c => ({ name: c.name, expression: c.expression })),
		name: doc.name,
		type: doc.type,
		unique: doc.unique ?? false,
		primaryKey: doc.primaryKey ?? false,
		note: doc.note,
	};
}

function endpointFromDocument(doc: RefEndpointDocument | undefined): RefEndpoint | undefined {
	return doc && { schema: doc.schema, table: doc.table, columns: [...doc.columns] };
}

function refFromDocument(doc: RefDocument): Ref {
	return {
		type: doc.type,
		left: endpointFromDocument(doc.left),
		right: endpointFromDocument(doc.right),
		name: doc.name,
		onDelete: doc.onDelete,
		onUpdate: doc.onUpdate,
		color: doc.color,
	};
}

function enumFromDocument(doc: EnumDocument): Enum {
	return {
		schema: doc.schema ?? DEFAULT_SCHEMA,
		name: doc.name,
		values: [...(doc.values ?? [])],
		note: doc.note,
	};
}

function groupFromDocument(doc: TableGroupDocument): TableGroup {
	return {
		name: doc.name,
		tables: (doc.tables ?? []).map(t => ({ schema: t.schema ?? DEFAULT_SCHEMA, name: t.name })),
	};
}

/**
 * Convert a project to a plain document.
 * Absent optional fields stay `undefined`, which both JSON and YAML output leave out.
 */
export function projectToDocument(project: Project): ProjectDocument {
	return {
		name: project.name,
		databaseType: project.databaseType,
		note: project.note,
		tables: Object.fromEntries([...project.tables].map(([key, table]) => [key, tableToDocument(table)])),
		enums: Object.fromEntries(
			[...project.enums].map(([key, enumType]) => [key, { ...enumType, values: [...enumType.values] }])
		),
		refs: project.refs.map(refToDocument),
		tableGroups: project.tableGroups.map(group => ({
			name: group.name,
			tables: group.tables.map(t => ({ schema: t.schema, name: t.name })),
		})),
	};
}

function tableToDocument(table: Table): TableDocument {
	return {
		schema: table.schema,
		name: table.name,
		alias: table.alias,
		note: table.note,
		settings: Object.fromEntries(table.settings),
		columns: table.columns.map(column => ({
			name: column.name,
			type: column.type,
			settings: { ...column.settings },
			note: column.note,
			inlineRef: column.inlineRef && { ...column.inlineRef },
		})),
		indexes: table.indexes.map(index => ({
			columns: index.columns.map(c => ({ name: c.name, expression: c.expression })),
			name: index.name,
			type: index.type,
			unique: index.unique,
			primaryKey: index.primaryKey,
			note: index.note,
		})),
	};
}

function refToDocument(ref: Ref): RefDocument {
	return {
		type: ref.type,
		left: endpointToDocument(ref.left),
		right: endpointToDocument(ref.right),
		name: ref.name,
		onDelete: ref.onDelete,
		onUpdate: ref.onUpdate,
		color: ref.color,
	};
}

function endpointToDocument(endpoint: RefEndpoint | undefined): RefEndpointDocument | undefined {
	return endpoint && { schema: endpoint.schema, table: endpoint.table, columns: [...endpoint.columns] };
}

// === Text ===

export function serializeProject(project: Project, format: DocumentFormat = "json"): string {
	const doc = projectToDocument(project);
	return format === "yaml" ? stringifyYaml(doc) : JSON.stringify(doc, null, 2);
}

export function parseProject(text: string, format: DocumentFormat = "json"): Project {
	let parsed: unknown;
	try {
		parsed = format === "yaml" ? parseYaml(text) : JSON.parse(text);
	} catch (error) {
		throw new DocumentError(
			`Failed to parse ${format.toUpperCase()} document: ${error instanceof Error ? error.message : String(error)}`
		);
	}
	return projectFromDocument(parsed);
}

/**
 * `.yaml` and `.yml` files are YAML; everything else is treated as JSON.
 */
export function formatFromPath(filePath: string): DocumentFormat {
	const ext = path.extname(filePath).toLowerCase();
	return ext === ".yaml" || ext === ".yml" ? "yaml" : "json";
}
