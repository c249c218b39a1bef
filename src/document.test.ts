import { describe, test, expect } from "vitest";
import {
	DocumentError,
	projectFromDocument,
	projectToDocument,
	serializeProject,
	parseProject,
	formatFromPath,
} from "./document";
import { generateDbml } from "./generator";
import { validateProject } from "./validator";
import { RelTypes, RefActions } from "./model";
import { project, table, column, index, expressionIndex, ref, enumType, tableGroup } from "./builder";

function sampleProject() {
	return project("shop")
		.databaseType("PostgreSQL")
		.note("")
		.addEnum(enumType("status", "active", "on hold").schema("crm"))
		.addTable(
			table("users")
				.headerColor("#3498DB")
				.addColumn(column("id", "bigint").primaryKey().increment())
				.addColumn(column("email", "varchar(255)").unique().nullable().note("Login"))
				.addIndex(index("email").unique().name("idx_email"))
				.addIndex(expressionIndex("lower(email)"))
		)
		.addTable(
			table("posts")
				.addColumn(column("id", "bigint").primaryKey())
				.addColumn(column("user_id", "bigint").ref(RelTypes.manyToOne, "public", "users", "id"))
		)
		.addRef(
			ref(RelTypes.manyToOne).name("fk").from("public", "posts", "user_id").to("public", "users", "id").onDelete(RefActions.cascade)
		)
		.addTableGroup(tableGroup("content").addTable("public", "posts"))
		.build();
}

describe("projectToDocument", () => {
	test("maps the graph to plain data", () => {
		const doc = projectToDocument(
			project("p")
				.addTable(table("users").schema("auth").setting("headercolor", "#000").addColumn(column("id", "int").primaryKey()))
				.addRef(ref(RelTypes.oneToOne).from("auth", "users", "id").to("public", "profiles", "user_id"))
				.build()
		);

		expect(doc).toEqual({
			name: "p",
			tables: {
				"auth.users": {
					schema: "auth",
					name: "users",
					settings: { headercolor: "#000" },
					columns: [
						{
							name: "id",
							type: "int",
							settings: { primaryKey: true, nullable: false, unique: false, increment: false },
						},
					],
					indexes: [],
				},
			},
			enums: {},
			refs: [
				{
					type: "-",
					left: { schema: "auth", table: "users", columns: ["id"] },
					right: { schema: "public", table: "profiles", columns: ["user_id"] },
				},
			],
			tableGroups: [],
		});
	});

	test("leaves absent optionals out of JSON output", () => {
		const json = serializeProject(project("p").addTable(table("t").addColumn(column("id", "int"))).build());
		const parsed = JSON.parse(json);

		expect(Object.keys(parsed)).toEqual(["name", "tables", "enums", "refs", "tableGroups"]);
		expect(Object.keys(parsed.tables["public.t"])).toEqual(["schema", "name", "settings", "columns", "indexes"]);
	});
});

describe("projectFromDocument", () => {
	test("fills defaults for omitted fields", () => {
		const built = projectFromDocument({
			name: "shop",
			tables: {
				"public.users": {
					name: "users",
					columns: [{ name: "id", type: "bigint", settings: { primaryKey: true } }],
				},
			},
			enums: { "public.status": { name: "status", values: ["a"] } },
			tableGroups: [{ name: "g", tables: [{ name: "users" }] }],
		});

		const users = built.tables.get("public.users");
		expect(users?.schema).toBe("public");
		expect(users?.settings.size).toBe(0);
		expect(users?.indexes).toEqual([]);
		expect(users?.columns[0].settings).toEqual({ primaryKey: true, nullable: false, unique: false, increment: false });
		expect(built.enums.get("public.status")?.schema).toBe("public");
		expect(built.tableGroups[0].tables).toEqual([{ schema: "public", name: "users" }]);
		expect(built.refs).toEqual([]);
		expect(validateProject(built)).toBeUndefined();
	});

	test("keeps an empty note distinct from no note", () => {
		expect(projectFromDocument({ name: "p", note: "" }).note).toBe("");
		expect(projectFromDocument({ name: "p" }).note).toBeUndefined();
	});

	test("reports every structural problem", () => {
		expect.assertions(3);
		try {
			projectFromDocument({ name: ["shop"], refs: [{ left: { schema: "public" } }] });
		} catch (error) {
			expect(error).toBeInstanceOf(DocumentError);
			expect(error instanceof DocumentError && error.problems).toEqual([
				"/name must be string",
				"/refs/0 must have required property 'type'",
				"/refs/0/left must have required property 'table'",
				"/refs/0/left must have required property 'columns'",
			]);
			expect(error instanceof Error && error.message.split("\n")[0]).toBe("Document is not a valid project:");
		}
	});

	test("rejects a document without a name", () => {
		expect(() => projectFromDocument({ tables: {} })).toThrow("/ must have required property 'name'");
	});

	test("rejects unknown keys", () => {
		expect(() => projectFromDocument({ name: "p", colour: "red" })).toThrow("/ must NOT have additional properties");
	});

	test("leaves semantic checks to the validator", () => {
		const built = projectFromDocument({
			name: "p",
			refs: [
				{
					type: "<=>",
					left: { schema: "public", table: "a", columns: ["id"] },
					right: { schema: "public", table: "b", columns: ["id"] },
				},
			],
		});

		expect(validateProject(built)?.message).toBe("ref 0: Ref.Type: invalid relationship type: <=>");
	});
});

describe("serializeProject / parseProject", () => {
	test("round-trips through JSON", () => {
		const original = sampleProject();
		const restored = parseProject(serializeProject(original, "json"), "json");

		expect(generateDbml(restored)).toBe(generateDbml(original));
		expect(restored.note).toBe("");
	});

	test("round-trips through YAML", () => {
		const original = sampleProject();
		const restored = parseProject(serializeProject(original, "yaml"), "yaml");

		expect(generateDbml(restored)).toBe(generateDbml(original));
		expect([...restored.tables.keys()]).toEqual(["public.users", "public.posts"]);
	});

	test("parses a hand-written YAML document", () => {
		const yaml = [
			"name: shop",
			"tables:",
			"  public.users:",
			"    name: users",
			"    columns:",
			"      - name: id",
			"        type: bigint",
			"        settings:",
			"          primaryKey: true",
			"",
		].join("\n");

		expect(generateDbml(parseProject(yaml, "yaml"))).toBe("Project shop {\n}\n\nTable users {\n  id bigint [pk, not null]\n}\n\n");
	});

	test("reads unquoted YAML scalars into string fields", () => {
		const yaml = [
			"name: ledger",
			"tables:",
			"  public.accounts:",
			"    name: accounts",
			"    columns:",
			"      - name: balance",
			"        type: int",
			"        settings:",
			"          default: 0",
			"enums:",
			"  public.level:",
			"    name: level",
			"    values: [1, 2, true]",
			"",
		].join("\n");

		const parsed = parseProject(yaml, "yaml");

		expect(parsed.tables.get("public.accounts")?.columns[0].settings.default).toBe("0");
		expect(parsed.enums.get("public.level")?.values).toEqual(["1", "2", "true"]);
		expect(generateDbml(parsed)).toBe(
			"Project ledger {\n}\n\nEnum level {\n  1\n  2\n  true\n}\n\nTable accounts {\n  balance int [not null, default: 0]\n}\n\n"
		);
	});

	test("wraps syntax errors", () => {
		expect(() => parseProject("{ not json", "json")).toThrow(DocumentError);
		expect(() => parseProject("{ not json", "json")).toThrow(/^Failed to parse JSON document: /);
	});
});

describe("formatFromPath", () => {
	test("detects YAML by extension", () => {
		expect(formatFromPath("schema.yaml")).toBe("yaml");
		expect(formatFromPath("dir/schema.YML")).toBe("yaml");
		expect(formatFromPath("schema.json")).toBe("json");
		expect(formatFromPath("schema")).toBe("json");
	});
});
