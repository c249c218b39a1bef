import { describe, test, expect } from "vitest";
import { project, table, column, index, expressionIndex, ref, enumType, tableGroup } from "./builder";
import { DEFAULT_SCHEMA, RelTypes, RefActions } from "./model";

describe("project builder", () => {
	test("sets project fields", () => {
		const built = project("test_db").databaseType("PostgreSQL").note("Test database").build();

		expect(built.name).toBe("test_db");
		expect(built.databaseType).toBe("PostgreSQL");
		expect(built.note).toBe("Test database");
		expect(built.tables.size).toBe(0);
		expect(built.enums.size).toBe(0);
		expect(built.refs).toEqual([]);
		expect(built.tableGroups).toEqual([]);
	});

	test("leaves unset optionals absent", () => {
		const built = project("p").build();

		expect(built.databaseType).toBeUndefined();
		expect(built.note).toBeUndefined();
	});

	test("keys tables and enums by schema-qualified name", () => {
		const built = project("p")
			.addTable(table("users").addColumn(column("id", "int")))
			.addTable(table("users").schema("auth").addColumn(column("id", "int")))
			.addEnum(enumType("status", "a").schema("crm"))
			.build();

		expect([...built.tables.keys()]).toEqual(["public.users", "auth.users"]);
		expect([...built.enums.keys()]).toEqual(["crm.status"]);
	});

	test("replaces a table added twice under the same key in place", () => {
		const built = project("p")
			.addTable(table("a").addColumn(column("id", "int")))
			.addTable(table("b").addColumn(column("id", "int")))
			.addTable(table("a").addColumn(column("id", "bigint")))
			.build();

		expect([...built.tables.keys()]).toEqual(["public.a", "public.b"]);
		expect(built.tables.get("public.a")?.columns[0].type).toBe("bigint");
	});

	test("keys a table by the schema it has when built", () => {
		const users = table("users").addColumn(column("id", "int"));
		const builder = project("p").addTable(users);
		users.schema("auth");

		const built = builder.build();
		expect([...built.tables.keys()]).toEqual(["auth.users"]);
		expect(built.tables.get("auth.users")?.schema).toBe("auth");
	});

	test("keys an enum by the schema it has when built", () => {
		const status = enumType("status", "a");
		const builder = project("p").addEnum(status);
		status.schema("crm");

		expect([...builder.build().enums.keys()]).toEqual(["crm.status"]);
	});

	test("returns an independent graph on every build", () => {
		const builder = project("p").addTable(table("a").addColumn(column("id", "int")));
		const first = builder.build();

		builder.addTable(table("b").addColumn(column("id", "int")));
		const second = builder.build();

		expect(first.tables.size).toBe(1);
		expect(second.tables.size).toBe(2);
		expect(second.tables.get("public.a")).not.toBe(first.tables.get("public.a"));
	});
});

describe("table builder", () => {
	test("defaults to the public schema", () => {
		const built = table("users").build();

		expect(built.schema).toBe(DEFAULT_SCHEMA);
		expect(built.alias).toBeUndefined();
		expect(built.settings.size).toBe(0);
	});

	test("sets schema, alias, note and settings", () => {
		const built = table("users").schema("auth").alias("u").headerColor("#FF0000").setting("note", "x").note("User table").build();

		expect(built.schema).toBe("auth");
		expect(built.alias).toBe("u");
		expect(built.note).toBe("User table");
		expect([...built.settings]).toEqual([
			["headercolor", "#FF0000"],
			["note", "x"],
		]);
	});
});

describe("column builder", () => {
	test("starts not null with no flags", () => {
		const built = column("id", "bigint").build();

		expect(built.settings).toEqual({ primaryKey: false, nullable: false, unique: false, increment: false });
		expect(built.inlineRef).toBeUndefined();
	});

	test("supports chaining multiple modifiers", () => {
		const built = column("user_id", "bigint")
			.primaryKey()
			.nullable()
			.unique()
			.increment()
			.default("0")
			.check("user_id >= 0")
			.note("Owner")
			.ref(RelTypes.manyToOne, "public", "users", "id")
			.build();

		expect(built).toEqual({
			name: "user_id",
			type: "bigint",
			settings: {
				primaryKey: true,
				nullable: true,
				unique: true,
				increment: true,
				default: "0",
				check: "user_id >= 0",
			},
			note: "Owner",
			inlineRef: { type: ">", schema: "public", table: "users", column: "id" },
		});
	});

	test("does not share settings between builds", () => {
		const builder = column("id", "int");
		const first = builder.build();
		builder.primaryKey();

		expect(first.settings.primaryKey).toBe(false);
		expect(builder.build().settings.primaryKey).toBe(true);
	});
});

describe("index builder", () => {
	test("creates a column index", () => {
		const built = index("email", "username").name("idx_user_email_username").unique().type("btree").build();

		expect(built.columns).toEqual([{ name: "email" }, { name: "username" }]);
		expect(built.unique).toBe(true);
		expect(built.primaryKey).toBe(false);
		expect(built.type).toBe("btree");
		expect(built.name).toBe("idx_user_email_username");
	});

	test("creates an expression index", () => {
		const built = expressionIndex("date(created_at)").primaryKey().note("by day").build();

		expect(built.columns).toEqual([{ expression: "date(created_at)" }]);
		expect(built.primaryKey).toBe(true);
		expect(built.note).toBe("by day");
	});
});

describe("ref builder", () => {
	test("sets endpoints and actions", () => {
		const built = ref(RelTypes.manyToOne)
			.name("fk_user")
			.from("public", "posts", "user_id")
			.to("public", "users", "id")
			.onDelete(RefActions.cascade)
			.onUpdate(RefActions.setNull)
			.color("#79AD51")
			.build();

		expect(built).toEqual({
			type: ">",
			name: "fk_user",
			left: { schema: "public", table: "posts", columns: ["user_id"] },
			right: { schema: "public", table: "users", columns: ["id"] },
			onDelete: "cascade",
			onUpdate: "set null",
			color: "#79AD51",
		});
	});

	test("leaves missing endpoints absent", () => {
		const built = ref(RelTypes.oneToMany).build();

		expect(built.left).toBeUndefined();
		expect(built.right).toBeUndefined();
	});
});

describe("enum and table group builders", () => {
	test("keeps enum values in declaration order", () => {
		const built = enumType("order_status", "pending", "shipped", "delivered").note("Statuses").build();

		expect(built.schema).toBe("public");
		expect(built.values).toEqual(["pending", "shipped", "delivered"]);
		expect(built.note).toBe("Statuses");
	});

	test("collects table references", () => {
		const built = tableGroup("core").addTable("public", "users").addTable("auth", "sessions").build();

		expect(built.tables).toEqual([
			{ schema: "public", name: "users" },
			{ schema: "auth", name: "sessions" },
		]);
	});
});
