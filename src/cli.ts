#!/usr/bin/env node
import { Command } from "commander";
import { Client } from "pg";
import * as fs from "fs";
import { generateCommand, validateCommand, convertCommand, introspectCommand } from "./commands";

function writeOutput(output: string | undefined, content: string): void {
	if (output) {
		fs.writeFileSync(output, content);
		console.log(`Exported to ${output}`);
	} else {
		process.stdout.write(content);
	}
}

/**
 * Run a command body, reporting any error on stderr with a non-zero exit code.
 */
async function run(action: () => void | Promise<void>): Promise<void> {
	try {
		await action();
	} catch (error) {
		console.error(error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	}
}

const program = new Command();

program
	.name("dbml-kit")
	.description("Validate schema documents and render them as DBML")
	.version("1.0.0");

program
	.command("generate")
	.description("Render a JSON or YAML schema document as DBML")
	.requiredOption("-f, --file <file>", "Schema document (.json, .yaml or .yml)")
	.option("-o, --output <file>", "Output file (defaults to stdout)")
	.option("--no-validate", "Skip validation before rendering")
	.action((options: { file: string; output?: string; validate: boolean }) =>
		run(() => {
			const dbml = generateCommand({ file: options.file, skipValidation: !options.validate });
			writeOutput(options.output, dbml);
		})
	);

program
	.command("validate")
	.description("Check a schema document for structural consistency")
	.requiredOption("-f, --file <file>", "Schema document (.json, .yaml or .yml)")
	.action((options: { file: string }) =>
		run(() => {
			validateCommand(options.file);
			console.log("Valid.");
		})
	);

program
	.command("convert")
	.description("Convert a schema document between JSON and YAML (by file extension)")
	.requiredOption("-f, --file <file>", "Input document")
	.requiredOption("-o, --output <file>", "Output document")
	.action((options: { file: string; output: string }) =>
		run(() => {
			writeOutput(options.output, convertCommand(options));
		})
	);

program
	.command("introspect")
	.description("Read a PostgreSQL schema and render it as DBML")
	.requiredOption("-c, --connection <string>", "PostgreSQL connection string")
	.option("-s, --schema <name>", "Database schema to read", "public")
	.option("-n, --name <name>", "Project name (defaults to the schema name)")
	.option("-o, --output <file>", "Output file (defaults to stdout)")
	.action((options: { connection: string; schema: string; name?: string; output?: string }) =>
		run(async () => {
			const client = new Client({ connectionString: options.connection });
			await client.connect();
			try {
				const dbml = await introspectCommand(client, { schema: options.schema, name: options.name });
				writeOutput(options.output, dbml);
			} finally {
				await client.end();
			}
		})
	);

program.parseAsync().catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : String(error));
	process.exitCode = 1;
});
