import * as fs from "fs";
import type { Project } from "./model";
import { validateProject } from "./validator";
import { generateDbml } from "./generator";
import { parseProject, serializeProject, formatFromPath } from "./document";
import { extractProject, type DbClient } from "./schemaExtractor";

export interface GenerateOptions {
	/** Schema document (.json, .yaml or .yml) */
	file: string;
	/** Skip validation before rendering (default: false) */
	skipValidation?: boolean;
}

export interface ConvertOptions {
	file: string;
	/** Target path; its extension picks the output format */
	output: string;
}

export interface IntrospectOptions {
	schema?: string;
	name?: string;
}

/**
 * Read a JSON or YAML schema document from disk.
 */
export function loadProject(file: string): Project {
	return parseProject(fs.readFileSync(file, "utf-8"), formatFromPath(file));
}

/**
 * Load, validate and render a document. Throws the first validation error.
 */
export function generateCommand(options: GenerateOptions): string {
	const project = loadProject(options.file);
	if (!options.skipValidation) {
		const error = validateProject(project);
		if (error) {
			throw error;
		}
	}
	return generateDbml(project);
}

export function validateCommand(file: string): void {
	const error = validateProject(loadProject(file));
	if (error) {
		throw error;
	}
}

/**
 * Re-serialize a document in the format of the output path.
 */
export function convertCommand(options: ConvertOptions): string {
	return serializeProject(loadProject(options.file), formatFromPath(options.output));
}

export async function introspectCommand(client: DbClient, options: IntrospectOptions = {}): Promise<string> {
	const project = await extractProject(client, options);
	return generateDbml(project);
}
