// Generate the program JSON Schema file from the Zod schemas
// Usage: tsx scripts/generate-schemas.ts

import { writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { programJsonSchema } from "../src/schemas.js";

const repoRoot = resolve(dirname(fileURLToPath(import.meta.url)), "..");

/**
 * JSON Schema key priority order.
 * Mirrors jsonSchemaKeyOrder from eslint.config.ts for *.schema.json files.
 */
const jsonSchemaKeyOrder = [
	"$schema", "$id", "$ref", "definitions",
	"title", "description", "type", "const", "enum", "default",
	"properties", "additionalProperties", "required",
	"items", "minItems", "maxItems",
	"oneOf", "anyOf", "allOf", "not",
	"minimum", "maximum", "minLength", "maxLength", "pattern", "format",
];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Objects with "$ref" put it first; schema objects follow jsonSchemaKeyOrder;
 * everything else is alphabetical.
 */
function sortObjectKeys(record: Record<string, unknown>): string[] {
	const keys = Object.keys(record);

	let priorityOrder: string[];
	if ("$ref" in record) {
		priorityOrder = ["$ref"];
	} else if ("type" in record || "$schema" in record) {
		priorityOrder = jsonSchemaKeyOrder;
	} else {
		priorityOrder = [];
	}

	const prioritySet = new Set(priorityOrder);
	const priorityKeys = priorityOrder.filter(k => keys.includes(k));
	const remainingKeys = keys.filter(k => !prioritySet.has(k)).sort();
	return [...priorityKeys, ...remainingKeys];
}

/** Recursively sort object keys for deterministic, lint-compliant output. */
function sortKeys(obj: unknown): unknown {
	if (Array.isArray(obj)) return obj.map(sortKeys);
	if (!isRecord(obj)) return obj;

	const sorted: Record<string, unknown> = {};
	for (const key of sortObjectKeys(obj)) {
		sorted[key] = sortKeys(obj[key]);
	}
	return sorted;
}

const filePath = resolve(repoRoot, "settle.schema.json");
writeFileSync(filePath, JSON.stringify(sortKeys({ ...programJsonSchema }), null, "\t") + "\n");
console.log("Generated settle.schema.json");
