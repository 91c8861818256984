/**
 * Record schema — declaration checks, validation, defaults and normalization.
 *
 * A schema is a table of field rules. Everything here is a pure function of
 * (schema, value): nothing mutates its inputs and `validate` never throws.
 */

import { StringEnum } from "@mariozechner/pi-ai";
import { type TObject, type TProperties, Type } from "@sinclair/typebox";
import { SchemaDefinitionError } from "./errors.js";
import type { ExtractedRecord, FieldRule, FieldValue, RecordSchema, ValidationResult } from "./types.js";

/** Candidate values keyed by field name. Values are untrusted until validated. */
export type Candidate = Record<string, unknown>;

const LIST_SEPARATOR = /[\n;]/;

// =============================================================================
// Declaration
// =============================================================================

/** Check a schema declaration once, up front. Throws SchemaDefinitionError. */
export function defineSchema<S extends RecordSchema>(schema: S): S {
	const names = Object.keys(schema.fields);
	if (names.length === 0) {
		throw new SchemaDefinitionError(`Schema '${schema.name}' declares no fields`);
	}

	for (const name of names) {
		const rule = schema.fields[name];
		const where = `${schema.name}.${name}`;

		if (rule.type === "choice") {
			if (rule.choices.length === 0) {
				throw new SchemaDefinitionError(`Choice field ${where} has no choices`);
			}
			if (rule.default !== undefined && !rule.choices.includes(rule.default)) {
				throw new SchemaDefinitionError(
					`Default '${rule.default}' for ${where} is not one of: ${rule.choices.join(", ")}`,
				);
			}
		}

		if (rule.default !== undefined && isEmptyValue(rule.default)) {
			throw new SchemaDefinitionError(`Default for ${where} must not be empty`);
		}
		if (rule.default !== undefined && !matchesType(rule, rule.default)) {
			throw new SchemaDefinitionError(`Default for ${where} does not match field type '${rule.type}'`);
		}
	}

	return schema;
}

export function fieldLabel(schema: RecordSchema, name: string): string {
	return schema.fields[name]?.label ?? name;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a candidate against the schema.
 * Any input shape is accepted; non-objects validate as an empty candidate.
 */
export function validate(schema: RecordSchema, candidate: unknown): ValidationResult {
	const source = isPlainObject(candidate) ? candidate : {};
	const missing: string[] = [];
	const malformed: string[] = [];
	const record: ExtractedRecord = {};

	for (const [name, rule] of Object.entries(schema.fields)) {
		const value = Object.hasOwn(source, name) ? source[name] : undefined;

		if (isEmptyValue(value)) {
			if (rule.required) missing.push(name);
			continue;
		}

		if (!matchesType(rule, value)) {
			malformed.push(name);
			continue;
		}

		record[name] = copyValue(value);
	}

	if (missing.length > 0 || malformed.length > 0) {
		return { valid: false, missing, malformed };
	}
	return { valid: true, record };
}

/** Fill absent optional fields that declare a default. Returns a new record. */
export function applyDefaults(schema: RecordSchema, record: ExtractedRecord): ExtractedRecord {
	const result: ExtractedRecord = {};
	for (const [name, rule] of Object.entries(schema.fields)) {
		const value = record[name];
		if (!isEmptyValue(value)) {
			result[name] = copyValue(value);
		} else if (!rule.required && rule.default !== undefined) {
			result[name] = copyValue(rule.default);
		}
	}
	return result;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Clean up raw extractor output before it is merged.
 *
 * Unknown keys and empty values are dropped. Values of the wrong type are kept
 * as-is so validation can report them as malformed.
 */
export function normalizeCandidate(schema: RecordSchema, raw: unknown): Candidate {
	if (!isPlainObject(raw)) return {};

	const result: Candidate = {};
	for (const [name, rule] of Object.entries(schema.fields)) {
		if (!Object.hasOwn(raw, name)) continue;
		const value = normalizeValue(rule, raw[name]);
		if (!isEmptyValue(value)) result[name] = value;
	}
	return result;
}

function normalizeValue(rule: FieldRule, value: unknown): unknown {
	switch (rule.type) {
		case "text":
			return typeof value === "string" ? value.trim() : value;
		case "list": {
			const items = typeof value === "string" ? value.split(LIST_SEPARATOR) : value;
			if (!Array.isArray(items) || !items.every((item) => typeof item === "string")) return items;
			return items.map((item: string) => item.trim()).filter((item) => item.length > 0);
		}
		case "choice": {
			if (typeof value !== "string") return value;
			const trimmed = value.trim();
			const canonical = rule.choices.find((choice) => choice.toLowerCase() === trimmed.toLowerCase());
			return canonical ?? trimmed;
		}
	}
}

// =============================================================================
// Tool parameters
// =============================================================================

/** Build the tool parameter schema the language model fills in. Every property is optional. */
export function schemaParameters(schema: RecordSchema): TObject {
	const properties: TProperties = {};
	for (const [name, rule] of Object.entries(schema.fields)) {
		switch (rule.type) {
			case "text":
				properties[name] = Type.Optional(Type.String({ description: rule.description }));
				break;
			case "list":
				properties[name] = Type.Optional(Type.Array(Type.String(), { description: rule.description }));
				break;
			case "choice":
				properties[name] = Type.Optional(StringEnum([...rule.choices], { description: rule.description }));
				break;
		}
	}
	return Type.Object(properties);
}

// =============================================================================
// Helpers
// =============================================================================

export function isEmptyValue(value: unknown): boolean {
	if (value === undefined || value === null) return true;
	if (typeof value === "string") return value.trim().length === 0;
	if (Array.isArray(value)) return value.every((item) => typeof item === "string" && item.trim().length === 0);
	return false;
}

function matchesType(rule: FieldRule, value: unknown): value is FieldValue {
	switch (rule.type) {
		case "text":
			return typeof value === "string";
		case "list":
			return Array.isArray(value) && value.every((item) => typeof item === "string");
		case "choice":
			return typeof value === "string" && rule.choices.includes(value);
	}
}

function copyValue(value: FieldValue): FieldValue {
	return Array.isArray(value) ? [...value] : value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
