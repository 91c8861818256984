/**
 * System turn wording.
 */

import { fieldLabel } from "./schema.js";
import type { AbortReason, FieldValue, RecordSchema } from "./types.js";

function formatList(items: string[]): string {
	return items.join(", ");
}

function formatValue(value: FieldValue): string {
	return Array.isArray(value) ? value.join("; ") : value;
}

/** Ask for exactly the fields that are still missing or malformed. */
export function followUpPrompt(
	schema: RecordSchema,
	collected: string[],
	missing: string[],
	malformed: Array<{ name: string; value: unknown }>,
): string {
	const parts: string[] = [];

	if (collected.length > 0) {
		parts.push(`I have the following information: ${formatList(collected.map((n) => fieldLabel(schema, n)))}.`);
	}
	if (missing.length > 0) {
		parts.push(`Please provide: ${formatList(missing.map((n) => fieldLabel(schema, n)))}.`);
	}
	for (const { name, value } of malformed) {
		const rule = schema.fields[name];
		const label = fieldLabel(schema, name);
		if (rule?.type === "choice") {
			const got = typeof value === "string" ? ` '${value}'` : "";
			parts.push(`The provided ${label}${got} is not valid. Please specify one of: ${formatList([...rule.choices])}.`);
		} else {
			parts.push(`I could not understand the ${label}. Please state it again.`);
		}
	}

	return parts.join(" ");
}

export function extractionFailedPrompt(reason: string): string {
	return `There was a problem understanding your input (${reason}). Could you repeat or rephrase it?`;
}

export function completionPrompt(schema: RecordSchema, defaulted: Array<{ name: string; value: FieldValue }>): string {
	const parts = ["All required information has been collected."];
	for (const { name, value } of defaulted) {
		parts.push(`Since no ${fieldLabel(schema, name)} was specified, it has been set to '${formatValue(value)}' by default.`);
	}
	return parts.join(" ");
}

export function abortedPrompt(reason: AbortReason): string {
	switch (reason) {
		case "user_abandoned":
			return "Cancelled. Nothing was recorded.";
		case "turn_budget_exceeded":
			return "Giving up: too many turns without a complete record.";
	}
}
