import type { ExtractedRecord } from "../src/core/conversation/types.js";

/** Read a text field from a completed record; lists are joined with "; ". */
export function textOf(record: ExtractedRecord, name: string): string {
	const value = record[name];
	if (value === undefined) return "";
	return Array.isArray(value) ? value.join("; ") : value;
}

/** Read a list field from a completed record; a single string becomes a one-item list. */
export function itemsOf(record: ExtractedRecord, name: string): string[] {
	const value = record[name];
	if (value === undefined) return [];
	return Array.isArray(value) ? value : [value];
}
