/**
 * Bug report agent — collects a structured bug report over several turns.
 */

import { defineSchema } from "../src/core/conversation/schema.js";
import { itemsOf, textOf } from "./format.js";
import type { AgentFactory } from "./types.js";

export const SEVERITIES = ["Low", "Medium", "High"] as const;

export const BUG_REPORT_SCHEMA = defineSchema({
	name: "bug report",
	fields: {
		project_affected: {
			type: "text",
			required: true,
			label: "Project Affected",
			description: "Name of the affected project or component.",
		},
		error_message: {
			type: "text",
			required: true,
			label: "Error Message",
			description: "Error message or description of the problem.",
		},
		steps_to_reproduce: {
			type: "list",
			required: true,
			label: "Steps To Reproduce",
			description: "Steps to reproduce the issue, one per item.",
		},
		severity: {
			type: "choice",
			required: false,
			label: "Severity",
			description: "Severity of the bug.",
			choices: SEVERITIES,
			default: "Medium",
		},
	},
});

export const createBugReportAgent: AgentFactory = () => ({
	name: "bug-report",
	description: "Collect a bug report: affected project, error message, steps to reproduce and severity.",
	schema: BUG_REPORT_SCHEMA,
	systemPrompt: [
		"You are a helpful assistant collecting bug reports.",
		"",
		"Read the conversation and extract the bug report fields the user has provided so far:",
		"- project_affected: the project or component that is broken",
		"- error_message: the error message or a short description of the problem",
		"- steps_to_reproduce: each step as a separate item, in order",
		`- severity: one of ${SEVERITIES.join(", ")}, only if the user states or clearly implies it`,
		"",
		"Later messages may correct earlier ones; use the most recent information.",
	].join("\n"),
	openingPrompt: "Describe the bug: which project is affected, what error you see, and how to reproduce it.",
	present(record) {
		const lines = [
			`Project Affected: ${textOf(record, "project_affected")}`,
			`Error Message: ${textOf(record, "error_message")}`,
			"Steps To Reproduce:",
			...itemsOf(record, "steps_to_reproduce").map((step, i) => `  ${i + 1}. ${step}`),
			`Severity: ${textOf(record, "severity")}`,
		];
		return lines.join("\n");
	},
});
