/**
 * Standup agent — formats a daily status update into yesterday / today / blockers.
 */

import { defineSchema } from "../src/core/conversation/schema.js";
import { itemsOf } from "./format.js";
import type { AgentFactory } from "./types.js";

export const STANDUP_SCHEMA = defineSchema({
	name: "daily standup",
	fields: {
		yesterday: {
			type: "list",
			required: true,
			label: "Yesterday",
			description: "What was done yesterday, one item per task.",
		},
		today: {
			type: "list",
			required: true,
			label: "Today",
			description: "What is planned for today, one item per task.",
		},
		blockers: {
			type: "list",
			required: false,
			label: "Blockers",
			description: "Anything blocking progress. Leave out when the user is not blocked.",
			default: ["No blockers"],
		},
	},
});

function section(title: string, items: string[]): string[] {
	return [`- **${title}:**`, ...items.map((item) => `  - ${item}`)];
}

export const createStandupAgent: AgentFactory = () => ({
	name: "standup",
	description: "Turn a free-form status update into a daily standup summary.",
	schema: STANDUP_SCHEMA,
	systemPrompt: [
		"You are a scrum master for a software development team collecting daily standup updates.",
		"",
		"Categorize the information into three sections: yesterday, today, and blockers.",
		"If there is no information for a section, leave it out.",
		"Each item in the lists should start with a capital letter.",
	].join("\n"),
	openingPrompt: "What did you work on yesterday, what are you doing today, and is anything blocking you?",
	present(record) {
		return [
			"### Daily Standup Update",
			...section("Yesterday", itemsOf(record, "yesterday")),
			...section("Today", itemsOf(record, "today")),
			...section("Blockers", itemsOf(record, "blockers")),
		].join("\n");
	},
});
