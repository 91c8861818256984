/**
 * Agent registry — built-in agent discovery and lookup.
 */

import { createBugReportAgent } from "./bug-report.js";
import { createStandupAgent } from "./standup.js";
import type { AgentDefinition, AgentFactory } from "./types.js";

export type { AgentDefinition, AgentFactory } from "./types.js";

/** All built-in agent factories */
const BUILTIN_FACTORIES: AgentFactory[] = [createBugReportAgent, createStandupAgent];

let cachedAgents: Map<string, AgentDefinition> | undefined;

export function createBuiltinAgents(): Map<string, AgentDefinition> {
	if (cachedAgents) return cachedAgents;

	cachedAgents = new Map();
	for (const factory of BUILTIN_FACTORIES) {
		const agent = factory();
		cachedAgents.set(agent.name, agent);
	}
	return cachedAgents;
}

/** Get a single agent by name */
export function getAgent(name: string): AgentDefinition | undefined {
	return createBuiltinAgents().get(name);
}

export function listAgents(): AgentDefinition[] {
	return Array.from(createBuiltinAgents().values());
}
