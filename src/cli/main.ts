/**
 * intake command — drives a conversational agent from the terminal.
 *
 *   intake list
 *   intake <agent> [text...] [--model provider/id] [--max-turns n] [--max-failures n] [--timeout ms] [--verbose]
 *
 * Text given on the command line is submitted as the first turn; further turns
 * are read from stdin until the record is complete or the session is abandoned.
 */

import { parseArgs } from "node:util";
import { type AgentDefinition, getAgent, listAgents } from "../../built-in-agents/index.js";
import { errorMessage } from "../core/conversation/errors.js";
import { type ConversationSession, startSession } from "../core/conversation/session.js";
import type { Extractor, SessionEvent, TurnResult } from "../core/conversation/types.js";
import { LlmExtractor, resolveModel } from "../core/extraction/llm.js";
import { type IntakeConfig, resolveConfig } from "./config.js";
import { createTerminalPrompter, type Prompter } from "./prompter.js";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

const USAGE = [
	"Usage: intake <agent> [text...] [options]",
	"       intake list",
	"",
	"Options:",
	"  --model <provider/id>   Model used for extraction",
	"  --max-turns <n>         Give up after n turns without a complete record",
	"  --max-failures <n>      Give up after n failed extractions",
	"  --timeout <ms>          Per-extraction timeout (0 disables)",
	"  -v, --verbose           Log extraction and validation failures to stderr",
	"  -h, --help              Show this help",
].join("\n");

export interface CliDeps {
	env?: NodeJS.ProcessEnv;
	prompter?: Prompter;
	createExtractor?: (agent: AgentDefinition, config: IntakeConfig) => Extractor;
}

function createLlmExtractor(agent: AgentDefinition, config: IntakeConfig): Extractor {
	return new LlmExtractor({
		model: resolveModel(config.model),
		systemPrompt: agent.systemPrompt,
		apiKey: config.apiKey,
	});
}

function logEvent(event: SessionEvent): void {
	switch (event.type) {
		case "extraction_failed":
			console.error(`[intake] extraction failed (${event.failures}):`, event.error.message);
			break;
		case "validation_failed":
			console.error(
				`[intake] incomplete record; missing: ${event.missing.join(", ") || "none"}; malformed: ${event.malformed.join(", ") || "none"}`,
			);
			break;
		case "completed":
			if (event.defaulted.length > 0) console.error(`[intake] defaulted: ${event.defaulted.join(", ")}`);
			break;
		case "aborted":
			console.error(`[intake] session aborted: ${event.reason}`);
			break;
		case "turn_started":
			break;
	}
}

/**
 * Read/print loop for one session. End of input abandons the session.
 */
export async function runSession(
	session: ConversationSession,
	prompter: Prompter,
	firstTurn?: string,
): Promise<TurnResult> {
	let text = firstTurn;
	if (text === undefined) prompter.print(`Agent: ${session.openingPrompt}`);

	for (;;) {
		if (text === undefined) {
			text = await prompter.input("You: ");
			if (text === undefined) {
				const cancelled = session.cancel();
				if (cancelled.prompt) prompter.print(`Agent: ${cancelled.prompt}`);
				return cancelled;
			}
		}

		const result = await session.submitTurn(text);
		text = undefined;
		if (result.prompt) prompter.print(`Agent: ${result.prompt}`);
		if (!result.active) return result;
	}
}

export function exitCodeFor(result: TurnResult): number {
	switch (result.outcome.status) {
		case "complete":
			return EXIT_OK;
		case "aborted":
			return result.outcome.reason === "user_abandoned" ? EXIT_CANCELLED : EXIT_ERROR;
		case "awaiting_input":
			return EXIT_ERROR;
	}
}

function parseCli(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			model: { type: "string" },
			"max-turns": { type: "string" },
			"max-failures": { type: "string" },
			timeout: { type: "string" },
			verbose: { type: "boolean", short: "v" },
			help: { type: "boolean", short: "h" },
		},
	});
}

export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
	let parsed: ReturnType<typeof parseCli>;
	try {
		parsed = parseCli(argv);
	} catch (e) {
		console.error(`[intake] ${errorMessage(e)}`);
		console.error(USAGE);
		return EXIT_USAGE;
	}

	const { values, positionals } = parsed;
	const [command, ...rest] = positionals;

	if (values.help || !command) {
		console.log(USAGE);
		return values.help ? EXIT_OK : EXIT_USAGE;
	}

	if (command === "list") {
		for (const agent of listAgents()) {
			console.log(`${agent.name.padEnd(12)} ${agent.description}`);
		}
		return EXIT_OK;
	}

	const agent = getAgent(command);
	if (!agent) {
		const known = listAgents()
			.map((a) => a.name)
			.join(", ");
		console.error(`[intake] Unknown agent '${command}'. Available: ${known}`);
		return EXIT_USAGE;
	}

	const prompter = deps.prompter ?? createTerminalPrompter();
	try {
		const config = resolveConfig(
			{
				model: values.model,
				maxTurns: values["max-turns"],
				maxFailures: values["max-failures"],
				timeout: values.timeout,
				verbose: values.verbose,
			},
			deps.env ?? process.env,
		);
		const extractor = (deps.createExtractor ?? createLlmExtractor)(agent, config);
		const session = startSession(agent.schema, extractor, {
			maxTurns: config.maxTurns,
			maxFailures: config.maxFailures,
			timeoutMs: config.timeoutMs,
			openingPrompt: agent.openingPrompt,
			onEvent: config.verbose ? logEvent : undefined,
		});

		const firstTurn = rest.length > 0 ? rest.join(" ") : undefined;
		const result = await runSession(session, prompter, firstTurn);
		if (result.record) {
			prompter.print("");
			prompter.print(agent.present(result.record));
		}
		return exitCodeFor(result);
	} catch (e) {
		console.error(`[intake] ${errorMessage(e)}`);
		return EXIT_ERROR;
	} finally {
		prompter.close();
	}
}
