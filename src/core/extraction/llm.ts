/**
 * Language-model extractor.
 *
 * Sends the agent's system prompt plus the whole turn history to a model and
 * offers a single tool whose parameters are generated from the record schema.
 * The arguments of the tool call are the candidate record.
 */

import {
	type Api,
	type AssistantMessage,
	complete,
	getModels,
	getProviders,
	type Model,
	type Tool,
	type ToolCall,
	type UserMessage,
} from "@mariozechner/pi-ai";
import { ConfigError, ExtractionUnavailableError, errorMessage, toError } from "../conversation/errors.js";
import { schemaParameters } from "../conversation/schema.js";
import type { ExtractionRequest, Extractor, Turn } from "../conversation/types.js";

export const RECORD_TOOL_NAME = "record_fields";

export interface LlmExtractorOptions {
	model: Model<Api>;
	systemPrompt: string;
	/** Falls back to the provider's environment variable when unset */
	apiKey?: string;
	temperature?: number;
	maxTokens?: number;
}

/**
 * Look up a model by "provider/model-id" in the pi-ai registry.
 * Model ids may themselves contain slashes (e.g. openrouter ids).
 */
export function resolveModel(spec: string): Model<Api> {
	const slash = spec.indexOf("/");
	if (slash <= 0 || slash === spec.length - 1) {
		throw new ConfigError(`Model must be given as provider/model-id, got '${spec}'`);
	}

	const providerName = spec.slice(0, slash);
	const modelId = spec.slice(slash + 1);

	const provider = getProviders().find((p) => p === providerName);
	if (!provider) {
		throw new ConfigError(`Unknown provider '${providerName}'`);
	}

	const model: Model<Api> | undefined = getModels(provider).find((m) => m.id === modelId);
	if (!model) {
		throw new ConfigError(`Unknown model '${modelId}' for provider '${providerName}'`);
	}
	return model;
}

/** Render the turn history as a plain transcript for the model. */
export function renderTranscript(turns: readonly Turn[]): string {
	const lines = turns.map((turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.text}`);
	return [
		"Conversation so far:",
		...lines,
		"",
		`Call the ${RECORD_TOOL_NAME} tool with every field you can fill in from the user's messages.`,
		"Leave out fields the user has not provided. Do not invent values.",
	].join("\n");
}

export class LlmExtractor implements Extractor {
	private readonly options: LlmExtractorOptions;

	constructor(options: LlmExtractorOptions) {
		this.options = options;
	}

	async extract({ schema, turns, signal }: ExtractionRequest): Promise<unknown> {
		const tool: Tool = {
			name: RECORD_TOOL_NAME,
			description: `Record the ${schema.name} fields found in the conversation.`,
			parameters: schemaParameters(schema),
		};
		const message: UserMessage = {
			role: "user",
			content: [{ type: "text", text: renderTranscript(turns) }],
			timestamp: Date.now(),
		};

		let response: AssistantMessage;
		try {
			response = await complete(
				this.options.model,
				{ systemPrompt: this.options.systemPrompt, messages: [message], tools: [tool] },
				{
					apiKey: this.options.apiKey,
					signal,
					temperature: this.options.temperature,
					maxTokens: this.options.maxTokens,
				},
			);
		} catch (error) {
			throw new ExtractionUnavailableError(errorMessage(error), { cause: toError(error) });
		}

		if (response.stopReason === "error" || response.stopReason === "aborted") {
			throw new ExtractionUnavailableError(response.errorMessage ?? `model request ${response.stopReason}`);
		}

		const call = response.content.find(
			(part): part is ToolCall => part.type === "toolCall" && part.name === RECORD_TOOL_NAME,
		);
		if (!call) {
			throw new ExtractionUnavailableError("the model did not return any fields");
		}
		return call.arguments;
	}
}
