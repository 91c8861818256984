import { type Api, type AssistantMessage, complete, getModels, type Model } from "@mariozechner/pi-ai";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { STANDUP_SCHEMA } from "../built-in-agents/standup.js";
import { ConfigError, ExtractionUnavailableError } from "../src/core/conversation/errors.js";
import { LlmExtractor, RECORD_TOOL_NAME, renderTranscript, resolveModel } from "../src/core/extraction/llm.js";

// Keep the real model registry, stub the network call
vi.mock("@mariozechner/pi-ai", async (importOriginal) => {
	const actual = await importOriginal<typeof import("@mariozechner/pi-ai")>();
	return { ...actual, complete: vi.fn() };
});

const mockComplete = vi.mocked(complete);

const testModel = { id: "test-model", name: "Test Model", provider: "openai", api: "openai-responses" } as unknown as Model<Api>;

function assistant(content: unknown[], stopReason = "toolUse", errorMessage?: string): AssistantMessage {
	return {
		role: "assistant",
		content,
		api: "openai-responses",
		provider: "openai",
		model: "test-model",
		usage: {
			input: 0,
			output: 0,
			cacheRead: 0,
			cacheWrite: 0,
			totalTokens: 0,
			cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
		},
		stopReason,
		errorMessage,
		timestamp: 0,
	} as unknown as AssistantMessage;
}

function request(signal = new AbortController().signal) {
	return {
		schema: STANDUP_SCHEMA,
		turns: [{ role: "user" as const, text: "Yesterday reviews, today deploy" }],
		signal,
	};
}

describe("renderTranscript", () => {
	it("labels user and system turns and ends with the tool instruction", () => {
		const text = renderTranscript([
			{ role: "user", text: "Checkout is broken" },
			{ role: "system", text: "Please provide: Error Message." },
		]);
		expect(text).toBe(
			[
				"Conversation so far:",
				"User: Checkout is broken",
				"Assistant: Please provide: Error Message.",
				"",
				"Call the record_fields tool with every field you can fill in from the user's messages.",
				"Leave out fields the user has not provided. Do not invent values.",
			].join("\n"),
		);
	});
});

describe("LlmExtractor", () => {
	beforeEach(() => {
		mockComplete.mockReset();
	});

	it("returns the arguments of the record_fields tool call", async () => {
		mockComplete.mockResolvedValue(
			assistant([
				{ type: "text", text: "Recording fields." },
				{ type: "toolCall", id: "call-1", name: RECORD_TOOL_NAME, arguments: { yesterday: ["Reviews"] } },
			]),
		);
		const extractor = new LlmExtractor({ model: testModel, systemPrompt: "sys" });

		await expect(extractor.extract(request())).resolves.toEqual({ yesterday: ["Reviews"] });
	});

	it("sends the system prompt, transcript, tool schema and abort signal", async () => {
		mockComplete.mockResolvedValue(
			assistant([{ type: "toolCall", id: "call-1", name: RECORD_TOOL_NAME, arguments: {} }]),
		);
		const extractor = new LlmExtractor({ model: testModel, systemPrompt: "You are a scrum master.", apiKey: "test-key" });
		const controller = new AbortController();

		await extractor.extract(request(controller.signal));

		expect(mockComplete).toHaveBeenCalledTimes(1);
		const [model, context, options] = mockComplete.mock.calls[0];
		expect(model).toBe(testModel);
		expect(context.systemPrompt).toBe("You are a scrum master.");
		expect(context.tools?.map((t) => t.name)).toEqual([RECORD_TOOL_NAME]);
		expect(context.tools?.[0].parameters).toMatchObject({
			type: "object",
			properties: { yesterday: { type: "array" }, today: { type: "array" }, blockers: { type: "array" } },
		});
		expect(context.messages).toHaveLength(1);
		expect(context.messages[0]).toMatchObject({
			role: "user",
			content: [{ type: "text", text: expect.stringContaining("User: Yesterday reviews, today deploy") }],
		});
		expect(options).toMatchObject({ apiKey: "test-key", signal: controller.signal });
	});

	it("fails when the model response is an error", async () => {
		mockComplete.mockResolvedValue(assistant([], "error", "rate limited"));
		const extractor = new LlmExtractor({ model: testModel, systemPrompt: "sys" });

		const promise = extractor.extract(request());

		await expect(promise).rejects.toBeInstanceOf(ExtractionUnavailableError);
		await expect(promise).rejects.toThrow("rate limited");
	});

	it("fails when the request was aborted", async () => {
		mockComplete.mockResolvedValue(assistant([], "aborted"));
		const extractor = new LlmExtractor({ model: testModel, systemPrompt: "sys" });

		await expect(extractor.extract(request())).rejects.toThrow("model request aborted");
	});

	it("fails when the model answers without calling the tool", async () => {
		mockComplete.mockResolvedValue(assistant([{ type: "text", text: "Sure, tell me more." }], "stop"));
		const extractor = new LlmExtractor({ model: testModel, systemPrompt: "sys" });

		await expect(extractor.extract(request())).rejects.toThrow("the model did not return any fields");
	});

	it("wraps errors thrown by the client", async () => {
		mockComplete.mockRejectedValue(new Error("No API key for provider: openai"));
		const extractor = new LlmExtractor({ model: testModel, systemPrompt: "sys" });

		const promise = extractor.extract(request());

		await expect(promise).rejects.toBeInstanceOf(ExtractionUnavailableError);
		await expect(promise).rejects.toThrow("No API key for provider: openai");
	});
});

describe("resolveModel", () => {
	it("finds a registered model by provider/id", () => {
		const [first] = getModels("openai");
		expect(resolveModel(`openai/${first.id}`)).toEqual(first);
	});

	it("rejects specs without a provider", () => {
		expect(() => resolveModel("gpt-4.1-nano")).toThrow(ConfigError);
		expect(() => resolveModel("openai/")).toThrow(ConfigError);
	});

	it("rejects unknown providers and models", () => {
		expect(() => resolveModel("nowhere/model")).toThrow("Unknown provider 'nowhere'");
		expect(() => resolveModel("openai/not-a-real-model")).toThrow("Unknown model 'not-a-real-model' for provider 'openai'");
	});
});
