/**
 * Conversation session — turns free-form user input into a validated record.
 *
 * The session owns the loop control only: it appends turns, hands the whole
 * history to the extractor, merges the candidate field by field, validates it
 * and decides whether to ask again, finish, or give up. Language understanding
 * is delegated to the Extractor.
 *
 * States: awaiting_input → extracting → validating → awaiting_input | complete,
 * and any non-terminal state → aborted.
 */

import { withTimeout } from "../extraction/timeout.js";
import { ConfigError, ExtractionUnavailableError, SessionClosedError, TurnInProgressError, errorMessage, toError } from "./errors.js";
import { abortedPrompt, completionPrompt, extractionFailedPrompt, followUpPrompt } from "./prompts.js";
import { type Candidate, applyDefaults, fieldLabel, isEmptyValue, normalizeCandidate, validate } from "./schema.js";
import {
	type AbortReason,
	DEFAULT_CANCEL_COMMANDS,
	DEFAULT_MAX_FAILURES,
	DEFAULT_MAX_TURNS,
	DEFAULT_TIMEOUT_MS,
	type ExtractedRecord,
	type Extractor,
	type FieldValue,
	type OnSessionEventCallback,
	type RecordSchema,
	type SessionEvent,
	type SessionOptions,
	type SessionStatus,
	type Turn,
	type TurnResult,
} from "./types.js";

/**
 * Merge a new extraction into the running candidate.
 * Fields present in `next` replace earlier values; fields it omits are kept.
 */
export function mergeCandidate(previous: Candidate, next: Candidate): Candidate {
	const merged: Candidate = { ...previous };
	for (const [name, value] of Object.entries(next)) {
		if (!isEmptyValue(value)) merged[name] = value;
	}
	return merged;
}

function checkLimit(name: string, value: number, minimum: number): number {
	if (!Number.isInteger(value) || value < minimum) {
		throw new ConfigError(`${name} must be an integer >= ${minimum}, got ${value}`);
	}
	return value;
}

export class ConversationSession {
	readonly schema: RecordSchema;
	readonly openingPrompt: string;

	private readonly extractor: Extractor;
	private readonly maxFailures: number;
	private readonly maxTurns: number;
	private readonly timeoutMs: number;
	private readonly cancelCommands: Set<string>;
	private readonly onEvent?: OnSessionEventCallback;

	private _status: SessionStatus = "awaiting_input";
	private readonly _turns: Turn[] = [];
	private _candidate: Candidate = {};
	private _failures = 0;
	private _userTurns = 0;
	private lastPrompt: string;
	private inFlight?: AbortController;
	private finalResult?: TurnResult;

	constructor(schema: RecordSchema, extractor: Extractor, options: SessionOptions = {}) {
		this.schema = schema;
		this.extractor = extractor;
		this.maxFailures = checkLimit("maxFailures", options.maxFailures ?? DEFAULT_MAX_FAILURES, 1);
		this.maxTurns = checkLimit("maxTurns", options.maxTurns ?? DEFAULT_MAX_TURNS, 1);
		this.timeoutMs = checkLimit("timeoutMs", options.timeoutMs ?? DEFAULT_TIMEOUT_MS, 0);
		this.cancelCommands = new Set(
			(options.cancelCommands ?? DEFAULT_CANCEL_COMMANDS).map((c) => c.trim().toLowerCase()),
		);
		this.onEvent = options.onEvent;
		this.openingPrompt = options.openingPrompt ?? this.defaultOpeningPrompt();
		this.lastPrompt = this.openingPrompt;
	}

	get status(): SessionStatus {
		return this._status;
	}

	get turns(): readonly Turn[] {
		return [...this._turns];
	}

	/** Current merged candidate (possibly incomplete or malformed) */
	get candidate(): Readonly<Candidate> {
		return { ...this._candidate };
	}

	get failures(): number {
		return this._failures;
	}

	get userTurns(): number {
		return this._userTurns;
	}

	get active(): boolean {
		return this._status !== "complete" && this._status !== "aborted";
	}

	/** Process one user message. Throws if the session is closed or busy. */
	async submitTurn(text: string): Promise<TurnResult> {
		if (!this.active) {
			throw new SessionClosedError(`Session is ${this._status}; no further turns are accepted`);
		}
		if (this._status !== "awaiting_input") {
			throw new TurnInProgressError("The previous turn is still being processed");
		}

		const trimmed = text.trim();
		if (this.cancelCommands.has(trimmed.toLowerCase())) {
			return this.abort("user_abandoned");
		}
		if (trimmed.length === 0) {
			return { active: true, prompt: this.lastPrompt, outcome: { status: "awaiting_input" } };
		}

		this._turns.push({ role: "user", text: trimmed });
		this._userTurns++;
		this.emit({ type: "turn_started", turn: this._userTurns, text: trimmed });

		this._status = "extracting";
		const controller = new AbortController();
		this.inFlight = controller;

		let raw: unknown;
		try {
			raw = await withTimeout(
				(signal) => this.extractor.extract({ schema: this.schema, turns: this.turns, signal }),
				this.timeoutMs,
				controller,
			);
		} catch (error) {
			return this.finalResult ?? this.recordFailure(error);
		} finally {
			this.inFlight = undefined;
		}

		// cancel() may have been called while the extractor was running
		if (this.finalResult) return this.finalResult;

		if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
			return this.recordFailure(new ExtractionUnavailableError("the extractor returned no candidate"));
		}

		this._status = "validating";
		this._candidate = mergeCandidate(this._candidate, normalizeCandidate(this.schema, raw));

		const result = validate(this.schema, this._candidate);
		if (result.valid) {
			return this.complete(result.record);
		}

		this.emit({ type: "validation_failed", missing: result.missing, malformed: result.malformed });
		if (this.budgetExhausted()) {
			return this.abort("turn_budget_exceeded");
		}

		const problems = new Set([...result.missing, ...result.malformed]);
		const collected = Object.keys(this.schema.fields).filter(
			(name) => !problems.has(name) && !isEmptyValue(this._candidate[name]),
		);
		const malformed = result.malformed.map((name) => ({ name, value: this._candidate[name] }));
		return this.ask(followUpPrompt(this.schema, collected, result.missing, malformed));
	}

	/** Abandon the session. Safe to call at any time; a no-op once terminal. */
	cancel(): TurnResult {
		if (this.finalResult) return this.finalResult;
		this.inFlight?.abort();
		return this.abort("user_abandoned");
	}

	// =========================================================================
	// Transitions
	// =========================================================================

	private ask(prompt: string): TurnResult {
		this._turns.push({ role: "system", text: prompt });
		this.lastPrompt = prompt;
		this._status = "awaiting_input";
		return { active: true, prompt, outcome: { status: "awaiting_input" } };
	}

	private recordFailure(error: unknown): TurnResult {
		const failure =
			error instanceof ExtractionUnavailableError
				? error
				: new ExtractionUnavailableError(errorMessage(error), { cause: toError(error) });

		this._failures++;
		this.emit({ type: "extraction_failed", failures: this._failures, error: failure });

		if (this.budgetExhausted()) {
			return this.abort("turn_budget_exceeded");
		}
		return this.ask(extractionFailedPrompt(failure.message));
	}

	private complete(record: ExtractedRecord): TurnResult {
		const finalRecord = applyDefaults(this.schema, record);
		const defaulted: Array<{ name: string; value: FieldValue }> = [];
		for (const [name, value] of Object.entries(finalRecord)) {
			if (!(name in record)) defaulted.push({ name, value });
		}

		const prompt = completionPrompt(this.schema, defaulted);
		this._turns.push({ role: "system", text: prompt });
		this._status = "complete";
		this.emit({ type: "completed", record: finalRecord, defaulted: defaulted.map((d) => d.name) });

		this.finalResult = {
			active: false,
			prompt,
			record: finalRecord,
			outcome: { status: "complete", record: finalRecord },
		};
		return this.finalResult;
	}

	private abort(reason: AbortReason): TurnResult {
		const prompt = abortedPrompt(reason);
		this._turns.push({ role: "system", text: prompt });
		this._status = "aborted";
		this.emit({ type: "aborted", reason });

		this.finalResult = { active: false, prompt, outcome: { status: "aborted", reason } };
		return this.finalResult;
	}

	// =========================================================================
	// Helpers
	// =========================================================================

	private budgetExhausted(): boolean {
		return this._failures >= this.maxFailures || this._userTurns >= this.maxTurns;
	}

	private defaultOpeningPrompt(): string {
		const required = Object.entries(this.schema.fields)
			.filter(([, rule]) => rule.required)
			.map(([name]) => fieldLabel(this.schema, name));
		return `Please provide: ${required.join(", ")}.`;
	}

	private emit(event: SessionEvent): void {
		if (!this.onEvent) return;
		try {
			this.onEvent(event);
		} catch (err) {
			console.error("[intake] event listener failed:", err);
		}
	}
}

/** Create a fresh session. Each session owns its own turn history and candidate. */
export function startSession(schema: RecordSchema, extractor: Extractor, options?: SessionOptions): ConversationSession {
	return new ConversationSession(schema, extractor, options);
}
