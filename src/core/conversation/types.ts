/**
 * Shared types for the conversation extractor.
 */

// =============================================================================
// Schema
// =============================================================================

export type FieldType = "text" | "list" | "choice";

interface BaseFieldRule {
	required: boolean;
	/** Shown to the model as the tool parameter description */
	description: string;
	/** Human-readable name used in prompts and presenters */
	label?: string;
}

export interface TextFieldRule extends BaseFieldRule {
	type: "text";
	default?: string;
}

export interface ListFieldRule extends BaseFieldRule {
	type: "list";
	default?: string[];
}

export interface ChoiceFieldRule extends BaseFieldRule {
	type: "choice";
	choices: readonly string[];
	default?: string;
}

export type FieldRule = TextFieldRule | ListFieldRule | ChoiceFieldRule;

export interface RecordSchema {
	name: string;
	fields: Record<string, FieldRule>;
}

export type FieldValue = string | string[];

/** A completed (or partially collected) record. Keys are schema field names. */
export type ExtractedRecord = Record<string, FieldValue>;

export type ValidationResult =
	| { valid: true; record: ExtractedRecord }
	| { valid: false; missing: string[]; malformed: string[] };

// =============================================================================
// Session
// =============================================================================

export type TurnRole = "user" | "system";

export interface Turn {
	role: TurnRole;
	text: string;
}

export type SessionStatus = "awaiting_input" | "extracting" | "validating" | "complete" | "aborted";

export type AbortReason = "turn_budget_exceeded" | "user_abandoned";

export type TurnOutcome =
	| { status: "awaiting_input" }
	| { status: "complete"; record: ExtractedRecord }
	| { status: "aborted"; reason: AbortReason };

export interface TurnResult {
	/** False once the session reached a terminal state */
	active: boolean;
	/** Next message for the user, if any */
	prompt?: string;
	/** Final defaulted record, only on completion */
	record?: ExtractedRecord;
	outcome: TurnOutcome;
}

export type SessionEvent =
	| { type: "turn_started"; turn: number; text: string }
	| { type: "extraction_failed"; failures: number; error: Error }
	| { type: "validation_failed"; missing: string[]; malformed: string[] }
	| { type: "completed"; record: ExtractedRecord; defaulted: string[] }
	| { type: "aborted"; reason: AbortReason };

export type OnSessionEventCallback = (event: SessionEvent) => void;

export interface SessionOptions {
	/** Extraction failures tolerated before aborting (default: 3) */
	maxFailures?: number;
	/** User turns allowed before aborting (default: 10) */
	maxTurns?: number;
	/** Per-extraction timeout in ms, 0 disables (default: 30000) */
	timeoutMs?: number;
	/** Inputs that abandon the session, compared case-insensitively after trimming */
	cancelCommands?: readonly string[];
	/** First question shown to the user, repeated on blank input before any other prompt */
	openingPrompt?: string;
	onEvent?: OnSessionEventCallback;
}

// =============================================================================
// Extraction
// =============================================================================

export interface ExtractionRequest {
	schema: RecordSchema;
	turns: readonly Turn[];
	signal: AbortSignal;
}

/**
 * Maps the turn history to a best-effort candidate record.
 * The result is not trusted: it is normalized and validated by the session.
 * Throwing or resolving to a non-object counts as an extraction failure.
 */
export interface Extractor {
	extract(request: ExtractionRequest): Promise<unknown>;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MAX_FAILURES = 3;
export const DEFAULT_MAX_TURNS = 10;
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_CANCEL_COMMANDS: readonly string[] = ["cancel", "quit", "exit", "/cancel"];
