/**
 * Error taxonomy for sessions, schemas and configuration.
 */

export class IntakeError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The extractor could not produce a usable candidate for this turn. Recoverable. */
export class ExtractionUnavailableError extends IntakeError {}

/** A turn was submitted to a session that already reached a terminal state. */
export class SessionClosedError extends IntakeError {}

/** A turn was submitted while the previous one was still being extracted. */
export class TurnInProgressError extends IntakeError {}

export class SchemaDefinitionError extends IntakeError {}

export class ConfigError extends IntakeError {}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
