/**
 * Layered configuration: defaults → ~/.intake/config.json → INTAKE_* env → CLI flags.
 *
 * The config file is optional. An unreadable or invalid file is reported and ignored;
 * invalid values from the environment or flags are a ConfigError.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, errorMessage } from "../core/conversation/errors.js";
import { DEFAULT_MAX_FAILURES, DEFAULT_MAX_TURNS, DEFAULT_TIMEOUT_MS } from "../core/conversation/types.js";

const CONFIG_DIR = ".intake";
const CONFIG_FILE = "config.json";

export const DEFAULT_MODEL = "openai/gpt-4.1-nano";

const ConfigFileSchema = Type.Object({
	model: Type.Optional(Type.String({ minLength: 1 })),
	apiKey: Type.Optional(Type.String({ minLength: 1 })),
	maxTurns: Type.Optional(Type.Integer({ minimum: 1 })),
	maxFailures: Type.Optional(Type.Integer({ minimum: 1 })),
	timeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
	verbose: Type.Optional(Type.Boolean()),
});

export type ConfigFile = Static<typeof ConfigFileSchema>;

export interface IntakeConfig {
	model: string;
	apiKey?: string;
	maxTurns: number;
	maxFailures: number;
	timeoutMs: number;
	verbose: boolean;
}

/** Values given on the command line, still as strings */
export interface ConfigFlags {
	model?: string;
	maxTurns?: string;
	maxFailures?: string;
	timeout?: string;
	verbose?: boolean;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	return env.INTAKE_CONFIG || path.join(os.homedir(), CONFIG_DIR, CONFIG_FILE);
}

export function loadConfigFile(filePath: string): ConfigFile {
	if (!fs.existsSync(filePath)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (e) {
		console.error(`[intake] Ignoring unreadable config file ${filePath}:`, errorMessage(e));
		return {};
	}

	if (!Value.Check(ConfigFileSchema, parsed)) {
		const first = Value.Errors(ConfigFileSchema, parsed).First();
		const detail = first ? `${first.path || "/"} ${first.message}` : "invalid structure";
		console.error(`[intake] Ignoring invalid config file ${filePath}: ${detail}`);
		return {};
	}
	return parsed;
}

function parseCount(value: string, source: string, minimum: number): number {
	const trimmed = value.trim();
	const parsed = Number(trimmed);
	if (trimmed.length === 0 || !Number.isInteger(parsed) || parsed < minimum) {
		throw new ConfigError(`${source} must be an integer >= ${minimum}, got '${value}'`);
	}
	return parsed;
}

function fromEnv(env: NodeJS.ProcessEnv): Partial<IntakeConfig> {
	const result: Partial<IntakeConfig> = {};
	if (env.INTAKE_MODEL) result.model = env.INTAKE_MODEL;
	if (env.INTAKE_API_KEY) result.apiKey = env.INTAKE_API_KEY;
	if (env.INTAKE_MAX_TURNS) result.maxTurns = parseCount(env.INTAKE_MAX_TURNS, "INTAKE_MAX_TURNS", 1);
	if (env.INTAKE_MAX_FAILURES) result.maxFailures = parseCount(env.INTAKE_MAX_FAILURES, "INTAKE_MAX_FAILURES", 1);
	if (env.INTAKE_TIMEOUT_MS) result.timeoutMs = parseCount(env.INTAKE_TIMEOUT_MS, "INTAKE_TIMEOUT_MS", 0);
	return result;
}

function fromFlags(flags: ConfigFlags): Partial<IntakeConfig> {
	const result: Partial<IntakeConfig> = {};
	if (flags.model) result.model = flags.model;
	if (flags.maxTurns !== undefined) result.maxTurns = parseCount(flags.maxTurns, "--max-turns", 1);
	if (flags.maxFailures !== undefined) result.maxFailures = parseCount(flags.maxFailures, "--max-failures", 1);
	if (flags.timeout !== undefined) result.timeoutMs = parseCount(flags.timeout, "--timeout", 0);
	if (flags.verbose) result.verbose = true;
	return result;
}

export function resolveConfig(flags: ConfigFlags = {}, env: NodeJS.ProcessEnv = process.env): IntakeConfig {
	const defaults: IntakeConfig = {
		model: DEFAULT_MODEL,
		maxTurns: DEFAULT_MAX_TURNS,
		maxFailures: DEFAULT_MAX_FAILURES,
		timeoutMs: DEFAULT_TIMEOUT_MS,
		verbose: false,
	};
	return { ...defaults, ...loadConfigFile(getConfigPath(env)), ...fromEnv(env), ...fromFlags(flags) };
}
