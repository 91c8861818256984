import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_MODEL, getConfigPath, loadConfigFile, resolveConfig } from "../src/cli/config.js";
import { ConfigError } from "../src/core/conversation/errors.js";

let tmpDir: string;
let configPath: string;

function writeConfig(content: string): void {
	fs.writeFileSync(configPath, content);
}

beforeEach(() => {
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "intake-config-"));
	configPath = path.join(tmpDir, "config.json");
});

afterEach(() => {
	fs.rmSync(tmpDir, { recursive: true, force: true });
	vi.restoreAllMocks();
});

describe("getConfigPath", () => {
	it("prefers INTAKE_CONFIG", () => {
		expect(getConfigPath({ INTAKE_CONFIG: "/etc/intake.json" })).toBe("/etc/intake.json");
	});

	it("defaults to ~/.intake/config.json", () => {
		expect(getConfigPath({})).toBe(path.join(os.homedir(), ".intake", "config.json"));
	});
});

describe("loadConfigFile", () => {
	it("returns nothing for a missing file", () => {
		expect(loadConfigFile(path.join(tmpDir, "absent.json"))).toEqual({});
	});

	it("ignores a file that is not JSON", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => {});
		writeConfig("{ model: ");

		expect(loadConfigFile(configPath)).toEqual({});
		expect(spy).toHaveBeenCalledTimes(1);
		expect(String(spy.mock.calls[0][0])).toBe(`[intake] Ignoring unreadable config file ${configPath}:`);
	});

	it("ignores a file with values of the wrong type", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => {});
		writeConfig(JSON.stringify({ maxTurns: "lots" }));

		expect(loadConfigFile(configPath)).toEqual({});
		expect(spy).toHaveBeenCalledTimes(1);
		expect(String(spy.mock.calls[0][0])).toContain(`[intake] Ignoring invalid config file ${configPath}: /maxTurns`);
	});
});

describe("resolveConfig", () => {
	it("uses defaults when nothing is configured", () => {
		expect(resolveConfig({}, { INTAKE_CONFIG: configPath })).toEqual({
			model: DEFAULT_MODEL,
			maxTurns: 10,
			maxFailures: 3,
			timeoutMs: 30000,
			verbose: false,
		});
	});

	it("reads the config file", () => {
		writeConfig(JSON.stringify({ model: "anthropic/claude-3-5-haiku-latest", maxTurns: 4, verbose: true }));

		const config = resolveConfig({}, { INTAKE_CONFIG: configPath });
		expect(config).toMatchObject({ model: "anthropic/claude-3-5-haiku-latest", maxTurns: 4, verbose: true });
	});

	it("lets the environment override the file", () => {
		writeConfig(JSON.stringify({ model: "openai/gpt-4.1-mini", maxFailures: 5 }));

		const config = resolveConfig(
			{},
			{ INTAKE_CONFIG: configPath, INTAKE_MODEL: "openai/gpt-4o", INTAKE_MAX_FAILURES: "2", INTAKE_API_KEY: "test-key" },
		);
		expect(config).toMatchObject({ model: "openai/gpt-4o", maxFailures: 2, apiKey: "test-key" });
	});

	it("lets flags override the environment", () => {
		const config = resolveConfig(
			{ model: "openai/gpt-4.1", maxTurns: "3", timeout: "0" },
			{ INTAKE_CONFIG: configPath, INTAKE_MODEL: "openai/gpt-4o", INTAKE_MAX_TURNS: "8", INTAKE_TIMEOUT_MS: "500" },
		);
		expect(config).toMatchObject({ model: "openai/gpt-4.1", maxTurns: 3, timeoutMs: 0 });
	});

	it("rejects non-numeric and out-of-range counts", () => {
		expect(() => resolveConfig({ maxTurns: "many" }, { INTAKE_CONFIG: configPath })).toThrow(
			"--max-turns must be an integer >= 1, got 'many'",
		);
		expect(() => resolveConfig({ maxFailures: "0" }, { INTAKE_CONFIG: configPath })).toThrow(ConfigError);
		expect(() => resolveConfig({}, { INTAKE_CONFIG: configPath, INTAKE_TIMEOUT_MS: "-1" })).toThrow(
			"INTAKE_TIMEOUT_MS must be an integer >= 0, got '-1'",
		);
	});
});
