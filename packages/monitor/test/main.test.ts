import { stripAnsi } from "@gpumon/tui";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { resolveConfig } from "../src/config.js";
import { SessionError } from "../src/errors.js";
import { runMonitor, schedulerOptionsFromConfig } from "../src/main.js";
import { A100_OUTPUT, FakeSessionFactory, RecordingTerminal } from "./helpers.js";

const config = resolveConfig({
	ssh: { username: "alice", key_path: "/keys/test-key", timeout: 2, command_timeout: 3.5 },
	targets: { individual: ["gpu01", "gpu02"] },
	display: { refresh_rate: 2, render_interval: 0.1 },
	polling: { max_concurrency: 4 },
});

function scripts() {
	return new FakeSessionFactory({
		gpu01: { stdout: A100_OUTPUT },
		gpu02: { connectError: new SessionError("auth", "target", "gpu02", "permission denied (publickey)") },
	});
}

describe("schedulerOptionsFromConfig", () => {
	it("converts seconds to milliseconds", () => {
		expect(schedulerOptionsFromConfig(config)).toEqual({
			refreshIntervalMs: 2000,
			maxConcurrency: 4,
			connectTimeoutMs: 2000,
			commandTimeoutMs: 3500,
			reuseSessions: true,
		});
	});
});

describe("runMonitor", () => {
	let errors: MockInstance;

	beforeEach(() => {
		errors = vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		errors.mockRestore();
	});

	const printed = () => errors.mock.calls.map((call) => stripAnsi(String(call[0])));

	it("prints a single table with --once", async () => {
		let text = "";
		const factory = scripts();
		const code = await runMonitor(config, {
			once: true,
			sessionFactory: factory,
			keyExists: () => true,
			output: { write: (chunk) => (text += chunk), columns: 100 },
		});
		expect(code).toBe(0);
		const plain = stripAnsi(text);
		expect(plain.endsWith("┘\n")).toBe(true);
		expect(plain).toContain("│ gpu01      │ 0: NVIDIA A100-SXM4-80GB │");
		expect(plain).toContain("│ gpu02      │ auth failed ");
		expect(factory.active).toBe(0);
	});

	it("fails when a key file is missing", async () => {
		const code = await runMonitor(config, { once: true, sessionFactory: scripts(), keyExists: () => false });
		expect(code).toBe(1);
		expect(printed()).toEqual(["Error: SSH key not found: /keys/test-key"]);
	});

	it("fails when there are no targets", async () => {
		const empty = resolveConfig({ ssh: { username: "alice" } });
		const code = await runMonitor(empty, { once: true, sessionFactory: scripts(), keyExists: () => true });
		expect(code).toBe(1);
		expect(printed()).toEqual([
			"Error: No targets configured (set targets.individual, targets.patterns or --targets)",
		]);
	});

	it("needs a terminal for the live view", async () => {
		const code = await runMonitor(config, {
			once: false,
			isTTY: false,
			sessionFactory: scripts(),
			keyExists: () => true,
		});
		expect(code).toBe(1);
		expect(printed()).toEqual(["Error: stdout is not a terminal; use --once for a single plain-text table"]);
	});

	it("runs the live view until q is pressed", async () => {
		const terminal = new RecordingTerminal();
		const factory = scripts();
		const run = runMonitor(config, {
			once: false,
			isTTY: true,
			terminal,
			sessionFactory: factory,
			keyExists: () => true,
			handleSignals: false,
		});
		expect(terminal.started).toBe(true);

		terminal.type("q");
		expect(await run).toBe(0);
		expect(terminal.started).toBe(false);
		expect(stripAnsi(terminal.writes.join(""))).toContain("Goodbye! 👋");
		expect(factory.active).toBe(0);
	});
});
