import { stripAnsi, visibleWidth } from "@gpumon/tui";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ProbeResult } from "../src/types.js";
import { buildRows, describeFailure, FleetView, LiveView, renderSnapshot } from "../src/view.js";
import { makeTarget, RecordingTerminal } from "./helpers.js";

const timing = { timestamp: 0, durationMs: 10 };

const success: ProbeResult = {
	status: "success",
	skippedLines: 0,
	devices: [
		{
			index: 0,
			name: "NVIDIA A100-SXM4-80GB",
			memoryUsedMiB: 1024,
			memoryTotalMiB: 81920,
			utilizationPercent: 37,
			processCount: 2,
		},
		{
			index: 1,
			name: "NVIDIA A100-SXM4-80GB",
			memoryUsedMiB: 0,
			memoryTotalMiB: 81920,
			utilizationPercent: 0,
			processCount: 0,
		},
	],
	...timing,
};

const plainRows = (rows: string[][]) => rows.map((row) => row.map(stripAnsi));

describe("describeFailure", () => {
	it("gives a short status for each failure", () => {
		expect(describeFailure({ status: "auth_failure", detail: "permission denied", ...timing })).toBe("auth failed");
		expect(describeFailure({ status: "timeout", phase: "connect", detail: "slow", ...timing })).toBe("timeout (connect)");
		expect(describeFailure({ status: "parse_failure", detail: "bad", raw: "???", ...timing })).toBe("parse error");
		expect(
			describeFailure({ status: "connect_failure", hop: "jump", detail: "jump host bastion: connection refused", ...timing }),
		).toBe("jump host unreachable: jump host bastion: connection refused");
		expect(describeFailure({ status: "connect_failure", hop: "target", detail: "no route to host", ...timing })).toBe(
			"unreachable: no route to host",
		);
	});
});

describe("buildRows", () => {
	it("shows one row per GPU with the host name on the first only", () => {
		const rows = buildRows([{ target: makeTarget("gpu01"), result: success }]);
		expect(plainRows(rows)).toEqual([
			["gpu01", "0: NVIDIA A100-SXM4-80GB", "no", "2", "37%", "1024/81920 MiB"],
			["", "1: NVIDIA A100-SXM4-80GB", "yes", "0", "0%", "0/81920 MiB"],
		]);
	});

	it("shows pending, failed and empty hosts on a single row", () => {
		const rows = buildRows([
			{ target: makeTarget("gpu01") },
			{ target: makeTarget("gpu02", { label: "spare" }), result: { status: "auth_failure", detail: "x", ...timing } },
			{ target: makeTarget("gpu03"), result: { status: "success", devices: [], skippedLines: 0, ...timing } },
		]);
		expect(plainRows(rows)).toEqual([
			["gpu01", "pending", "—", "—", "—", "—"],
			["spare", "auth failed", "—", "—", "—", "—"],
			["gpu03", "no GPUs", "—", "—", "—", "—"],
		]);
	});
});

describe("FleetView", () => {
	it("marks itself dirty on updates and clean after rendering", () => {
		const view = new FleetView([makeTarget("gpu01")], { refreshIntervalMs: 5000 });
		view.render(100);
		expect(view.isDirty).toBe(false);

		view.applyUpdate("gpu01", success);
		expect(view.isDirty).toBe(true);
		view.render(100);
		expect(view.isDirty).toBe(false);
	});

	it("ignores updates for unknown targets", () => {
		const view = new FleetView([makeTarget("gpu01")], { refreshIntervalMs: 5000 });
		view.render(100);
		view.applyUpdate("other", success);
		expect(view.isDirty).toBe(false);
		expect(view.entries()).toEqual([{ target: makeTarget("gpu01") }]);
	});

	it("keeps only the latest result per target", () => {
		const view = new FleetView([makeTarget("gpu01")], { refreshIntervalMs: 5000 });
		view.applyUpdate("gpu01", { status: "auth_failure", detail: "x", ...timing });
		view.applyUpdate("gpu01", success);
		expect(view.counts()).toEqual({ ok: 1, failed: 0, pending: 0 });
	});

	it("renders a footer with counts and the refresh interval", () => {
		const view = new FleetView([makeTarget("gpu01"), makeTarget("gpu02")], { refreshIntervalMs: 5000 });
		view.applyUpdate("gpu01", success);
		const lines = view.render(120).map(stripAnsi);
		expect(lines[0].trim()).toBe("GPU Fleet Status");
		expect(lines[lines.length - 1].trim()).toBe("starting · 1 ok · 0 failed · 1 pending · refresh 5s · q to quit");
	});

	it("centres the table in the viewport", () => {
		const view = new FleetView([makeTarget("gpu01")], { refreshIntervalMs: 5000 });
		const top = stripAnsi(view.render(100)[1]);
		const border = top.trimStart();
		expect(border.startsWith("┌")).toBe(true);
		const indent = top.length - border.length;
		expect(indent).toBeGreaterThan(0);
		expect(indent).toBe(Math.floor((100 - visibleWidth(border)) / 2));
	});

	it("shows the last cycle and slow targets", () => {
		const view = new FleetView([makeTarget("gpu01")], { refreshIntervalMs: 5000 });
		view.setCycleInfo({ cycle: 2, startedAt: Date.now(), launched: 0, skipped: 1 });
		const footer = stripAnsi(view.render(120).slice(-1)[0]).trim();
		expect(footer.startsWith("last cycle ")).toBe(true);
		expect(footer).toContain(" · 1 slow · ");
	});
});

describe("renderSnapshot", () => {
	it("renders the table without the interactive footer", () => {
		const text = stripAnsi(renderSnapshot([{ target: makeTarget("gpu01"), result: success }], 100));
		const lines = text.split("\n");
		expect(lines[lines.length - 1].startsWith("└")).toBe(true);
		expect(text).toContain("│ gpu01    ");
		expect(text).not.toContain("q to quit");
	});
});

const tick = () => new Promise<void>((resolve) => process.nextTick(resolve));

describe("LiveView", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	function setup() {
		const terminal = new RecordingTerminal();
		const onQuit = vi.fn();
		const live = new LiveView(terminal, new FleetView([makeTarget("gpu01"), makeTarget("gpu02")], { refreshIntervalMs: 5000 }), {
			renderIntervalMs: 250,
			onQuit,
		});
		return { terminal, onQuit, live };
	}

	it("coalesces updates into one redraw per render interval", async () => {
		const { live } = setup();
		live.start();
		await tick();
		expect(live.tui.renders).toBe(1);

		live.applyUpdate("gpu01", success);
		live.applyUpdate("gpu02", { status: "auth_failure", detail: "x", ...timing });
		live.applyUpdate("gpu02", { status: "timeout", phase: "connect", detail: "slow", ...timing });
		await tick();
		expect(live.tui.renders).toBe(1);

		vi.advanceTimersByTime(250);
		await tick();
		expect(live.tui.renders).toBe(2);

		vi.advanceTimersByTime(250);
		await tick();
		expect(live.tui.renders).toBe(2);
		await live.stop();
	});

	it("calls onQuit for q and Ctrl+C", async () => {
		const { terminal, onQuit, live } = setup();
		live.start();
		terminal.type("x");
		terminal.type("q");
		terminal.type("\x03");
		expect(onQuit).toHaveBeenCalledTimes(2);
		await live.stop();
	});

	it("replaces the table with a goodbye panel and restores the terminal", async () => {
		const { terminal, live } = setup();
		live.start();
		await tick();
		await live.stop();
		const output = stripAnsi(terminal.writes.join(""));
		expect(output).toContain("│ Goodbye! 👋 │");
		expect(terminal.started).toBe(false);
		expect(terminal.cursorVisible).toBe(true);
	});
});
