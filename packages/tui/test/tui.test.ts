import { describe, expect, it } from "vitest";
import type { Terminal } from "../src/terminal.js";
import { type Component, TUI } from "../src/tui.js";

const SYNC_START = "\x1b[?2026h";
const SYNC_END = "\x1b[?2026l";

class RecordingTerminal implements Terminal {
	writes: string[] = [];
	cursorVisible = true;
	started = false;
	columns = 40;
	rows = 10;

	start(): void {
		this.started = true;
	}
	stop(): void {
		this.started = false;
	}
	write(data: string): void {
		this.writes.push(data);
	}
	hideCursor(): void {
		this.cursorVisible = false;
	}
	showCursor(): void {
		this.cursorVisible = true;
	}
}

class Lines implements Component {
	constructor(public lines: string[]) {}
	render(): string[] {
		return this.lines;
	}
	invalidate(): void {}
}

const tick = () => new Promise<void>((resolve) => process.nextTick(resolve));

async function setup(lines: string[]) {
	const terminal = new RecordingTerminal();
	const tui = new TUI(terminal);
	const component = new Lines(lines);
	tui.addChild(component);
	tui.start();
	await tick();
	return { terminal, tui, component };
}

describe("TUI", () => {
	it("writes every line on the first render without clearing", async () => {
		const { terminal, tui } = await setup(["a", "b"]);
		expect(terminal.writes).toEqual([`${SYNC_START}a\x1b[0m\r\nb\x1b[0m${SYNC_END}`]);
		expect(terminal.cursorVisible).toBe(false);
		expect(tui.fullRedraws).toBe(1);
	});

	it("rewrites only the changed line", async () => {
		const { terminal, tui, component } = await setup(["a", "b"]);
		component.lines = ["a", "c"];
		tui.requestRender();
		await tick();
		expect(terminal.writes[1]).toBe(`${SYNC_START}\r\x1b[2Kc\x1b[0m${SYNC_END}`);
		expect(tui.fullRedraws).toBe(1);
	});

	it("writes nothing when the content is unchanged", async () => {
		const { terminal, tui } = await setup(["a", "b"]);
		tui.requestRender();
		await tick();
		expect(terminal.writes).toHaveLength(1);
		expect(tui.renders).toBe(1);
	});

	it("coalesces render requests made in the same tick", async () => {
		const { tui, component } = await setup(["a"]);
		component.lines = ["x"];
		tui.requestRender();
		tui.requestRender();
		tui.requestRender();
		await tick();
		expect(tui.renders).toBe(2);
	});

	it("scrolls appended lines into view", async () => {
		const { terminal, tui, component } = await setup(["a"]);
		component.lines = ["a", "b"];
		tui.requestRender();
		await tick();
		expect(terminal.writes[1]).toBe(`${SYNC_START}\r\n\x1b[2Kb\x1b[0m${SYNC_END}`);
	});

	it("clears lines left over from longer content", async () => {
		const { terminal, tui, component } = await setup(["a", "b", "c"]);
		component.lines = ["a"];
		tui.requestRender();
		await tick();
		expect(terminal.writes[1]).toBe(`${SYNC_START}\x1b[2A\r\r\n\x1b[2K\r\n\x1b[2K\x1b[2A${SYNC_END}`);
	});

	it("redraws everything after a width change", async () => {
		const { terminal, tui } = await setup(["a"]);
		terminal.columns = 20;
		tui.requestRender();
		await tick();
		expect(tui.fullRedraws).toBe(2);
		expect(terminal.writes[1]).toBe(`${SYNC_START}\x1b[3J\x1b[2J\x1b[Ha\x1b[0m${SYNC_END}`);
	});

	it("truncates lines wider than the terminal", async () => {
		const terminal = new RecordingTerminal();
		terminal.columns = 5;
		const tui = new TUI(terminal);
		tui.addChild(new Lines(["abcdefgh"]));
		tui.start();
		await tick();
		expect(terminal.writes[0]).toBe(`${SYNC_START}abcde\x1b[0m${SYNC_END}`);
	});

	it("moves below the content and restores the cursor on stop", async () => {
		const { terminal, tui } = await setup(["a", "b"]);
		tui.stop();
		expect(terminal.writes[1]).toBe("\r\n");
		expect(terminal.cursorVisible).toBe(true);
		expect(terminal.started).toBe(false);
	});
});
