import { describe, expect, it } from "vitest";
import { Panel } from "../src/components/panel.js";
import { Table } from "../src/components/table.js";
import { Text } from "../src/components/text.js";

describe("Table", () => {
	it("draws borders, header and rows sized to the content", () => {
		const table = new Table([{ header: "Host" }, { header: "GPU %", align: "right" }]);
		table.setRows([["a", "5%"]]);
		expect(table.render(40)).toEqual([
			"┌──────┬───────┐",
			"│ Host │ GPU % │",
			"├──────┼───────┤",
			"│ a    │    5% │",
			"└──────┴───────┘",
		]);
	});

	it("shrinks flexible columns to fit the viewport", () => {
		const table = new Table([{ header: "Name", flexible: true }, { header: "X" }]);
		table.setRows([["abcdefghijklmnop", "1"]]);
		const lines = table.render(20);
		expect(lines[3]).toBe("│ abcdefghijk… │ 1 │");
	});

	it("centers the title and the table", () => {
		const table = new Table([{ header: "Host" }, { header: "GPU %" }], { title: "GPUs", center: true });
		const lines = table.render(30);
		expect(lines[0]).toBe("       " + "      GPUs      ");
		expect(lines[1]).toBe("       ┌──────┬───────┐");
	});

	it("applies theme functions to borders and header", () => {
		const table = new Table([{ header: "H" }], { theme: { border: (s) => `<${s}>`, header: (s) => s.toLowerCase() } });
		const lines = table.render(20);
		expect(lines[1]).toBe("<│> h <│>");
	});
});

describe("Text", () => {
	it("pads each line to the viewport width", () => {
		const text = new Text("ok\nfail", 1, 0);
		expect(text.render(8)).toEqual([" ok     ", " fail   "]);
	});

	it("renders nothing for empty text", () => {
		expect(new Text("").render(10)).toEqual([]);
	});
});

describe("Panel", () => {
	it("wraps text in a rounded box", () => {
		expect(new Panel("Goodbye!").render(20)).toEqual(["╭──────────╮", "│ Goodbye! │", "╰──────────╯"]);
	});

	it("centers the box when asked", () => {
		expect(new Panel("Goodbye!", { center: true }).render(20)[0]).toBe("    ╭──────────╮");
	});
});
