import { describe, expect, it } from "vitest";
import { padToWidth, stripAnsi, truncateToWidth, visibleWidth } from "../src/utils.js";

describe("visibleWidth", () => {
	it("counts ASCII characters", () => {
		expect(visibleWidth("gpu01")).toBe(5);
		expect(visibleWidth("")).toBe(0);
	});

	it("ignores ANSI escape codes", () => {
		expect(visibleWidth("\x1b[31mfailed\x1b[0m")).toBe(6);
	});

	it("counts wide characters as two columns", () => {
		expect(visibleWidth("显卡")).toBe(4);
		expect(visibleWidth("👋")).toBe(2);
	});
});

describe("stripAnsi", () => {
	it("removes color codes", () => {
		expect(stripAnsi("\x1b[1m\x1b[35mHostname\x1b[0m")).toBe("Hostname");
	});
});

describe("truncateToWidth", () => {
	it("returns text that fits unchanged", () => {
		expect(truncateToWidth("gpu01", 10)).toBe("gpu01");
	});

	it("adds an ellipsis when cutting", () => {
		expect(truncateToWidth("NVIDIA A100", 8)).toBe("NVIDIA …");
	});

	it("cuts without ellipsis when given an empty one", () => {
		expect(truncateToWidth("abcdef", 3, "")).toBe("abc");
	});

	it("resets styles before the ellipsis", () => {
		expect(truncateToWidth("\x1b[31mabcdef\x1b[0m", 4)).toBe("\x1b[31mabc\x1b[0m…");
	});

	it("does not split a wide character", () => {
		expect(truncateToWidth("显卡状态", 5, "")).toBe("显卡");
	});

	it("pads to the exact width when asked", () => {
		expect(truncateToWidth("ab", 4, "…", true)).toBe("ab  ");
	});
});

describe("padToWidth", () => {
	it("aligns left, right and center", () => {
		expect(padToWidth("ab", 6)).toBe("ab    ");
		expect(padToWidth("ab", 6, "right")).toBe("    ab");
		expect(padToWidth("ab", 5, "center")).toBe(" ab  ");
	});

	it("truncates text wider than the column", () => {
		expect(padToWidth("abcdefgh", 5)).toBe("abcd…");
	});
});
