import { describe, expect, it } from "vitest";
import { ArgsError, helpText, parseArgs } from "../src/args.js";

describe("parseArgs", () => {
	it("returns defaults for no arguments", () => {
		expect(parseArgs([])).toEqual({ help: false, version: false, getConfigPath: false, once: false, overrides: {} });
	});

	it("reads the config path in both forms", () => {
		expect(parseArgs(["-c", "fleet.yaml"]).configPath).toBe("fleet.yaml");
		expect(parseArgs(["--config=fleet.yaml"]).configPath).toBe("fleet.yaml");
	});

	it("collects field overrides with = or a separate value", () => {
		const args = parseArgs(["--ssh.username=alice", "--display.refresh_rate", "2", "--debug.enabled"]);
		expect(args.overrides).toEqual({
			"ssh.username": "alice",
			"display.refresh_rate": "2",
			"debug.enabled": "true",
		});
	});

	it("collects every host after --targets", () => {
		const args = parseArgs(["--targets", "gpu01", "gpu02", "--once"]);
		expect(args.targets).toEqual(["gpu01", "gpu02"]);
		expect(args.once).toBe(true);
	});

	it("recognises the informational flags", () => {
		const args = parseArgs(["-h", "--version", "--get_config_path"]);
		expect(args.help).toBe(true);
		expect(args.version).toBe(true);
		expect(args.getConfigPath).toBe(true);
	});

	it("rejects unknown flags and missing values", () => {
		expect(() => parseArgs(["--verbose"])).toThrow(ArgsError);
		expect(() => parseArgs(["--targets"])).toThrow("--targets requires at least one host");
		expect(() => parseArgs(["--ssh.username"])).toThrow("--ssh.username requires a value");
		expect(() => parseArgs(["-c"])).toThrow("-c requires a path");
	});
});

describe("helpText", () => {
	it("shows the version and default config path", () => {
		const text = helpText("1.2.3", "/etc/gpumon.yaml");
		expect(text.split("\n")[0]).toBe("gpumon v1.2.3 - Live GPU availability across a fleet of SSH hosts");
		expect(text).toContain("Config file (default: /etc/gpumon.yaml)");
	});
});
