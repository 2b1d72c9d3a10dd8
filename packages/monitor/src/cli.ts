#!/usr/bin/env node
/**
 * @file CLI 入口文件
 *
 * 本文件是 `gpumon` 的入口点，负责：
 * - 解析命令行参数（帮助、版本、配置路径、字段覆盖）
 * - 加载配置，出错时打印问题列表并以 1 退出
 * - 调用 runMonitor 并以其返回值退出
 */
import chalk from "chalk";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { ArgsError, helpText, parseArgs } from "./args.js";
import { getDefaultConfigPath, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { printError } from "./log.js";
import { runMonitor } from "./main.js";

/** 当前文件所在目录的绝对路径 */
const __dirname = dirname(fileURLToPath(import.meta.url));

/** 从 package.json 中读取版本信息 */
function readVersion(): string {
	const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
	if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
		return String(packageJson.version);
	}
	return "0.0.0";
}

async function main(argv: string[]): Promise<number> {
	let args;
	try {
		args = parseArgs(argv);
	} catch (err) {
		if (err instanceof ArgsError) {
			printError(err.message);
			console.error(chalk.dim("Run gpumon --help for usage"));
			return 1;
		}
		throw err;
	}

	const defaultConfigPath = getDefaultConfigPath();
	if (args.help) {
		console.log(helpText(readVersion(), defaultConfigPath));
		return 0;
	}
	if (args.version) {
		console.log(readVersion());
		return 0;
	}
	if (args.getConfigPath) {
		console.log(defaultConfigPath);
		return 0;
	}

	const configPath = args.configPath ?? defaultConfigPath;
	let config;
	try {
		config = loadConfig(configPath, { overrides: args.overrides, targets: args.targets });
	} catch (err) {
		if (err instanceof ConfigError) {
			printError(err.describe());
			return 1;
		}
		throw err;
	}

	return runMonitor(config, { once: args.once });
}

main(process.argv.slice(2)).then(
	(code) => process.exit(code),
	(err: unknown) => {
		console.error(chalk.red(err instanceof Error ? (err.stack ?? err.message) : String(err)));
		process.exit(1);
	},
);
