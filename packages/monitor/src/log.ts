/**
 * @file log.ts - 日志输出模块
 *
 * 本文件负责：
 * 1. 调试日志文件：实时表格占用终端，日志只写入文件，且只在 debug.enabled 时写入
 * 2. 日志轮转：超过 log_max_size 时 file → file.1 → … → file.N
 * 3. 记录各类事件：刷新周期开始、慢目标、探测结果
 * 4. 控制台输出（帮助、配置错误、--once 表格之外的提示），使用 chalk 着色
 *
 * 日志未启用时所有 log* 调用都是空操作；写入失败时关闭文件日志并在控制台提示一次，
 * log* 调用永远不会抛出。
 */

import chalk from "chalk";
import { existsSync, mkdirSync, renameSync, rmSync, statSync, writeFileSync, appendFileSync } from "fs";
import { join } from "path";
import type { ProbeResult, Target } from "./types.js";

/** 日志级别 */
export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

/** 日志文件设置（对应配置中的 debug 段） */
export interface LogSettings {
	enabled: boolean;
	logDir: string;
	logFile: string;
	/** 单个日志文件的最大字节数，0 表示不轮转 */
	maxSize: number;
	/** 保留的轮转备份数量 */
	backupCount: number;
}

/** 当前日志文件状态，未启用时为 undefined */
let state: { path: string; size: number; maxSize: number; backupCount: number } | undefined;

/**
 * 初始化日志
 * 启用时创建日志目录并清空日志文件（每次启动都从空文件开始）
 * @returns 日志文件路径，未启用时返回 undefined
 */
export function initLogging(settings: LogSettings): string | undefined {
	state = undefined;
	if (!settings.enabled) return undefined;

	mkdirSync(settings.logDir, { recursive: true });
	const path = join(settings.logDir, settings.logFile);
	writeFileSync(path, "");
	state = { path, size: 0, maxSize: settings.maxSize, backupCount: settings.backupCount };
	return path;
}

/** 关闭文件日志 */
export function shutdownLogging(): void {
	state = undefined;
}

/** 文件日志是否启用 */
export function isLoggingEnabled(): boolean {
	return state !== undefined;
}

/**
 * 轮转日志文件：删除最旧的备份，其余依次后移
 * backupCount 为 0 时直接清空当前文件
 */
function rotate(current: NonNullable<typeof state>): void {
	if (current.backupCount > 0) {
		const oldest = `${current.path}.${current.backupCount}`;
		if (existsSync(oldest)) rmSync(oldest);
		for (let i = current.backupCount - 1; i >= 1; i--) {
			const from = `${current.path}.${i}`;
			if (existsSync(from)) renameSync(from, `${current.path}.${i + 1}`);
		}
		renameSync(current.path, `${current.path}.1`);
	}
	writeFileSync(current.path, "");
	current.size = 0;
}

function write(level: LogLevel, message: string): void {
	const current = state;
	if (!current) return;

	const line = `${new Date().toISOString()} ${level} ${message}\n`;
	const bytes = Buffer.byteLength(line);
	try {
		if (current.maxSize > 0 && current.size > 0 && current.size + bytes > current.maxSize) {
			rotate(current);
		}
		appendFileSync(current.path, line);
		current.size += bytes;
	} catch (err) {
		// 写入失败后关闭文件日志，日志错误不能影响轮询
		state = undefined;
		const reason = err instanceof Error ? err.message : String(err);
		printWarning(`Debug logging disabled, cannot write ${current.path}: ${reason}`);
	}
}

export function logDebug(message: string): void {
	write("DEBUG", message);
}

export function logInfo(message: string): void {
	write("INFO", message);
}

export function logWarning(message: string): void {
	write("WARNING", message);
}

/**
 * 记录错误，带堆栈时以缩进行追加在消息之后
 */
export function logError(message: string, error?: unknown): void {
	if (!state) return;
	let text = message;
	if (error instanceof Error) {
		const stack = error.stack ?? `${error.name}: ${error.message}`;
		text += `\n${stack
			.split("\n")
			.map((line) => `    ${line}`)
			.join("\n")}`;
	} else if (error !== undefined) {
		text += `: ${String(error)}`;
	}
	write("ERROR", text);
}

// ============================================================================
// 事件日志
// ============================================================================

export function logCycleStart(cycle: number, launched: number, skipped: number): void {
	logInfo(`Cycle ${cycle}: launched ${launched} probe(s), ${skipped} still in flight`);
}

/** 上一轮探测还未结束的目标 */
export function logSlowTarget(target: Target, elapsedMs: number): void {
	logWarning(`Slow target ${target.id}: previous probe still running after ${(elapsedMs / 1000).toFixed(1)}s`);
}

/**
 * 记录单个目标的探测结果
 * 解析失败时附带原始输出，方便排查
 */
export function logProbeResult(target: Target, result: ProbeResult): void {
	const took = `${result.durationMs}ms`;
	switch (result.status) {
		case "success":
			logDebug(
				`${target.id}: ${result.devices.length} GPU(s) in ${took}` +
					(result.skippedLines > 0 ? `, ${result.skippedLines} malformed line(s) skipped` : ""),
			);
			break;
		case "timeout":
			logWarning(`${target.id}: ${result.phase} timeout after ${took}: ${result.detail}`);
			break;
		case "auth_failure":
			logWarning(`${target.id}: authentication failed: ${result.detail}`);
			break;
		case "connect_failure":
			logWarning(`${target.id}: connection failed (${result.hop}): ${result.detail}`);
			break;
		case "parse_failure":
			logWarning(`${target.id}: ${result.detail}\n--- raw output ---\n${result.raw}\n--- end ---`);
			break;
	}
}

// ============================================================================
// 控制台输出
// ============================================================================

export function printError(message: string): void {
	console.error(chalk.red(`Error: ${message}`));
}

export function printWarning(message: string): void {
	console.error(chalk.yellow(message));
}
