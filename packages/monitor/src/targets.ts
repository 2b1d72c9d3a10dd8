/**
 * @file 目标解析
 *
 * 把配置中的 targets 段展开为有序、去重、只读的 Target 列表：
 * 先处理 individual，再按顺序展开 patterns；按主机名去重，首次出现者优先。
 */
import { existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import type { MonitorConfig, TargetEntry, TargetPattern } from "./config.js";
import { ConfigError } from "./errors.js";
import type { JumpHost, Target } from "./types.js";

/** 展开路径开头的 ~ */
export function expandHome(path: string): string {
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return join(homedir(), path.slice(2));
	return path;
}

/**
 * 按格式生成主机名
 * 支持 {prefix}、{number} 以及补零形式 {number:0Nd}
 * @example formatHostname("{prefix}{number:02d}", "gpu", 3) // "gpu03"
 */
export function formatHostname(format: string, prefix: string, number: number): string {
	return format.replace(/\{(prefix|number)(?::0?(\d+)d)?\}/g, (_match, name: string, width?: string) => {
		if (name === "prefix") return prefix;
		const digits = String(number);
		return width ? digits.padStart(Number(width), "0") : digits;
	});
}

/** 展开一个命名模式，end 包含在内 */
export function expandPattern(pattern: TargetPattern, index = 0): string[] {
	if (pattern.end < pattern.start) {
		throw new ConfigError("Invalid target pattern", [
			{
				path: `/targets/patterns/${index}`,
				message: `end (${pattern.end}) is smaller than start (${pattern.start})`,
			},
		]);
	}
	const hosts: string[] = [];
	for (let n = pattern.start; n <= pattern.end; n++) {
		hosts.push(formatHostname(pattern.format, pattern.prefix, n));
	}
	return hosts;
}

interface TargetOverrides {
	username?: string;
	key_path?: string;
	port?: number;
	jump_host?: string;
	label?: string;
}

/**
 * 把配置解析为目标列表
 * @throws ConfigError 模式范围无效时
 */
export function resolveTargets(config: MonitorConfig): Target[] {
	const ssh = config.ssh;

	const jumpFor = (jumpHost: string | undefined): JumpHost | undefined => {
		const host = jumpHost ?? ssh.jump_host;
		if (!host) return undefined;
		return {
			host,
			port: ssh.port,
			username: ssh.jump_username || ssh.username,
			keyPath: expandHome(ssh.key_path),
		};
	};

	const build = (host: string, overrides: TargetOverrides): Target => {
		const jumpHost = jumpFor(overrides.jump_host);
		return Object.freeze({
			id: host,
			host,
			port: overrides.port ?? ssh.port,
			username: overrides.username ?? ssh.username,
			keyPath: expandHome(overrides.key_path ?? ssh.key_path),
			...(jumpHost ? { jumpHost: Object.freeze(jumpHost) } : {}),
			...(overrides.label ? { label: overrides.label } : {}),
		});
	};

	const targets: Target[] = [];
	const seen = new Set<string>();
	const add = (target: Target) => {
		if (seen.has(target.host)) return;
		seen.add(target.host);
		targets.push(target);
	};

	config.targets.individual.forEach((entry: TargetEntry) => {
		if (typeof entry === "string") {
			add(build(entry, {}));
		} else {
			add(build(entry.host, entry));
		}
	});

	config.targets.patterns.forEach((pattern, index) => {
		for (const host of expandPattern(pattern, index)) {
			add(build(host, pattern));
		}
	});

	return targets;
}

/**
 * 列出不存在的私钥文件（目标与跳板机），按首次出现顺序去重
 */
export function findMissingKeys(targets: readonly Target[], exists: (path: string) => boolean = existsSync): string[] {
	const missing: string[] = [];
	for (const target of targets) {
		const paths = target.jumpHost ? [target.keyPath, target.jumpHost.keyPath] : [target.keyPath];
		for (const path of paths) {
			if (!missing.includes(path) && !exists(path)) {
				missing.push(path);
			}
		}
	}
	return missing;
}
