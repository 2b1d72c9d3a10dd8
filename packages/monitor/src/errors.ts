/**
 * @file 错误类型
 *
 * - ConfigError：配置加载 / 校验失败（进程级致命错误）
 * - SessionError：建立 SSH 会话失败，已分类（认证 / 连接 / 超时）
 * - ProbeCancelledError：调度器停止时正在进行的探测被取消
 */

import type { Hop } from "./types.js";

/** 单条配置问题：字段路径 + 描述 */
export interface ConfigProblem {
	path: string;
	message: string;
}

export class ConfigError extends Error {
	readonly problems: ConfigProblem[];

	constructor(message: string, problems: ConfigProblem[] = []) {
		super(message);
		this.name = "ConfigError";
		this.problems = problems;
	}

	/** 多行描述，用于 CLI 输出 */
	describe(): string {
		if (this.problems.length === 0) return this.message;
		return [this.message, ...this.problems.map((p) => `  ${p.path || "/"}: ${p.message}`)].join("\n");
	}
}

/** 会话失败类别 */
export type SessionErrorKind = "auth" | "connect" | "timeout";

export class SessionError extends Error {
	readonly kind: SessionErrorKind;
	readonly hop: Hop;
	/** 出错的主机（跳板机或目标） */
	readonly host: string;

	constructor(kind: SessionErrorKind, hop: Hop, host: string, message: string) {
		super(message);
		this.name = "SessionError";
		this.kind = kind;
		this.hop = hop;
		this.host = host;
	}
}

export class ProbeCancelledError extends Error {
	constructor(targetId: string) {
		super(`Probe for ${targetId} was cancelled`);
		this.name = "ProbeCancelledError";
	}
}
