/**
 * @file SSH 会话模块
 *
 * 本文件封装了通过系统 ssh 客户端与远程 GPU 机器交互的功能，包括：
 * - 构建 ssh 参数（批处理模式、连接超时、心跳保活、经由跳板机的 ProxyCommand）
 * - 建立会话：启动 `ssh … sh`，等待就绪标记回显，超时或取消时终止进程
 * - 在会话中执行命令：用结束标记包裹命令并解析退出码
 * - 根据 ssh 的 stderr 把失败归类为认证 / 连接 / 超时，并区分跳板机与目标机
 *
 * 一个会话对应一个 ssh 子进程，可以在多轮探测之间复用。
 */
import { spawn } from "child_process";
import type { Readable, Writable } from "stream";
import { ProbeCancelledError, SessionError } from "./errors.js";
import { logDebug } from "./log.js";
import type { Hop, Target } from "./types.js";

/**
 * 会话需要的子进程能力（child_process 的 ChildProcess 满足此接口，测试可以替换）
 */
export interface SshProcess {
	readonly stdin: Writable;
	readonly stdout: Readable;
	readonly stderr: Readable;
	readonly exitCode: number | null;
	kill(signal?: NodeJS.Signals): boolean;
	once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
	once(event: "error", listener: (err: Error) => void): this;
}

/** 以给定参数启动 ssh 客户端 */
export type SpawnSsh = (args: string[]) => SshProcess;

/**
 * 命令执行结果
 */
export interface ExecResult {
	/** 标准输出内容 */
	stdout: string;
	/** 标准错误输出内容 */
	stderr: string;
	/** 远程命令退出码 */
	exitCode: number;
}

/** 已认证的远程会话 */
export interface Session {
	readonly target: Target;
	/** 会话是否还能执行下一条命令 */
	readonly usable: boolean;
	/** 执行一条命令。signal 触发时放弃命令，会话随之不可用 */
	exec(command: string, options?: { signal?: AbortSignal }): Promise<ExecResult>;
	/** 关闭会话并等待 ssh 进程退出 */
	close(): Promise<void>;
}

/** 会话工厂 - 为目标建立已认证的会话，失败时抛出 SessionError */
export interface SessionFactory {
	open(target: Target, options: { timeoutMs: number; signal?: AbortSignal }): Promise<Session>;
}

/** ssh 客户端选项 */
export interface SshOptions {
	/** StrictHostKeyChecking 取值 */
	strictHostKeyChecking: "yes" | "no" | "accept-new";
	/** ServerAliveInterval（秒），保持复用会话存活 */
	keepAliveInterval: number;
}

/** 会话就绪标记 */
const READY_MARKER = "__GPUMON_READY__";
/** SIGTERM 之后等待多久发送 SIGKILL（毫秒） */
const KILL_GRACE_MS = 2000;
/** 经由跳板机的连接超时后，再等待多久看 stderr 是否指向跳板机（毫秒） */
const JUMP_SETTLE_MS = 500;

/** 为 POSIX shell 加单引号 */
function shellQuote(value: string): string {
	if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) return value;
	return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** ssh 的通用选项 */
function commonOptions(connectTimeoutSec: number, options: SshOptions): string[] {
	return [
		"-o",
		"BatchMode=yes",
		"-o",
		`ConnectTimeout=${connectTimeoutSec}`,
		"-o",
		`StrictHostKeyChecking=${options.strictHostKeyChecking}`,
		"-o",
		"LogLevel=ERROR",
	];
}

/**
 * 构建启动会话所需的 ssh 参数
 * 跳板机通过 ProxyCommand 中的 `ssh -W %h:%p` 建立隧道，
 * 这样跳板机一跳的错误会带着跳板机主机名出现在 stderr 中。
 * 跳板机一跳只用一半的连接超时，它的超时消息要先于本地计时器到达
 * @param connectTimeoutMs - 连接超时，换算为 ssh 的 ConnectTimeout（秒，至少 1）
 */
export function buildSshArgs(target: Target, connectTimeoutMs: number, options: SshOptions): string[] {
	const common = commonOptions(Math.max(1, Math.ceil(connectTimeoutMs / 1000)), options);

	const args = [
		"-T",
		...common,
		"-o",
		`ServerAliveInterval=${options.keepAliveInterval}`,
		"-o",
		"ServerAliveCountMax=3",
		"-i",
		target.keyPath,
		"-p",
		String(target.port),
	];

	const jump = target.jumpHost;
	if (jump) {
		const proxy = [
			"ssh",
			...commonOptions(Math.max(1, Math.floor(connectTimeoutMs / 2000)), options),
			"-i",
			shellQuote(jump.keyPath),
			"-p",
			String(jump.port),
			"-W",
			"%h:%p",
			`${jump.username}@${jump.host}`,
		].join(" ");
		args.push("-o", `ProxyCommand=${proxy}`);
	}

	args.push(`${target.username}@${target.host}`, "sh");
	return args;
}

/**
 * 根据 ssh 的 stderr 与退出码对连接失败进行分类
 *
 * 规则按优先级依次匹配：
 * 1. Permission denied：目标机为认证失败；跳板机为跳板机连接失败
 * 2. Could not resolve hostname / connect to host：按主机名归属到对应一跳，目标机的连接超时归为超时
 * 3. channel open failed / stdio forwarding failed：跳板机无法连到目标机
 * 4. banner exchange 超时、主机密钥校验失败、隧道被关闭
 * 5. 其他：取最后一行 stderr
 */
export function classifySshFailure(stderr: string, exitCode: number | null, target: Target): SessionError {
	const jump = target.jumpHost?.host;
	const lines = stderr
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);

	const hopOf = (host: string | undefined): Hop => (jump !== undefined && host === jump ? "jump" : "target");
	const fail = (kind: "auth" | "connect" | "timeout", hop: Hop, detail: string): SessionError =>
		new SessionError(kind, hop, hop === "jump" && jump ? jump : target.host, detail);
	const find = (pattern: RegExp): RegExpExecArray | null => {
		for (const line of lines) {
			const match = pattern.exec(line);
			if (match) return match;
		}
		return null;
	};

	let match = find(/^(?:[^@\s]+@)?([^:\s]+): (Permission denied.*?)\.?$/);
	if (match) {
		const hop = hopOf(match[1]);
		if (hop === "jump") {
			return fail("connect", "jump", `jump host ${match[1]}: ${match[2].toLowerCase()}`);
		}
		return fail("auth", "target", match[2].toLowerCase());
	}

	match = find(/Could not resolve hostname ([^:\s]+)/);
	if (match) {
		const hop = hopOf(match[1]);
		const prefix = hop === "jump" ? `jump host ${match[1]}: ` : "";
		return fail("connect", hop, `${prefix}could not resolve hostname`);
	}

	match = find(/connect to host ([^\s]+) port (\d+): (.+)$/);
	if (match) {
		const hop = hopOf(match[1]);
		const reason = match[3].toLowerCase();
		if (hop === "jump") {
			return fail("connect", "jump", `jump host ${match[1]}: ${reason}`);
		}
		return fail(/timed out/.test(reason) ? "timeout" : "connect", "target", reason);
	}

	match = find(/channel \d+: open failed: (?:[\w ]+: )?(.+)$/);
	if (match) {
		return fail("connect", "target", `jump host could not reach target: ${match[1].toLowerCase()}`);
	}
	if (find(/stdio forwarding failed/)) {
		return fail("connect", "target", "jump host could not reach target");
	}

	if (find(/Connection timed out during banner exchange/)) {
		if (jump !== undefined && lines.some((line) => line.includes(`${jump} port`))) {
			return fail("connect", "jump", `jump host ${jump}: banner exchange timed out`);
		}
		return fail("timeout", "target", "banner exchange timed out");
	}

	if (find(/Host key verification failed/)) {
		return fail("connect", "target", "host key verification failed");
	}

	if (jump !== undefined && find(/Connection closed by UNKNOWN port 65535/)) {
		return fail("connect", "jump", `jump host ${jump}: tunnel closed`);
	}

	const last = lines[lines.length - 1];
	return fail("connect", "target", last ?? `ssh exited with status ${exitCode ?? "unknown"}`);
}

/**
 * 基于单个 ssh 子进程的会话
 */
export class SshSession implements Session {
	readonly target: Target;
	private proc: SshProcess;
	private stdoutBuffer = "";
	private stderrBuffer = "";
	/** 每次收到输出或进程退出时调用，由当前进行中的操作设置 */
	private onActivity?: () => void;
	private exited = false;
	private exitCode: number | null = null;
	/** 命令被放弃后 shell 状态未知，不再复用 */
	private broken = false;
	private busy = false;
	private execCounter = 0;
	private readonly exitPromise: Promise<void>;

	constructor(target: Target, proc: SshProcess) {
		this.target = target;
		this.proc = proc;

		proc.stdout.setEncoding("utf8");
		proc.stderr.setEncoding("utf8");
		proc.stdout.on("data", (data: string | Buffer) => {
			this.stdoutBuffer += data.toString();
			this.onActivity?.();
		});
		proc.stderr.on("data", (data: string | Buffer) => {
			this.stderrBuffer += data.toString();
			this.onActivity?.();
		});
		// 进程退出后写 stdin 会触发 EPIPE，退出本身会通过 exit 事件处理
		proc.stdin.on("error", (err: Error) => {
			logDebug(`ssh stdin for ${target.host} closed: ${err.message}`);
		});

		this.exitPromise = new Promise<void>((resolve) => {
			proc.once("exit", (code) => {
				this.markExited(code);
				resolve();
			});
			proc.once("error", (err) => {
				this.stderrBuffer += `${err.message}\n`;
				this.markExited(null);
				resolve();
			});
		});
	}

	get usable(): boolean {
		return !this.exited && !this.broken && !this.busy;
	}

	private markExited(code: number | null): void {
		if (this.exited) return;
		this.exited = true;
		this.exitCode = code;
		this.onActivity?.();
	}

	/**
	 * 等待会话就绪（认证完成、远程 shell 回显就绪标记）
	 * @throws SessionError 连接失败或超时；ProbeCancelledError 被取消
	 */
	waitReady(timeoutMs: number, signal?: AbortSignal): Promise<void> {
		return this.run(timeoutMs, signal, "connect", (settle) => {
			const marker = `${READY_MARKER}\n`;
			const index = this.stdoutBuffer.indexOf(marker);
			if (index !== -1) {
				this.stdoutBuffer = this.stdoutBuffer.slice(index + marker.length);
				this.stderrBuffer = "";
				settle.resolve(undefined);
			} else if (this.exited) {
				settle.reject(classifySshFailure(this.stderrBuffer, this.exitCode, this.target));
			}
		}, () => {
			this.proc.stdin.write(`echo ${READY_MARKER}\n`);
		});
	}

	async exec(command: string, options: { signal?: AbortSignal } = {}): Promise<ExecResult> {
		if (!this.usable) {
			throw new SessionError("connect", "target", this.target.host, "session is no longer usable");
		}
		const marker = `__GPUMON_END_${++this.execCounter}__`;
		const endPattern = new RegExp(`\\n${marker} (\\d+)\\n`);
		this.stdoutBuffer = "";
		this.stderrBuffer = "";
		this.busy = true;
		try {
			return await this.run(0, options.signal, "command", (settle) => {
				const match = endPattern.exec(this.stdoutBuffer);
				if (match) {
					const stdout = this.stdoutBuffer.slice(0, match.index);
					this.stdoutBuffer = this.stdoutBuffer.slice(match.index + match[0].length);
					settle.resolve({ stdout, stderr: this.stderrBuffer, exitCode: Number(match[1]) });
				} else if (this.exited) {
					const failure = classifySshFailure(this.stderrBuffer, this.exitCode, this.target);
					settle.reject(
						new SessionError("connect", "target", this.target.host, `connection lost: ${failure.message}`),
					);
				}
			}, () => {
				this.proc.stdin.write(`(\n${command}\n)\nprintf '\\n${marker} %d\\n' "$?"\n`);
			});
		} finally {
			this.busy = false;
		}
	}

	/**
	 * 等待某个条件在输出中出现
	 * @param timeoutMs - 0 表示不设超时（命令超时由调用方通过 signal 控制）
	 * @param check - 每次有新输出或进程退出时调用，决定是否结束等待
	 * @param begin - 注册监听后执行，用于写入 stdin
	 */
	private run<T>(
		timeoutMs: number,
		signal: AbortSignal | undefined,
		phase: "connect" | "command",
		check: (settle: { resolve: (value: T) => void; reject: (err: Error) => void }) => void,
		begin: () => void,
	): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			let done = false;
			let timer: NodeJS.Timeout | undefined;

			const finish = () => {
				done = true;
				this.onActivity = undefined;
				if (timer) clearTimeout(timer);
				signal?.removeEventListener("abort", onAbort);
			};
			const settle = {
				resolve: (value: T) => {
					if (done) return;
					finish();
					resolve(value);
				},
				reject: (err: Error) => {
					if (done) return;
					finish();
					reject(err);
				},
			};
			const onAbort = () => {
				this.broken = true;
				const reason: unknown = signal?.reason;
				settle.reject(reason instanceof Error ? reason : new ProbeCancelledError(this.target.id));
			};

			if (signal?.aborted) {
				onAbort();
				return;
			}
			// 连接超时之后，指向跳板机的 stderr 优先于目标机超时
			let settling = false;
			const checkJumpFailure = () => {
				if (!settling) return;
				const failure = classifySshFailure(this.stderrBuffer, this.exitCode, this.target);
				if (failure.hop === "jump") settle.reject(failure);
			};

			signal?.addEventListener("abort", onAbort, { once: true });
			if (timeoutMs > 0) {
				timer = setTimeout(() => {
					this.broken = true;
					const timeout = new SessionError(
						"timeout",
						"target",
						this.target.host,
						`no response within ${(timeoutMs / 1000).toFixed(1)}s during ${phase}`,
					);
					if (phase === "connect" && this.target.jumpHost) {
						settling = true;
						timer = setTimeout(() => settle.reject(timeout), JUMP_SETTLE_MS);
						checkJumpFailure();
						return;
					}
					settle.reject(timeout);
				}, timeoutMs);
			}

			this.onActivity = () => {
				check(settle);
				checkJumpFailure();
			};
			begin();
			// 输出可能在注册监听之前就已到达
			check(settle);
		});
	}

	/** 关闭会话：结束 stdin，SIGTERM，宽限期后 SIGKILL，等待进程退出 */
	async close(): Promise<void> {
		this.broken = true;
		if (this.exited) return;
		this.proc.stdin.end();
		this.proc.kill("SIGTERM");
		const killTimer = setTimeout(() => {
			if (!this.exited) {
				this.proc.kill("SIGKILL");
			}
		}, KILL_GRACE_MS);
		try {
			await this.exitPromise;
		} finally {
			clearTimeout(killTimer);
		}
	}
}

/** 默认的 ssh 启动方式 */
const spawnSystemSsh: SpawnSsh = (args) => spawn("ssh", args, { stdio: ["pipe", "pipe", "pipe"] });

/**
 * 使用系统 ssh 客户端的会话工厂
 * 不做任何重试，失败直接抛出已分类的 SessionError
 */
export class SshSessionFactory implements SessionFactory {
	private options: SshOptions;
	private spawnSsh: SpawnSsh;

	constructor(options: SshOptions, spawnSsh: SpawnSsh = spawnSystemSsh) {
		this.options = options;
		this.spawnSsh = spawnSsh;
	}

	async open(target: Target, options: { timeoutMs: number; signal?: AbortSignal }): Promise<Session> {
		if (options.signal?.aborted) {
			throw new ProbeCancelledError(target.id);
		}
		const args = buildSshArgs(target, options.timeoutMs, this.options);
		logDebug(`ssh ${args.join(" ")}`);
		const session = new SshSession(target, this.spawnSsh(args));
		try {
			await session.waitReady(options.timeoutMs, options.signal);
			return session;
		} catch (err) {
			// 半建立的连接必须在报告失败之前终止
			await session.close();
			throw err;
		}
	}
}
