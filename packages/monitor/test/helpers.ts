import type { Terminal } from "@gpumon/tui";
import { ProbeCancelledError, SessionError } from "../src/errors.js";
import type { ExecResult, Session, SessionFactory } from "../src/ssh.js";
import type { FleetSink, ProbeResult, Target } from "../src/types.js";

export function makeTarget(host: string, extra: Partial<Target> = {}): Target {
	return { id: host, host, port: 22, username: "alice", keyPath: "/keys/test-key", ...extra };
}

/** 等待 ms 毫秒，signal 触发时以 ProbeCancelledError 拒绝 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new ProbeCancelledError("delay"));
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(new ProbeCancelledError("delay"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/** 直到 signal 触发才以 ProbeCancelledError 拒绝 */
export function hangUntilAborted(signal?: AbortSignal): Promise<never> {
	return new Promise((_resolve, reject) => {
		if (signal?.aborted) {
			reject(new ProbeCancelledError("hang"));
			return;
		}
		signal?.addEventListener("abort", () => reject(new ProbeCancelledError("hang")), { once: true });
	});
}

/** 单个主机的脚本化行为 */
export interface HostScript {
	connectDelayMs?: number;
	connectError?: SessionError;
	execDelayMs?: number;
	/** 命令永不结束，直到被取消 */
	hang?: boolean;
	stdout?: string;
	stderr?: string;
	exitCode?: number;
}

export class FakeSession implements Session {
	readonly target: Target;
	execCount = 0;
	closed = false;
	private broken = false;
	private script: HostScript;
	private onClose: () => void;

	constructor(target: Target, script: HostScript, onClose: () => void) {
		this.target = target;
		this.script = script;
		this.onClose = onClose;
	}

	get usable(): boolean {
		return !this.closed && !this.broken;
	}

	async exec(_command: string, options: { signal?: AbortSignal } = {}): Promise<ExecResult> {
		this.execCount++;
		try {
			if (this.script.hang) {
				await hangUntilAborted(options.signal);
			} else {
				await delay(this.script.execDelayMs ?? 0, options.signal);
			}
		} catch (err) {
			this.broken = true;
			throw err;
		}
		return {
			stdout: this.script.stdout ?? "",
			stderr: this.script.stderr ?? "",
			exitCode: this.script.exitCode ?? 0,
		};
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		this.onClose();
	}
}

export class FakeSessionFactory implements SessionFactory {
	/** open 调用顺序（目标 ID） */
	opened: string[] = [];
	sessions: FakeSession[] = [];
	/** 当前已打开（含正在连接）的会话数 */
	active = 0;
	maxActive = 0;
	private scripts: Record<string, HostScript>;

	constructor(scripts: Record<string, HostScript>) {
		this.scripts = scripts;
	}

	async open(target: Target, options: { timeoutMs: number; signal?: AbortSignal }): Promise<Session> {
		this.opened.push(target.id);
		this.active++;
		this.maxActive = Math.max(this.maxActive, this.active);
		const script = this.scripts[target.id] ?? {};
		try {
			const wait = script.connectDelayMs ?? 0;
			if (wait > options.timeoutMs) {
				await delay(options.timeoutMs, options.signal);
				throw new SessionError("timeout", "target", target.host, "no response within connect timeout");
			}
			if (wait > 0) await delay(wait, options.signal);
			if (script.connectError) throw script.connectError;
		} catch (err) {
			this.active--;
			throw err;
		}
		const session = new FakeSession(target, script, () => this.active--);
		this.sessions.push(session);
		return session;
	}
}

/** 记录所有更新的视图 */
export class RecordingSink implements FleetSink {
	updates: Array<{ targetId: string; result: ProbeResult }> = [];

	applyUpdate(targetId: string, result: ProbeResult): void {
		this.updates.push({ targetId, result });
	}

	order(): string[] {
		return this.updates.map((update) => update.targetId);
	}
}

export const A100_OUTPUT = "0, NVIDIA A100-SXM4-80GB, 1024, 81920, 37, 2\n1, NVIDIA A100-SXM4-80GB, 0, 81920, 0, 0\n";

/** 记录写入内容的终端，type() 模拟按键 */
export class RecordingTerminal implements Terminal {
	writes: string[] = [];
	started = false;
	cursorVisible = true;
	columns = 100;
	rows = 40;
	private onInput?: (data: string) => void;

	start(onInput: (data: string) => void): void {
		this.started = true;
		this.onInput = onInput;
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
	type(data: string): void {
		this.onInput?.(data);
	}
}
