/**
 * @file 集群调度器 - 并发轮询核心
 *
 * 本文件实现了周期性轮询整个集群的调度逻辑：
 * - 每个刷新周期为所有不在进行中的目标启动一个探测任务（会话工厂 → 探测执行器）
 * - 通过 FIFO 槽位池限制并发，按目标列表顺序获得槽位
 * - 按完成顺序（而非提交顺序）写入快照并推送给视图
 * - 上一轮仍未完成的目标跳过并记录为慢目标，同一目标绝不会同时被探测两次
 * - 任务内的任何异常都收敛为一个已分类的 ProbeResult，不影响其他目标
 * - stop() 取消所有任务、等待其结束、关闭保留的会话，之后不再推送任何更新
 */
import { ProbeCancelledError, SessionError } from "./errors.js";
import { logCycleStart, logDebug, logError, logProbeResult, logSlowTarget } from "./log.js";
import { type Release, SlotPool } from "./pool.js";
import type { ProbeRunner } from "./probe.js";
import { FleetSnapshot } from "./snapshot.js";
import type { Session, SessionFactory } from "./ssh.js";
import type { FleetSink, ProbeFailure, ProbeResult, Target } from "./types.js";

/** 调度参数（由最终配置得出） */
export interface SchedulerOptions {
	/** 两次刷新周期之间的间隔（毫秒） */
	refreshIntervalMs: number;
	/** 同时进行的探测上限，0 表示不限制 */
	maxConcurrency: number;
	/** 建立会话的超时（毫秒） */
	connectTimeoutMs: number;
	/** 查询命令的超时（毫秒） */
	commandTimeoutMs: number;
	/** 是否在周期之间保留可用的会话 */
	reuseSessions: boolean;
}

/** 单个刷新周期的启动信息 */
export interface CycleInfo {
	cycle: number;
	startedAt: number;
	/** 本轮启动的探测数 */
	launched: number;
	/** 因上一轮仍在进行而跳过的目标数 */
	skipped: number;
}

export interface FleetSchedulerDeps {
	sessionFactory: SessionFactory;
	probeRunner: ProbeRunner;
	sink: FleetSink;
	options: SchedulerOptions;
	onCycle?: (info: CycleInfo) => void;
}

/**
 * 把会话错误转换为探测结果
 */
export function sessionFailureResult(error: SessionError, startedAt: number): ProbeFailure {
	const timing = { timestamp: Date.now(), durationMs: Date.now() - startedAt };
	switch (error.kind) {
		case "auth":
			return Object.freeze({ status: "auth_failure", detail: error.message, ...timing });
		case "timeout":
			return Object.freeze({ status: "timeout", phase: "connect", detail: error.message, ...timing });
		case "connect":
			return Object.freeze({ status: "connect_failure", hop: error.hop, detail: error.message, ...timing });
	}
}

/** 正在进行的探测任务 */
interface InFlight {
	startedAt: number;
	done: Promise<void>;
}

export class FleetScheduler {
	readonly snapshot: FleetSnapshot;
	private readonly targets: readonly Target[];
	private readonly deps: FleetSchedulerDeps;
	private readonly pool: SlotPool;
	private readonly controller = new AbortController();
	private inFlight = new Map<string, InFlight>();
	/** 周期之间保留的会话 */
	private sessions = new Map<string, Session>();
	private timer?: NodeJS.Timeout;
	private cycle = 0;
	private stopped = false;

	constructor(targets: readonly Target[], deps: FleetSchedulerDeps) {
		this.targets = targets;
		this.deps = deps;
		this.snapshot = new FleetSnapshot(targets);
		this.pool = new SlotPool(deps.options.maxConcurrency);
	}

	/** 正在进行探测的目标 ID */
	get inFlightTargets(): string[] {
		return [...this.inFlight.keys()];
	}

	/** 立即开始第一轮，之后每隔 refreshIntervalMs 开始新一轮 */
	start(): void {
		if (this.timer || this.stopped) return;
		this.launchCycle();
		this.timer = setInterval(() => this.launchCycle(), this.deps.options.refreshIntervalMs);
	}

	/**
	 * 启动一轮探测，等待本轮启动的所有任务结束
	 */
	async runCycle(): Promise<void> {
		await Promise.allSettled(this.launchCycle());
	}

	/** 执行单轮探测，全部结束后返回快照 */
	async runOnce(): Promise<FleetSnapshot> {
		await this.runCycle();
		return this.snapshot;
	}

	/**
	 * 停止调度：取消所有任务并等待结束，然后关闭保留的会话
	 * 返回之后不会再有任何 applyUpdate 调用
	 */
	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = undefined;
		}
		this.controller.abort();
		await Promise.allSettled([...this.inFlight.values()].map((task) => task.done));

		const sessions = [...this.sessions.values()];
		this.sessions.clear();
		const closed = await Promise.allSettled(sessions.map((session) => session.close()));
		for (const outcome of closed) {
			if (outcome.status === "rejected") {
				logError("Failed to close session", outcome.reason);
			}
		}
	}

	/** 启动一轮探测，返回本轮启动的任务 */
	private launchCycle(): Promise<void>[] {
		if (this.stopped) return [];
		const cycle = ++this.cycle;
		const now = Date.now();
		const launched: Promise<void>[] = [];
		let skipped = 0;

		for (const target of this.targets) {
			const running = this.inFlight.get(target.id);
			if (running) {
				skipped++;
				logSlowTarget(target, now - running.startedAt);
				continue;
			}
			const done = this.probeTarget(target);
			this.inFlight.set(target.id, { startedAt: now, done });
			launched.push(done);
		}

		logCycleStart(cycle, launched.length, skipped);
		this.deps.onCycle?.({ cycle, startedAt: now, launched: launched.length, skipped });
		return launched;
	}

	/**
	 * 单个目标的探测任务：获取槽位 → 建立会话 → 执行查询 → 发布结果
	 * 不会拒绝，取消时静默结束
	 */
	private async probeTarget(target: Target): Promise<void> {
		const signal = this.controller.signal;
		let release: Release | undefined;
		let startedAt = Date.now();
		try {
			release = await this.pool.acquire(signal, target.id);
			startedAt = Date.now();
			const result = await this.probe(target, signal, startedAt);
			this.publish(target, result);
		} catch (err) {
			if (err instanceof ProbeCancelledError || signal.aborted) {
				logDebug(`Probe for ${target.id} cancelled`);
				return;
			}
			logError(`Unexpected error while probing ${target.id}`, err);
			const message = err instanceof Error ? err.message : String(err);
			this.publish(
				target,
				Object.freeze({
					status: "connect_failure",
					hop: "target",
					detail: `unexpected error: ${message}`,
					timestamp: Date.now(),
					durationMs: Date.now() - startedAt,
				}),
			);
		} finally {
			release?.();
			this.inFlight.delete(target.id);
		}
	}

	/**
	 * 会话工厂与探测执行器的组合
	 * 会话错误转换为结果；取消与未知错误向上抛出
	 */
	private async probe(target: Target, signal: AbortSignal, startedAt: number): Promise<ProbeResult> {
		const { sessionFactory, probeRunner, options } = this.deps;

		let retained = this.sessions.get(target.id);
		this.sessions.delete(target.id);
		if (retained && !retained.usable) {
			await retained.close();
			retained = undefined;
		}

		let session: Session;
		if (retained) {
			session = retained;
		} else {
			try {
				session = await sessionFactory.open(target, { timeoutMs: options.connectTimeoutMs, signal });
			} catch (err) {
				if (err instanceof SessionError) return sessionFailureResult(err, startedAt);
				throw err;
			}
		}

		let keep = false;
		try {
			const result = await probeRunner.run(session, { timeoutMs: options.commandTimeoutMs, signal, startedAt });
			keep = options.reuseSessions && session.usable && !this.stopped;
			return result;
		} catch (err) {
			if (err instanceof SessionError) return sessionFailureResult(err, startedAt);
			throw err;
		} finally {
			if (keep) {
				this.sessions.set(target.id, session);
			} else {
				await session.close();
			}
		}
	}

	/** 写入快照并推送给视图 */
	private publish(target: Target, result: ProbeResult): void {
		if (this.stopped) return;
		this.snapshot.set(target.id, result);
		logProbeResult(target, result);
		try {
			this.deps.sink.applyUpdate(target.id, result);
		} catch (err) {
			logError(`View rejected update for ${target.id}`, err);
		}
	}
}
