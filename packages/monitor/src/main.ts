/**
 * @file 监控主流程
 *
 * 组装各个部件并运行监控：
 * 1. 初始化调试日志
 * 2. 解析目标并检查私钥文件
 * 3. 创建 SSH 会话工厂、探测执行器和调度器
 * 4. --once：探测一轮，打印表格后退出；否则启动实时视图，直到 q / Ctrl+C / SIGINT / SIGTERM
 *
 * 返回进程退出码，由 CLI 入口负责退出。
 */
import { ProcessTerminal, type Terminal } from "@gpumon/tui";
import type { MonitorConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { initLogging, logError, logInfo, printError, shutdownLogging } from "./log.js";
import { ProbeRunner } from "./probe.js";
import { FleetScheduler, type SchedulerOptions } from "./scheduler.js";
import { type SessionFactory, SshSessionFactory } from "./ssh.js";
import { findMissingKeys, resolveTargets } from "./targets.js";
import type { Target } from "./types.js";
import { FleetView, LiveView, renderSnapshot } from "./view.js";

/** 运行选项，除 once 外均用于替换默认实现 */
export interface RunOptions {
	once: boolean;
	/** 标准输出是否为终端，默认取 process.stdout.isTTY */
	isTTY?: boolean;
	terminal?: Terminal;
	sessionFactory?: SessionFactory;
	/** 检查私钥文件是否存在 */
	keyExists?: (path: string) => boolean;
	/** --once 输出目标，默认 process.stdout */
	output?: { write(text: string): unknown; columns?: number };
	/** 是否安装 SIGINT / SIGTERM 处理器 */
	handleSignals?: boolean;
}

/** 由最终配置得出调度参数 */
export function schedulerOptionsFromConfig(config: MonitorConfig): SchedulerOptions {
	return {
		refreshIntervalMs: Math.round(config.display.refresh_rate * 1000),
		maxConcurrency: config.polling.max_concurrency,
		connectTimeoutMs: Math.round(config.ssh.timeout * 1000),
		commandTimeoutMs: Math.round(config.ssh.command_timeout * 1000),
		reuseSessions: config.ssh.reuse_sessions,
	};
}

/**
 * 解析并检查目标，失败时打印原因并返回 undefined
 */
function prepareTargets(config: MonitorConfig, keyExists?: (path: string) => boolean): Target[] | undefined {
	let targets: Target[];
	try {
		targets = resolveTargets(config);
	} catch (err) {
		if (err instanceof ConfigError) {
			printError(err.describe());
			return undefined;
		}
		throw err;
	}
	if (targets.length === 0) {
		printError("No targets configured (set targets.individual, targets.patterns or --targets)");
		return undefined;
	}
	const missing = findMissingKeys(targets, keyExists);
	if (missing.length > 0) {
		for (const path of missing) {
			printError(`SSH key not found: ${path}`);
		}
		return undefined;
	}
	return targets;
}

/**
 * 运行监控
 * @returns 退出码：0 正常结束；1 目标 / 私钥问题或实时视图无法初始化
 */
export async function runMonitor(config: MonitorConfig, options: RunOptions): Promise<number> {
	const logPath = initLogging({
		enabled: config.debug.enabled,
		logDir: config.debug.log_dir,
		logFile: config.debug.log_file,
		maxSize: config.debug.log_max_size,
		backupCount: config.debug.log_backup_count,
	});
	try {
		if (logPath) logInfo(`gpumon starting, logging to ${logPath}`);

		const targets = prepareTargets(config, options.keyExists);
		if (!targets) return 1;
		logInfo(`Monitoring ${targets.length} target(s): ${targets.map((t) => t.id).join(", ")}`);

		const sessionFactory =
			options.sessionFactory ??
			new SshSessionFactory({
				strictHostKeyChecking: config.ssh.strict_host_key_checking,
				keepAliveInterval: config.ssh.keepalive_interval,
			});
		const schedulerOptions = schedulerOptionsFromConfig(config);

		if (options.once) {
			return await runOnce(targets, sessionFactory, schedulerOptions, options.output ?? process.stdout);
		}

		if (!(options.isTTY ?? process.stdout.isTTY)) {
			printError("stdout is not a terminal; use --once for a single plain-text table");
			return 1;
		}

		let requestQuit = () => {};
		const quitRequested = new Promise<void>((resolve) => {
			requestQuit = resolve;
		});

		const view = new FleetView(targets, { refreshIntervalMs: schedulerOptions.refreshIntervalMs });
		const live = new LiveView(options.terminal ?? new ProcessTerminal(), view, {
			renderIntervalMs: Math.round(config.display.render_interval * 1000),
			onQuit: () => requestQuit(),
		});
		const scheduler = new FleetScheduler(targets, {
			sessionFactory,
			probeRunner: new ProbeRunner(),
			sink: live,
			options: schedulerOptions,
			onCycle: (info) => live.setCycleInfo(info),
		});

		try {
			live.start();
		} catch (err) {
			logError("Failed to start live view", err);
			printError(`Failed to start live view: ${err instanceof Error ? err.message : String(err)}`);
			return 1;
		}

		const onSignal = () => requestQuit();
		if (options.handleSignals ?? true) {
			process.on("SIGINT", onSignal);
			process.on("SIGTERM", onSignal);
		}

		scheduler.start();
		await quitRequested;
		logInfo("Shutting down");

		process.off("SIGINT", onSignal);
		process.off("SIGTERM", onSignal);
		await scheduler.stop();
		await live.stop();
		return 0;
	} finally {
		shutdownLogging();
	}
}

async function runOnce(
	targets: Target[],
	sessionFactory: SessionFactory,
	options: SchedulerOptions,
	output: NonNullable<RunOptions["output"]>,
): Promise<number> {
	const scheduler = new FleetScheduler(targets, {
		sessionFactory,
		probeRunner: new ProbeRunner(),
		sink: { applyUpdate: () => {} },
		options,
	});
	const snapshot = await scheduler.runOnce();
	await scheduler.stop();
	output.write(`${renderSnapshot(snapshot.values(), output.columns ?? 120)}\n`);
	return 0;
}
