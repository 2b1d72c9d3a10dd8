/**
 * @file 库主入口文件
 *
 * 导出轮询引擎（会话工厂、探测执行器、调度器）、配置与目标解析、视图，
 * 以及所有核心类型，供嵌入其他程序使用。
 */

export { ArgsError, type ParsedArgs, parseArgs } from "./args.js";
export {
	ConfigSchema,
	getDefaultConfigPath,
	type LoadConfigOptions,
	loadConfig,
	type MonitorConfig,
	OVERRIDABLE_FIELDS,
	resolveConfig,
} from "./config.js";
export { ConfigError, type ConfigProblem, ProbeCancelledError, SessionError, type SessionErrorKind } from "./errors.js";
export { type RunOptions, runMonitor, schedulerOptionsFromConfig } from "./main.js";
export { SlotPool } from "./pool.js";
export { type GpuQuery, nvidiaSmiQuery, type ParsedGpuOutput, parseGpuOutput, ProbeRunner } from "./probe.js";
export { type CycleInfo, FleetScheduler, type SchedulerOptions, sessionFailureResult } from "./scheduler.js";
export { FleetSnapshot } from "./snapshot.js";
export {
	buildSshArgs,
	classifySshFailure,
	type ExecResult,
	type Session,
	type SessionFactory,
	type SpawnSsh,
	type SshProcess,
	SshSessionFactory,
} from "./ssh.js";
export { expandHome, findMissingKeys, formatHostname, resolveTargets } from "./targets.js";
export * from "./types.js";
export { FleetView, LiveView, renderSnapshot } from "./view.js";
