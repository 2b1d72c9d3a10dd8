/**
 * @file 核心类型定义文件
 *
 * 本文件定义了 GPU 集群监控的所有核心数据类型，包括：
 * - 监控目标（Target）及其跳板机设置
 * - GPU 设备信息
 * - 单次探测结果（ProbeResult）
 * - 集群快照条目（FleetEntry）
 */

/**
 * 跳板机连接信息
 * 目标连接会通过该主机的 SSH 转发建立
 */
export interface JumpHost {
	readonly host: string;
	readonly port: number;
	readonly username: string;
	/** 私钥路径（已展开 ~） */
	readonly keyPath: string;
}

/**
 * 监控目标
 * 由目标解析器生成，之后只读
 */
export interface Target {
	/** 目标标识，等于主机名（目标按主机名去重） */
	readonly id: string;
	readonly host: string;
	readonly port: number;
	readonly username: string;
	/** 私钥路径（已展开 ~） */
	readonly keyPath: string;
	/** 跳板机，未设置时直连 */
	readonly jumpHost?: JumpHost;
	/** 表格中显示的名称，默认使用主机名 */
	readonly label?: string;
}

/**
 * GPU 设备信息
 * 描述一台机器上单个 GPU 的实时状态
 */
export interface GpuDevice {
	/** GPU 设备编号（对应 CUDA 设备索引） */
	readonly index: number;
	/** GPU 型号名称（如 "NVIDIA A100-SXM4-80GB"） */
	readonly name: string;
	/** 已用显存（MiB） */
	readonly memoryUsedMiB: number;
	/** 显存总量（MiB） */
	readonly memoryTotalMiB: number;
	/** GPU 利用率（0-100） */
	readonly utilizationPercent: number;
	/** 正在使用该 GPU 的计算进程数 */
	readonly processCount: number;
}

/** 探测状态 */
export type ProbeStatus = "success" | "timeout" | "auth_failure" | "connect_failure" | "parse_failure";

/** 超时发生的阶段 */
export type TimeoutPhase = "connect" | "command";

/** 连接失败发生在哪一跳 */
export type Hop = "jump" | "target";

/** 所有探测结果共有的字段 */
interface ProbeResultBase {
	/** 结果产生时间（毫秒时间戳） */
	readonly timestamp: number;
	/** 从开始连接到得出结果的耗时（毫秒） */
	readonly durationMs: number;
}

export interface ProbeSuccess extends ProbeResultBase {
	readonly status: "success";
	readonly devices: readonly GpuDevice[];
	/** 被跳过的格式错误行数 */
	readonly skippedLines: number;
}

export interface ProbeTimeout extends ProbeResultBase {
	readonly status: "timeout";
	readonly phase: TimeoutPhase;
	readonly detail: string;
}

export interface ProbeAuthFailure extends ProbeResultBase {
	readonly status: "auth_failure";
	readonly detail: string;
}

export interface ProbeConnectFailure extends ProbeResultBase {
	readonly status: "connect_failure";
	readonly hop: Hop;
	readonly detail: string;
}

export interface ProbeParseFailure extends ProbeResultBase {
	readonly status: "parse_failure";
	readonly detail: string;
	/** 无法解析的原始输出，仅写入调试日志 */
	readonly raw: string;
}

/**
 * 单次探测结果
 * 只有 success 携带 GPU 信息，其余情况只携带诊断信息
 */
export type ProbeResult = ProbeSuccess | ProbeTimeout | ProbeAuthFailure | ProbeConnectFailure | ProbeParseFailure;

/** 探测失败结果 */
export type ProbeFailure = Exclude<ProbeResult, ProbeSuccess>;

/**
 * 集群快照条目
 * result 为空表示该目标尚未完成首次探测（pending）
 */
export interface FleetEntry {
	readonly target: Target;
	readonly result?: ProbeResult;
	/** 最近一次写入的时间（毫秒时间戳） */
	readonly updatedAt?: number;
}

/**
 * 快照更新接收方
 * 调度器每完成一次探测就推送一条变化的条目
 */
export interface FleetSink {
	applyUpdate(targetId: string, result: ProbeResult): void;
}
