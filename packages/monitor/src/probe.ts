/**
 * @file GPU 探测
 *
 * 本文件负责在已建立的会话上查询 GPU 状态：
 * - GpuQuery：可替换的查询命令 + 输出解析器，默认使用 nvidia-smi 的 CSV 输出
 * - parseGpuOutput：逐行解析，格式错误的行被跳过并计数
 * - ProbeRunner：执行查询、施加命令超时，并把结果转换为 ProbeResult
 */
import { ProbeCancelledError } from "./errors.js";
import type { Session } from "./ssh.js";
import type { GpuDevice, ProbeResult } from "./types.js";

/** 解析结果 */
export interface ParsedGpuOutput {
	devices: GpuDevice[];
	/** 非空但格式错误的行数 */
	skippedLines: number;
	/** 非空行总数 */
	totalLines: number;
}

/** GPU 查询：远程命令与对应的输出解析器 */
export interface GpuQuery {
	readonly command: string;
	parse(stdout: string): ParsedGpuOutput;
}

/**
 * nvidia-smi 查询命令
 * 每个 GPU 输出一行：index,name,memory.used,memory.total,utilization.gpu,进程数
 * 进程数按 GPU UUID 统计 --query-compute-apps 的结果
 */
const NVIDIA_SMI_COMMAND = [
	"command -v nvidia-smi >/dev/null 2>&1 || { echo 'nvidia-smi not found' >&2; exit 127; }",
	"apps=$(nvidia-smi --query-compute-apps=gpu_uuid --format=csv,noheader 2>/dev/null)",
	"nvidia-smi --query-gpu=index,uuid,name,memory.used,memory.total,utilization.gpu --format=csv,noheader,nounits |",
	'while IFS=, read -r idx uuid name used total util; do n=$(printf \'%s\\n\' "$apps" | grep -c -- "${uuid# }"); echo "$idx,$name,$used,$total,$util,$n"; done',
].join("\n");

const INTEGER = /^\d+$/;

/** 解析一行，格式错误时返回 undefined */
function parseGpuLine(line: string): GpuDevice | undefined {
	const fields = line.split(",").map((field) => field.trim());
	if (fields.length !== 6) return undefined;

	const [index, name, used, total, util, procs] = fields;
	if (!name) return undefined;
	const integers = [index, used, total, util, procs];
	if (!integers.every((field) => INTEGER.test(field) && Number.isSafeInteger(Number(field)))) return undefined;

	const device: GpuDevice = {
		index: Number(index),
		name,
		memoryUsedMiB: Number(used),
		memoryTotalMiB: Number(total),
		utilizationPercent: Number(util),
		processCount: Number(procs),
	};
	if (device.utilizationPercent > 100) return undefined;
	if (device.memoryUsedMiB > device.memoryTotalMiB) return undefined;
	return device;
}

/**
 * 解析 GPU 查询输出
 * 空行忽略；格式错误或数值越界的行计入 skippedLines，不做截断修正
 */
export function parseGpuOutput(stdout: string): ParsedGpuOutput {
	const devices: GpuDevice[] = [];
	let skippedLines = 0;
	let totalLines = 0;
	for (const raw of stdout.split(/\r?\n/)) {
		const line = raw.trim();
		if (!line) continue;
		totalLines++;
		const device = parseGpuLine(line);
		if (device) {
			devices.push(Object.freeze(device));
		} else {
			skippedLines++;
		}
	}
	return { devices, skippedLines, totalLines };
}

export const nvidiaSmiQuery: GpuQuery = {
	command: NVIDIA_SMI_COMMAND,
	parse: parseGpuOutput,
};

/** 单次探测选项 */
export interface ProbeOptions {
	/** 命令超时（毫秒），独立于连接超时 */
	timeoutMs: number;
	/** 外部取消信号（调度器停止） */
	signal?: AbortSignal;
	/** 计算耗时的起点，默认为 run() 被调用的时刻 */
	startedAt?: number;
}

/** 截断过长的原始输出，只保留前若干字符写入日志 */
const MAX_RAW_LENGTH = 4096;

function clip(text: string): string {
	return text.length > MAX_RAW_LENGTH ? `${text.slice(0, MAX_RAW_LENGTH)}\n… (${text.length - MAX_RAW_LENGTH} more chars)` : text;
}

/**
 * 探测执行器
 * 在会话上执行一次查询命令并解析输出。
 * 命令超时 → timeout（phase: command），会话随之不可用，由调用方关闭；
 * 外部取消 → 抛出 ProbeCancelledError，不转换为结果
 */
export class ProbeRunner {
	readonly query: GpuQuery;

	constructor(query: GpuQuery = nvidiaSmiQuery) {
		this.query = query;
	}

	async run(session: Session, options: ProbeOptions): Promise<ProbeResult> {
		const startedAt = options.startedAt ?? Date.now();
		const finish = <T extends object>(result: T) =>
			Object.freeze({ ...result, timestamp: Date.now(), durationMs: Date.now() - startedAt });

		if (options.signal?.aborted) {
			throw new ProbeCancelledError(session.target.id);
		}

		// 命令超时与外部取消合并为一个信号，靠 timedOut 区分
		const controller = new AbortController();
		let timedOut = false;
		const onAbort = () => controller.abort();
		options.signal?.addEventListener("abort", onAbort, { once: true });
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, options.timeoutMs);

		try {
			const result = await session.exec(this.query.command, { signal: controller.signal });
			const parsed = this.query.parse(result.stdout);

			if (result.exitCode !== 0 && parsed.devices.length === 0) {
				return finish({
					status: "parse_failure" as const,
					detail: `GPU query exited with status ${result.exitCode}`,
					raw: clip(result.stderr || result.stdout),
				});
			}
			if (parsed.totalLines > 0 && parsed.devices.length === 0) {
				return finish({
					status: "parse_failure" as const,
					detail: `no parsable GPU lines in ${parsed.totalLines} line(s) of output`,
					raw: clip(result.stdout),
				});
			}
			return finish({
				status: "success" as const,
				devices: Object.freeze(parsed.devices),
				skippedLines: parsed.skippedLines,
			});
		} catch (err) {
			if (timedOut) {
				return finish({
					status: "timeout" as const,
					phase: "command" as const,
					detail: `GPU query did not finish within ${(options.timeoutMs / 1000).toFixed(1)}s`,
				});
			}
			if (options.signal?.aborted) {
				throw new ProbeCancelledError(session.target.id);
			}
			throw err;
		} finally {
			clearTimeout(timer);
			options.signal?.removeEventListener("abort", onAbort);
		}
	}
}
