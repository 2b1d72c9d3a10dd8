/**
 * @file 实时视图
 *
 * 本文件实现了集群状态表格的展示：
 * - FleetView：表格组件 + 页脚，持有自己的行模型，applyUpdate 只修改模型并标记为脏
 * - LiveView：持有 TUI，按固定节奏（render_interval）检查脏标记并请求重绘，
 *   一段时间内的多次更新合并为一次渲染；退出时用 Goodbye 面板替换表格
 * - renderSnapshot：--once 模式下把快照渲染为纯文本
 */
import { type Component, Panel, Table, type TableColumn, type Terminal, Text, TUI } from "@gpumon/tui";
import chalk from "chalk";
import type { CycleInfo } from "./scheduler.js";
import type { FleetEntry, FleetSink, ProbeFailure, ProbeResult, Target } from "./types.js";

/** 表格列（与原有的展示保持一致） */
export const FLEET_COLUMNS: TableColumn[] = [
	{ header: "Hostname", minWidth: 10 },
	{ header: "Status/Model", minWidth: 12, flexible: true },
	{ header: "Free", align: "center", minWidth: 5 },
	{ header: "Procs", align: "center" },
	{ header: "GPU %", align: "right" },
	{ header: "Memory", align: "right", minWidth: 10 },
];

const EMPTY = "—";

/** 失败结果的简短说明，原始输出只写入日志 */
export function describeFailure(result: ProbeFailure): string {
	switch (result.status) {
		case "timeout":
			return `timeout (${result.phase})`;
		case "auth_failure":
			return "auth failed";
		case "connect_failure":
			return result.hop === "jump" ? `jump host unreachable: ${result.detail}` : `unreachable: ${result.detail}`;
		case "parse_failure":
			return "parse error";
	}
}

/**
 * 把条目转换为表格行
 * 成功的主机每个 GPU 一行，主机名只出现在第一行
 */
export function buildRows(entries: readonly FleetEntry[]): string[][] {
	const rows: string[][] = [];
	for (const { target, result } of entries) {
		const name = chalk.cyan(target.label ?? target.host);
		if (!result) {
			rows.push([name, chalk.yellow("pending"), EMPTY, EMPTY, EMPTY, EMPTY]);
		} else if (result.status !== "success") {
			rows.push([name, chalk.red(describeFailure(result)), EMPTY, EMPTY, EMPTY, EMPTY]);
		} else if (result.devices.length === 0) {
			rows.push([name, chalk.dim("no GPUs"), EMPTY, EMPTY, EMPTY, EMPTY]);
		} else {
			result.devices.forEach((gpu, i) => {
				const free = gpu.processCount === 0;
				rows.push([
					i === 0 ? name : "",
					chalk.green(`${gpu.index}: ${gpu.name}`),
					free ? chalk.green("yes") : chalk.yellow("no"),
					String(gpu.processCount),
					`${gpu.utilizationPercent}%`,
					`${gpu.memoryUsedMiB}/${gpu.memoryTotalMiB} MiB`,
				]);
			});
		}
	}
	return rows;
}

/** 格式化为 HH:MM:SS */
function clockTime(epochMs: number): string {
	const date = new Date(epochMs);
	const hh = String(date.getHours()).padStart(2, "0");
	const mm = String(date.getMinutes()).padStart(2, "0");
	const ss = String(date.getSeconds()).padStart(2, "0");
	return `${hh}:${mm}:${ss}`;
}

/**
 * 集群表格组件
 * 行模型按目标顺序保存，每个目标一个条目，后写者胜
 */
export class FleetView implements Component, FleetSink {
	private targets: readonly Target[];
	private results = new Map<string, ProbeResult>();
	private cycle?: CycleInfo;
	private refreshIntervalMs: number;
	private table: Table;
	private footer = new Text("", 1, 0);
	private showFooter: boolean;
	private dirty = true;

	/**
	 * @param options.footer - 是否显示页脚，默认显示
	 * @param options.center - 表格是否在视口中居中，默认居中
	 */
	constructor(targets: readonly Target[], options: { refreshIntervalMs: number; footer?: boolean; center?: boolean }) {
		this.targets = targets;
		this.table = new Table(FLEET_COLUMNS, {
			title: "GPU Fleet Status",
			theme: { border: chalk.blue, header: chalk.bold.magenta, title: chalk.bold },
			center: options.center ?? true,
		});
		this.refreshIntervalMs = options.refreshIntervalMs;
		this.showFooter = options.footer ?? true;
	}

	/** 自上次渲染以来模型是否发生过变化 */
	get isDirty(): boolean {
		return this.dirty;
	}

	applyUpdate(targetId: string, result: ProbeResult): void {
		if (!this.targets.some((target) => target.id === targetId)) return;
		this.results.set(targetId, result);
		this.dirty = true;
	}

	setCycleInfo(info: CycleInfo): void {
		this.cycle = info;
		this.dirty = true;
	}

	/** 按目标顺序返回当前行模型 */
	entries(): FleetEntry[] {
		return this.targets.map((target) => {
			const result = this.results.get(target.id);
			return result ? { target, result } : { target };
		});
	}

	/** 成功 / 失败 / 待定计数 */
	counts(): { ok: number; failed: number; pending: number } {
		let ok = 0;
		let failed = 0;
		for (const result of this.results.values()) {
			if (result.status === "success") ok++;
			else failed++;
		}
		return { ok, failed, pending: this.targets.length - ok - failed };
	}

	private footerText(): string {
		const { ok, failed, pending } = this.counts();
		const parts = [
			this.cycle ? `last cycle ${clockTime(this.cycle.startedAt)}` : "starting",
			chalk.green(`${ok} ok`),
			failed > 0 ? chalk.red(`${failed} failed`) : `${failed} failed`,
			`${pending} pending`,
		];
		if (this.cycle && this.cycle.skipped > 0) {
			parts.push(chalk.yellow(`${this.cycle.skipped} slow`));
		}
		parts.push(`refresh ${this.refreshIntervalMs / 1000}s`, "q to quit");
		return parts.join(chalk.dim(" · "));
	}

	invalidate(): void {
		this.table.invalidate();
		this.footer.invalidate();
	}

	render(width: number): string[] {
		if (this.dirty) {
			this.table.setRows(buildRows(this.entries()));
			this.footer.setText(this.footerText());
			this.dirty = false;
		}
		const lines = this.table.render(width);
		return this.showFooter ? [...lines, ...this.footer.render(width)] : lines;
	}
}

/** 实时视图选项 */
export interface LiveViewOptions {
	/** 检查脏标记的间隔（毫秒） */
	renderIntervalMs: number;
	/** 按下 q 或 Ctrl+C 时调用 */
	onQuit: () => void;
}

/**
 * 实时视图 - 把 FleetView 挂到 TUI 上并按固定节奏重绘
 */
export class LiveView implements FleetSink {
	readonly tui: TUI;
	readonly view: FleetView;
	private options: LiveViewOptions;
	private timer?: NodeJS.Timeout;

	constructor(terminal: Terminal, view: FleetView, options: LiveViewOptions) {
		this.tui = new TUI(terminal);
		this.view = view;
		this.options = options;
	}

	start(): void {
		this.tui.addChild(this.view);
		this.tui.onInput = (data) => {
			if (data === "q" || data === "Q" || data === "\x03") {
				this.options.onQuit();
			}
		};
		this.tui.start();
		this.timer = setInterval(() => {
			if (this.view.isDirty) this.tui.requestRender();
		}, this.options.renderIntervalMs);
	}

	applyUpdate(targetId: string, result: ProbeResult): void {
		this.view.applyUpdate(targetId, result);
	}

	setCycleInfo(info: CycleInfo): void {
		this.view.setCycleInfo(info);
	}

	/**
	 * 停止重绘，用 Goodbye 面板替换表格后恢复终端
	 */
	async stop(): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = undefined;
		}
		this.tui.clear();
		this.tui.addChild(new Panel("Goodbye! 👋", { border: chalk.blue, center: true }));
		this.tui.requestRender();
		// requestRender 在 nextTick 中执行，先让它完成
		await new Promise<void>((resolve) => process.nextTick(resolve));
		this.tui.stop();
	}
}

/** 把条目渲染为纯文本表格（--once 模式） */
export function renderSnapshot(entries: readonly FleetEntry[], width: number): string {
	const view = new FleetView(
		entries.map((entry) => entry.target),
		{ refreshIntervalMs: 0, footer: false, center: false },
	);
	for (const entry of entries) {
		if (entry.result) view.applyUpdate(entry.target.id, entry.result);
	}
	return view.render(width).join("\n");
}
