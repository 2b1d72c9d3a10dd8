/**
 * @file TUI 核心实现 - 差异化终端渲染引擎
 *
 * 本文件实现了终端 UI 框架的核心功能，包括：
 * - Component 组件接口定义
 * - Container 容器组件（组合子组件）
 * - TUI 主类（差异化渲染、输入转发、渲染请求合并）
 *
 * 渲染机制：
 * TUI 使用差异化渲染策略，只重写发生变化的行区间，减少终端闪烁和带宽使用。
 * 每次写入都包裹在同步输出（Synchronized Output）序列中以避免撕裂。
 */

import type { Terminal } from "./terminal.js";
import { truncateToWidth, visibleWidth } from "./utils.js";

/**
 * 组件接口 - 所有 TUI 组件必须实现此接口
 */
export interface Component {
	/**
	 * 将组件渲染为指定视口宽度的行数组
	 * @param width - 当前视口宽度（终端列数）
	 * @returns 字符串数组，每个元素代表一行输出
	 */
	render(width: number): string[];

	/**
	 * 使缓存的渲染状态失效。
	 * 在组件需要从头重新渲染时调用。
	 */
	invalidate(): void;
}

/**
 * 容器组件 - 可以包含多个子组件的组合组件
 */
export class Container implements Component {
	/** 子组件列表 */
	children: Component[] = [];

	addChild(component: Component): void {
		this.children.push(component);
	}

	clear(): void {
		this.children = [];
	}

	invalidate(): void {
		for (const child of this.children) {
			child.invalidate();
		}
	}

	render(width: number): string[] {
		const lines: string[] = [];
		for (const child of this.children) {
			lines.push(...child.render(width));
		}
		return lines;
	}
}

/** 同步输出开始 / 结束 */
const SYNC_START = "\x1b[?2026h";
const SYNC_END = "\x1b[?2026l";
/** 每行末尾的样式重置，防止颜色跨行泄漏 */
const LINE_RESET = "\x1b[0m";

/** 生成相对移动光标的转义序列（正数向下，负数向上） */
function moveBy(lines: number): string {
	if (lines > 0) return `\x1b[${lines}B`;
	if (lines < 0) return `\x1b[${-lines}A`;
	return "";
}

/**
 * TUI 主类 - 管理终端 UI 的差异化渲染引擎
 *
 * 核心职责：
 * - 差异化渲染：只更新变化的行
 * - 渲染请求合并：同一 tick 内的多次 requestRender 只渲染一次
 * - 输入转发：把终端输入交给 onInput 回调
 */
export class TUI extends Container {
	/** 终端接口实例 */
	public terminal: Terminal;
	/** 键盘输入回调 */
	public onInput?: (data: string) => void;
	/** 上一次渲染的行内容（用于差异比较） */
	private previousLines: string[] = [];
	/** 上一次渲染时的终端宽度 */
	private previousWidth = 0;
	/** 光标当前所在的内容行 */
	private cursorRow = 0;
	/** 是否已请求渲染（防止同一 tick 内重复渲染） */
	private renderRequested = false;
	/** 完整重绘计数 */
	private fullRedrawCount = 0;
	/** 渲染计数（含差异渲染） */
	private renderCount = 0;
	/** 是否已停止 */
	private stopped = true;

	constructor(terminal: Terminal) {
		super();
		this.terminal = terminal;
	}

	/** 完整重绘次数 */
	get fullRedraws(): number {
		return this.fullRedrawCount;
	}

	/** 实际写出过内容的渲染次数 */
	get renders(): number {
		return this.renderCount;
	}

	/** 启动 TUI - 开始监听输入和调整大小事件，隐藏光标并触发首次渲染 */
	start(): void {
		this.stopped = false;
		this.terminal.start(
			(data) => this.onInput?.(data),
			() => this.requestRender(),
		);
		this.terminal.hideCursor();
		this.requestRender();
	}

	/** 停止 TUI - 将光标移到内容末尾，恢复光标可见性，停止终端 */
	stop(): void {
		if (this.stopped) return;
		this.stopped = true;
		if (this.previousLines.length > 0) {
			this.terminal.write(`${moveBy(this.previousLines.length - 1 - this.cursorRow)}\r\n`);
		}
		this.terminal.showCursor();
		this.terminal.stop();
	}

	/** 请求渲染。force=true 时清屏并完整重绘 */
	requestRender(force = false): void {
		if (force) {
			this.previousLines = [];
			this.previousWidth = -1;
			this.cursorRow = 0;
		}
		if (this.renderRequested) return;
		this.renderRequested = true;
		process.nextTick(() => {
			this.renderRequested = false;
			this.doRender();
		});
	}

	/** 渲染全部组件并做宽度保护与行尾重置 */
	private renderLines(width: number): string[] {
		return this.render(width).map((line) => {
			const fitted = visibleWidth(line) > width ? truncateToWidth(line, width, "") : line;
			return fitted + LINE_RESET;
		});
	}

	/** 执行实际的差异化渲染 - 比较新旧行，只更新变化的部分 */
	private doRender(): void {
		if (this.stopped) return;
		const width = this.terminal.columns;
		const height = this.terminal.rows;
		const newLines = this.renderLines(width);
		const previousLength = this.previousLines.length;

		const fullRender = (clear: boolean): void => {
			this.fullRedrawCount += 1;
			this.renderCount += 1;
			let buffer = SYNC_START;
			if (clear) buffer += "\x1b[3J\x1b[2J\x1b[H";
			buffer += newLines.join("\r\n");
			buffer += SYNC_END;
			this.terminal.write(buffer);
			this.cursorRow = Math.max(0, newLines.length - 1);
			this.previousLines = newLines;
			this.previousWidth = width;
		};

		const widthChanged = this.previousWidth !== 0 && this.previousWidth !== width;

		// 首次渲染：直接输出（假定屏幕从当前位置开始是干净的）
		if (previousLength === 0 && !widthChanged) {
			fullRender(false);
			return;
		}
		// 宽度变化或内容清空：整屏重绘
		if (widthChanged || newLines.length === 0) {
			fullRender(true);
			return;
		}

		// 查找首个和最后一个变化的行
		let firstChanged = -1;
		let lastChanged = -1;
		const maxLines = Math.max(newLines.length, previousLength);
		for (let i = 0; i < maxLines; i++) {
			const oldLine = i < previousLength ? this.previousLines[i] : "";
			const newLine = i < newLines.length ? newLines[i] : "";
			if (oldLine !== newLine) {
				if (firstChanged === -1) firstChanged = i;
				lastChanged = i;
			}
		}
		if (newLines.length > previousLength) {
			firstChanged = firstChanged === -1 ? previousLength : Math.min(firstChanged, previousLength);
			lastChanged = newLines.length - 1;
		}

		if (firstChanged === -1) {
			return;
		}

		// 变化位于已滚出视口的区域，无法用相对移动到达
		if (firstChanged < Math.max(0, previousLength - height)) {
			fullRender(true);
			return;
		}

		this.renderCount += 1;
		let buffer = SYNC_START;
		let cursor = this.cursorRow;

		if (firstChanged >= newLines.length) {
			// 仅有行被删除：移动到新内容末尾
			const target = newLines.length - 1;
			buffer += `${moveBy(target - cursor)}\r`;
			cursor = target;
		} else {
			const appendStart = firstChanged === previousLength;
			const moveTarget = appendStart ? previousLength - 1 : firstChanged;
			buffer += moveBy(moveTarget - cursor);
			// 追加的行需要用换行滚动出来，光标下移序列不会滚动屏幕
			buffer += appendStart ? "\r\n" : "\r";
			const renderEnd = Math.min(lastChanged, newLines.length - 1);
			for (let i = firstChanged; i <= renderEnd; i++) {
				if (i > firstChanged) buffer += "\r\n";
				buffer += `\x1b[2K${newLines[i]}`;
			}
			cursor = renderEnd;
		}

		// 旧内容更长：清除多余的行并回到新内容末尾
		if (previousLength > newLines.length) {
			const lastRow = newLines.length - 1;
			if (cursor < lastRow) {
				buffer += moveBy(lastRow - cursor);
				cursor = lastRow;
			}
			const extraLines = previousLength - newLines.length;
			buffer += "\r\n\x1b[2K".repeat(extraLines);
			buffer += moveBy(-extraLines);
		}

		buffer += SYNC_END;
		this.terminal.write(buffer);

		this.cursorRow = cursor;
		this.previousLines = newLines;
		this.previousWidth = width;
	}
}
