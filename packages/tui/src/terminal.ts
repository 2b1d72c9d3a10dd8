/**
 * @file 终端接口和实现
 *
 * 本文件定义了 TUI 框架所需的终端抽象接口（Terminal），
 * 以及基于 process.stdin/stdout 的真实终端实现（ProcessTerminal）。
 *
 * ProcessTerminal 负责：
 * - stdin 为 TTY 时启用原始模式，以便逐键读取 q / Ctrl+C
 * - 监听终端尺寸变化
 * - 隐藏 / 显示光标，退出时恢复终端状态
 */

/**
 * TUI 框架的最小终端接口
 *
 * 可以用不同的实现替换（如测试用的记录终端）。
 */
export interface Terminal {
	/** 使用输入和调整大小的处理器启动终端 */
	start(onInput: (data: string) => void, onResize: () => void): void;

	/** 停止终端并恢复状态 */
	stop(): void;

	/** 向终端写入输出 */
	write(data: string): void;

	/** 获取终端列数 */
	get columns(): number;
	/** 获取终端行数 */
	get rows(): number;

	/** 隐藏光标 */
	hideCursor(): void;
	/** 显示光标 */
	showCursor(): void;
}

/**
 * 基于 process.stdin/stdout 的真实终端实现
 */
export class ProcessTerminal implements Terminal {
	/** 启动前是否已处于原始模式 */
	private wasRaw = false;
	/** 是否由本实例开启了原始模式 */
	private rawEnabled = false;
	/** 终端大小调整处理回调 */
	private resizeHandler?: () => void;
	/** stdin data 事件处理器引用（用于后续清理） */
	private stdinDataHandler?: (data: string) => void;

	start(onInput: (data: string) => void, onResize: () => void): void {
		this.resizeHandler = onResize;
		process.stdout.on("resize", this.resizeHandler);

		// 非交互式 stdin（管道、后台运行）不读取按键
		if (!process.stdin.isTTY) {
			return;
		}

		this.wasRaw = process.stdin.isRaw;
		process.stdin.setRawMode(true);
		this.rawEnabled = true;
		process.stdin.setEncoding("utf8");
		this.stdinDataHandler = (data: string) => onInput(data);
		process.stdin.on("data", this.stdinDataHandler);
		process.stdin.resume();
	}

	stop(): void {
		if (this.resizeHandler) {
			process.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}
		if (this.stdinDataHandler) {
			process.stdin.removeListener("data", this.stdinDataHandler);
			this.stdinDataHandler = undefined;
		}
		if (this.rawEnabled) {
			process.stdin.setRawMode(this.wasRaw);
			this.rawEnabled = false;
		}
		// 释放 stdin，否则事件循环不会退出
		process.stdin.pause();
	}

	write(data: string): void {
		process.stdout.write(data);
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	hideCursor(): void {
		process.stdout.write("\x1b[?25l");
	}

	showCursor(): void {
		process.stdout.write("\x1b[?25h");
	}
}
