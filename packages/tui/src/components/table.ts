/**
 * @file 表格组件
 *
 * 以框线字符绘制带表头的表格。列宽取表头、单元格内容与最小宽度中的最大值；
 * 视口不足时优先收缩标记为 flexible 的列，其余部分交给逐行截断。
 * 单元格可以携带 ANSI 样式，宽度计算会忽略转义码。
 */

import type { Component } from "../tui.js";
import { type Align, padToWidth, truncateToWidth, visibleWidth } from "../utils.js";

/** 表格列定义 */
export interface TableColumn {
	/** 表头文本 */
	header: string;
	/** 单元格对齐方式（默认左对齐） */
	align?: Align;
	/** 最小列宽 */
	minWidth?: number;
	/** 视口不足时是否允许收缩该列 */
	flexible?: boolean;
}

/** 表格主题 - 各部分的样式函数 */
export interface TableTheme {
	border: (text: string) => string;
	header: (text: string) => string;
	title: (text: string) => string;
}

const plain = (text: string) => text;

const defaultTheme: TableTheme = { border: plain, header: plain, title: plain };

/** 可收缩列的最小宽度 */
const MIN_FLEX_WIDTH = 6;

export class Table implements Component {
	private columns: TableColumn[];
	private rows: string[][] = [];
	private title?: string;
	private theme: TableTheme;
	private center: boolean;

	private cachedWidth?: number;
	private cachedLines?: string[];

	constructor(columns: TableColumn[], options: { title?: string; theme?: Partial<TableTheme>; center?: boolean } = {}) {
		this.columns = columns;
		this.title = options.title;
		this.theme = { ...defaultTheme, ...options.theme };
		this.center = options.center ?? false;
	}

	/** 替换全部数据行。每行单元格数与列数不一致时，缺少的单元格视为空串 */
	setRows(rows: string[][]): void {
		this.rows = rows;
		this.invalidate();
	}

	invalidate(): void {
		this.cachedWidth = undefined;
		this.cachedLines = undefined;
	}

	/** 计算各列内容宽度（不含两侧各 1 列的内边距） */
	private computeWidths(viewportWidth: number): number[] {
		const widths = this.columns.map((column, i) => {
			let w = Math.max(column.minWidth ?? 0, visibleWidth(column.header));
			for (const row of this.rows) {
				w = Math.max(w, visibleWidth(row[i] ?? ""));
			}
			return w;
		});

		// 每列占 宽度 + 2 内边距 + 1 竖线，再加最左侧竖线
		const total = () => widths.reduce((sum, w) => sum + w + 3, 1);
		let overflow = total() - viewportWidth;
		for (let i = 0; i < widths.length && overflow > 0; i++) {
			if (!this.columns[i].flexible) continue;
			const floor = Math.max(MIN_FLEX_WIDTH, visibleWidth(this.columns[i].header));
			const shrink = Math.min(overflow, Math.max(0, widths[i] - floor));
			widths[i] -= shrink;
			overflow -= shrink;
		}
		return widths;
	}

	private rule(widths: number[], left: string, mid: string, right: string): string {
		return this.theme.border(left + widths.map((w) => "─".repeat(w + 2)).join(mid) + right);
	}

	private line(widths: number[], cells: string[], style?: (text: string) => string): string {
		const bar = this.theme.border("│");
		const parts = widths.map((w, i) => {
			const cell = padToWidth(cells[i] ?? "", w, this.columns[i].align);
			return ` ${style ? style(cell) : cell} `;
		});
		return bar + parts.join(bar) + bar;
	}

	render(width: number): string[] {
		if (this.cachedLines && this.cachedWidth === width) {
			return this.cachedLines;
		}

		const widths = this.computeWidths(width);
		const tableWidth = widths.reduce((sum, w) => sum + w + 3, 1);
		const lines: string[] = [];

		if (this.title) {
			lines.push(this.theme.title(padToWidth(this.title, Math.min(tableWidth, width), "center")));
		}
		lines.push(this.rule(widths, "┌", "┬", "┐"));
		lines.push(
			this.line(
				widths,
				this.columns.map((c) => c.header),
				this.theme.header,
			),
		);
		lines.push(this.rule(widths, "├", "┼", "┤"));
		for (const row of this.rows) {
			lines.push(this.line(widths, row));
		}
		lines.push(this.rule(widths, "└", "┴", "┘"));

		const indent = this.center ? " ".repeat(Math.max(0, Math.floor((width - tableWidth) / 2))) : "";
		const result = lines.map((line) => truncateToWidth(indent + line, width, ""));

		this.cachedWidth = width;
		this.cachedLines = result;
		return result;
	}
}
