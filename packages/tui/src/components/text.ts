/**
 * @file 文本组件
 *
 * 显示一行或多行文本，支持内边距与对齐。超出视口宽度的行会被截断（不换行），
 * 以保证表格类界面的行数稳定。渲染结果会被缓存以避免不必要的重新计算。
 */

import type { Component } from "../tui.js";
import { type Align, padToWidth } from "../utils.js";

/**
 * 文本组件 - 按换行符拆分文本，逐行截断并填充至视口宽度。
 */
export class Text implements Component {
	/** 文本内容 */
	private text: string;
	/** 左右内边距（字符数） */
	private paddingX: number;
	/** 上下内边距（行数） */
	private paddingY: number;
	/** 行内对齐方式 */
	private align: Align;

	// 渲染输出缓存
	private cachedText?: string;
	private cachedWidth?: number;
	private cachedLines?: string[];

	constructor(text = "", paddingX = 1, paddingY = 0, align: Align = "left") {
		this.text = text;
		this.paddingX = paddingX;
		this.paddingY = paddingY;
		this.align = align;
	}

	/** 设置文本内容并清除缓存 */
	setText(text: string): void {
		if (text === this.text) return;
		this.text = text;
		this.invalidate();
	}

	invalidate(): void {
		this.cachedText = undefined;
		this.cachedWidth = undefined;
		this.cachedLines = undefined;
	}

	render(width: number): string[] {
		if (this.cachedLines && this.cachedText === this.text && this.cachedWidth === width) {
			return this.cachedLines;
		}

		let result: string[] = [];
		if (this.text.trim() !== "") {
			const contentWidth = Math.max(1, width - this.paddingX * 2);
			const margin = " ".repeat(this.paddingX);
			const contentLines = this.text
				.replace(/\t/g, "   ")
				.split("\n")
				.map((line) => padToWidth(margin + padToWidth(line, contentWidth, this.align) + margin, width));
			const emptyLines = Array.from({ length: this.paddingY }, () => " ".repeat(width));
			result = [...emptyLines, ...contentLines, ...emptyLines];
		}

		this.cachedText = this.text;
		this.cachedWidth = width;
		this.cachedLines = result;
		return result;
	}
}
