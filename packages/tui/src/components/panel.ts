/**
 * @file 面板组件
 *
 * 用圆角框线包住一段文本，宽度贴合内容（不超过视口）。
 */

import type { Component } from "../tui.js";
import { padToWidth, visibleWidth } from "../utils.js";

export class Panel implements Component {
	private text: string;
	private borderFn: (text: string) => string;
	private center: boolean;

	constructor(text: string, options: { border?: (text: string) => string; center?: boolean } = {}) {
		this.text = text;
		this.borderFn = options.border ?? ((t) => t);
		this.center = options.center ?? false;
	}

	invalidate(): void {}

	render(width: number): string[] {
		const content = this.text.split("\n");
		const inner = Math.min(
			Math.max(0, width - 4),
			content.reduce((max, line) => Math.max(max, visibleWidth(line)), 0),
		);
		const boxWidth = inner + 4;
		const indent = this.center ? " ".repeat(Math.max(0, Math.floor((width - boxWidth) / 2))) : "";
		const b = this.borderFn;
		return [
			indent + b(`╭${"─".repeat(inner + 2)}╮`),
			...content.map((line) => `${indent}${b("│")} ${padToWidth(line, inner)} ${b("│")}`),
			indent + b(`╰${"─".repeat(inner + 2)}╯`),
		];
	}
}
