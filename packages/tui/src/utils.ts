/**
 * @file 文本宽度工具集
 *
 * 提供终端文本渲染所需的宽度计算函数：
 * - 可见宽度计算（跳过 ANSI 转义码，正确处理 CJK 全角字符）
 * - 按可见宽度截断（带省略号，不截断转义码）
 * - 按可见宽度填充（左对齐 / 右对齐 / 居中）
 */

import { eastAsianWidth } from "get-east-asian-width";

/** 字位分割器（共享实例） */
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** 零宽度字符：控制字符、组合标记、变体选择符、零宽连接符 */
const zeroWidthRegex = /^[\p{Control}\p{Mark}\u200b-\u200f\u2060\ufe00-\ufe0f]+$/u;

// 非 ASCII 字符串的宽度缓存
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/** 计算单个字位簇的终端显示宽度 */
function graphemeWidth(segment: string): number {
	if (zeroWidthRegex.test(segment)) {
		return 0;
	}
	const cp = segment.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}
	// 补充平面的表情符号按双宽显示
	if (cp >= 0x1f300 && cp <= 0x1faff) {
		return 2;
	}
	return eastAsianWidth(cp);
}

/** 移除字符串中的 SGR / 光标控制 / OSC 8 转义序列 */
export function stripAnsi(str: string): string {
	if (!str.includes("\x1b")) return str;
	return str.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, "").replace(/\x1b\]8;;[^\x07]*\x07/g, "");
}

/** 计算字符串在终端中的可见宽度（列数） */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}

	// 快速路径：纯 ASCII 可打印字符
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	const cached = widthCache.get(str);
	if (cached !== undefined) {
		return cached;
	}

	const clean = stripAnsi(str.replace(/\t/g, "   "));
	let width = 0;
	for (const { segment } of segmenter.segment(clean)) {
		width += graphemeWidth(segment);
	}

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(str, width);

	return width;
}

/** 从字符串的指定位置提取一个 CSI / OSC 转义序列 */
function extractAnsiCode(str: string, pos: number): string | null {
	if (str[pos] !== "\x1b") return null;
	const next = str[pos + 1];

	if (next === "[") {
		let j = pos + 2;
		while (j < str.length && !/[A-Za-z]/.test(str[j])) j++;
		return j < str.length ? str.substring(pos, j + 1) : null;
	}

	if (next === "]") {
		const end = str.indexOf("\x07", pos + 2);
		return end === -1 ? null : str.substring(pos, end + 1);
	}

	return null;
}

/**
 * 将文本截断至最大可见宽度，必要时添加省略号。
 * 转义码原样保留且不计入宽度；截断处会插入 reset，防止样式泄漏到省略号。
 *
 * @param ellipsis - 截断时追加的省略号（默认 "…"）
 * @param pad - 为 true 时用空格填充至恰好 maxWidth
 */
export function truncateToWidth(text: string, maxWidth: number, ellipsis = "…", pad = false): string {
	const textWidth = visibleWidth(text);
	if (textWidth <= maxWidth) {
		return pad ? text + " ".repeat(maxWidth - textWidth) : text;
	}

	const ellipsisWidth = visibleWidth(ellipsis);
	const targetWidth = maxWidth - ellipsisWidth;
	if (targetWidth <= 0) {
		return ellipsis.substring(0, Math.max(0, maxWidth));
	}

	let result = "";
	let currentWidth = 0;
	let i = 0;
	let sawAnsi = false;
	outer: while (i < text.length) {
		const code = extractAnsiCode(text, i);
		if (code) {
			result += code;
			sawAnsi = true;
			i += code.length;
			continue;
		}
		// 到下一个转义码为止的纯文本片段，按字位切分
		let end = i;
		while (end < text.length && text[end] !== "\x1b") end++;
		if (end === i) end = i + 1;
		for (const { segment } of segmenter.segment(text.slice(i, end))) {
			const w = visibleWidth(segment);
			if (currentWidth + w > targetWidth) break outer;
			result += segment;
			currentWidth += w;
		}
		i = end;
	}

	const truncated = `${result}${sawAnsi ? "\x1b[0m" : ""}${ellipsis}`;
	if (pad) {
		return truncated + " ".repeat(Math.max(0, maxWidth - currentWidth - ellipsisWidth));
	}
	return truncated;
}

/** 列对齐方式 */
export type Align = "left" | "right" | "center";

/**
 * 将文本填充（或截断）至恰好 width 列。
 */
export function padToWidth(text: string, width: number, align: Align = "left"): string {
	const fitted = truncateToWidth(text, width);
	const gap = Math.max(0, width - visibleWidth(fitted));
	if (align === "right") return " ".repeat(gap) + fitted;
	if (align === "center") {
		const left = Math.floor(gap / 2);
		return " ".repeat(left) + fitted + " ".repeat(gap - left);
	}
	return fitted + " ".repeat(gap);
}
