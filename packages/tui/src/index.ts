/**
 * @file TUI 框架入口文件
 *
 * 本文件是终端 UI 包的公共 API 入口点，重新导出：
 * - 核心 TUI 类和组件接口（TUI、Container、Component）
 * - UI 组件（Text、Table、Panel）
 * - 终端接口和实现
 * - 文本宽度工具函数
 */

// UI 组件
export { Panel } from "./components/panel.js";
export { Table, type TableColumn, type TableTheme } from "./components/table.js";
export { Text } from "./components/text.js";
// 终端接口和实现
export { ProcessTerminal, type Terminal } from "./terminal.js";
export { type Component, Container, TUI } from "./tui.js";
// 文本处理工具函数
export { type Align, padToWidth, stripAnsi, truncateToWidth, visibleWidth } from "./utils.js";
