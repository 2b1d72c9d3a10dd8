/**
 * @file 配置管理模块
 *
 * 本文件负责加载监控配置，包括：
 * - 读取并解析 YAML 配置文件
 * - 用 TypeBox schema 填充默认值、转换类型并校验
 * - 合并命令行覆盖项（--ssh.username=alice 等）与 --targets
 * - 冻结最终配置，启动后不再修改
 *
 * 默认配置文件位于包目录下的 config/config.yaml，可通过 GPUMON_CONFIG 环境变量覆盖。
 */
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { existsSync, readFileSync } from "fs";
import { fileURLToPath } from "url";
import { parse, YAMLParseError } from "yaml";
import { ConfigError } from "./errors.js";

const OptionalString = () => Type.Optional(Type.String());
const Port = (options: { default?: number } = {}) => Type.Integer({ minimum: 1, maximum: 65535, ...options });

/** 单个目标：主机名，或带覆盖项的对象 */
const TargetEntrySchema = Type.Union([
	Type.String({ minLength: 1 }),
	Type.Object(
		{
			host: Type.String({ minLength: 1 }),
			username: OptionalString(),
			key_path: OptionalString(),
			port: Type.Optional(Port()),
			/** 空字符串表示对该目标禁用全局跳板机 */
			jump_host: OptionalString(),
			label: OptionalString(),
		},
		{ additionalProperties: false },
	),
]);

/** 命名模式，如 gpu01..gpu16 */
const TargetPatternSchema = Type.Object(
	{
		prefix: Type.String(),
		start: Type.Integer({ minimum: 0 }),
		end: Type.Integer({ minimum: 0 }),
		format: Type.String({ default: "{prefix}{number:02d}" }),
		username: OptionalString(),
		key_path: OptionalString(),
		jump_host: OptionalString(),
	},
	{ additionalProperties: false },
);

export const ConfigSchema = Type.Object(
	{
		ssh: Type.Object(
			{
				username: Type.String({ minLength: 1 }),
				key_path: Type.String({ default: "~/.ssh/id_rsa" }),
				port: Port({ default: 22 }),
				jump_host: Type.String({ default: "" }),
				jump_username: Type.String({ default: "" }),
				timeout: Type.Number({ exclusiveMinimum: 0, default: 10 }),
				command_timeout: Type.Number({ exclusiveMinimum: 0, default: 10 }),
				keepalive_interval: Type.Integer({ minimum: 0, default: 30 }),
				strict_host_key_checking: Type.Union(
					[Type.Literal("yes"), Type.Literal("no"), Type.Literal("accept-new")],
					{ default: "accept-new" },
				),
				reuse_sessions: Type.Boolean({ default: true }),
			},
			{ additionalProperties: false },
		),
		targets: Type.Object(
			{
				individual: Type.Array(TargetEntrySchema, { default: [] }),
				patterns: Type.Array(TargetPatternSchema, { default: [] }),
			},
			{ additionalProperties: false, default: {} },
		),
		display: Type.Object(
			{
				refresh_rate: Type.Number({ exclusiveMinimum: 0, default: 5 }),
				render_interval: Type.Number({ exclusiveMinimum: 0, default: 0.25 }),
			},
			{ additionalProperties: false, default: {} },
		),
		polling: Type.Object(
			{
				max_concurrency: Type.Integer({ minimum: 0, default: 16 }),
			},
			{ additionalProperties: false, default: {} },
		),
		debug: Type.Object(
			{
				enabled: Type.Boolean({ default: false }),
				log_dir: Type.String({ default: "logs" }),
				log_file: Type.String({ minLength: 1, default: "gpu_monitor.log" }),
				log_max_size: Type.Integer({ minimum: 0, default: 1048576 }),
				log_backup_count: Type.Integer({ minimum: 0, default: 3 }),
			},
			{ additionalProperties: false, default: {} },
		),
	},
	{ additionalProperties: false },
);

export type MonitorConfig = Static<typeof ConfigSchema>;
export type TargetEntry = Static<typeof TargetEntrySchema>;
export type TargetPattern = Static<typeof TargetPatternSchema>;

/** 可以通过 --section.field 覆盖的字段 */
export const OVERRIDABLE_FIELDS = [
	"ssh.username",
	"ssh.key_path",
	"ssh.port",
	"ssh.jump_host",
	"ssh.jump_username",
	"ssh.timeout",
	"ssh.command_timeout",
	"ssh.keepalive_interval",
	"ssh.strict_host_key_checking",
	"ssh.reuse_sessions",
	"display.refresh_rate",
	"display.render_interval",
	"polling.max_concurrency",
	"debug.enabled",
	"debug.log_dir",
	"debug.log_file",
	"debug.log_max_size",
	"debug.log_backup_count",
] as const;

export type OverridableField = (typeof OVERRIDABLE_FIELDS)[number];

function isOverridableField(key: string): key is OverridableField {
	return OVERRIDABLE_FIELDS.some((field) => field === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 获取默认配置文件路径
 * 优先使用 GPUMON_CONFIG 环境变量，默认为包目录下的 config/config.yaml
 */
export const getDefaultConfigPath = (): string => {
	return process.env.GPUMON_CONFIG || fileURLToPath(new URL("../config/config.yaml", import.meta.url));
};

/** 配置加载选项 */
export interface LoadConfigOptions {
	/** 字段覆盖，值保持命令行中的字符串形式 */
	overrides?: Record<string, string>;
	/** 替换配置中的目标列表 */
	targets?: string[];
}

/** 递归冻结对象 */
function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}

/**
 * 解析 YAML 文本为原始对象
 * 空文件视为空对象
 */
export function parseConfigText(text: string, source: string): Record<string, unknown> {
	let raw: unknown;
	try {
		raw = parse(text);
	} catch (err) {
		if (err instanceof YAMLParseError) {
			throw new ConfigError(`Invalid YAML in ${source}: ${err.message}`);
		}
		throw err;
	}
	if (raw === null || raw === undefined) return {};
	if (!isRecord(raw)) {
		throw new ConfigError(`Config ${source} must be a mapping at the top level`);
	}
	return raw;
}

/**
 * 把覆盖项写入原始配置对象（写入前对所在的段做浅拷贝）
 */
function applyOverrides(raw: Record<string, unknown>, overrides: Record<string, string>): Record<string, unknown> {
	const result: Record<string, unknown> = { ...raw };
	const unknownKeys = Object.keys(overrides).filter((key) => !isOverridableField(key));
	if (unknownKeys.length > 0) {
		throw new ConfigError(
			"Unknown configuration override",
			unknownKeys.map((key) => ({ path: key, message: `not one of: ${OVERRIDABLE_FIELDS.join(", ")}` })),
		);
	}
	for (const [key, value] of Object.entries(overrides)) {
		const [section, field] = key.split(".");
		const current = result[section];
		result[section] = { ...(isRecord(current) ? current : {}), [field]: value };
	}
	return result;
}

/**
 * 校验并规范化原始配置
 * 依次执行：填充默认值 → 类型转换 → 校验，返回冻结的配置
 * @throws ConfigError 校验失败时，problems 中列出每个字段的问题
 */
export function resolveConfig(raw: Record<string, unknown>, options: LoadConfigOptions = {}): MonitorConfig {
	let value: Record<string, unknown> = applyOverrides(structuredClone(raw), options.overrides ?? {});
	if (options.targets) {
		value = { ...value, targets: { individual: [...options.targets], patterns: [] } };
	}

	const converted: unknown = Value.Convert(ConfigSchema, Value.Default(ConfigSchema, value));
	if (!Value.Check(ConfigSchema, converted)) {
		const problems = [...Value.Errors(ConfigSchema, converted)].map((error) => ({
			path: error.path,
			message: error.message,
		}));
		throw new ConfigError("Invalid configuration", problems);
	}
	if (!converted.ssh.jump_username) {
		converted.ssh.jump_username = converted.ssh.username;
	}
	return deepFreeze(converted);
}

/**
 * 从文件加载配置
 * @throws ConfigError 文件不存在、YAML 无效或校验失败
 */
export function loadConfig(path: string, options: LoadConfigOptions = {}): MonitorConfig {
	if (!existsSync(path)) {
		throw new ConfigError(`Config file not found: ${path}`);
	}
	const raw = parseConfigText(readFileSync(path, "utf-8"), path);
	return resolveConfig(raw, options);
}
