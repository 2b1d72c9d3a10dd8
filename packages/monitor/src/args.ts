/**
 * @file 命令行参数解析
 *
 * 支持的参数：
 * - --config, -c <path>       指定配置文件
 * - --get_config_path         打印默认配置文件路径后退出
 * - --targets <host...>       替换配置中的目标列表
 * - --<section>.<field>[=]<value>  覆盖单个配置字段（如 --ssh.username=alice）
 * - --once                    探测一轮，打印表格后退出
 * - --help, -h / --version, -v
 */

/** 不带值时视为 true 的覆盖字段 */
const BOOLEAN_FIELDS = new Set(["debug.enabled", "ssh.reuse_sessions"]);

export class ArgsError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ArgsError";
	}
}

/** 解析后的命令行参数 */
export interface ParsedArgs {
	help: boolean;
	version: boolean;
	getConfigPath: boolean;
	once: boolean;
	configPath?: string;
	targets?: string[];
	/** 字段覆盖，键为 section.field，值保持字符串形式 */
	overrides: Record<string, string>;
}

/**
 * 解析命令行参数
 * @param argv - 去掉 node 和脚本路径后的参数
 * @throws ArgsError 未知参数或缺少参数值
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = { help: false, version: false, getConfigPath: false, once: false, overrides: {} };
	const isValue = (arg: string | undefined): arg is string => arg !== undefined && !arg.startsWith("-");

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		const eq = arg.indexOf("=");
		const name = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;
		const inline = arg.startsWith("--") && eq !== -1 ? arg.slice(eq + 1) : undefined;

		if (name === "--help" || name === "-h") {
			result.help = true;
		} else if (name === "--version" || name === "-v") {
			result.version = true;
		} else if (name === "--get_config_path") {
			result.getConfigPath = true;
		} else if (name === "--once") {
			result.once = true;
		} else if (name === "--config" || name === "-c") {
			if (inline !== undefined) {
				result.configPath = inline;
			} else if (isValue(argv[i + 1])) {
				result.configPath = argv[++i];
			} else {
				throw new ArgsError(`${name} requires a path`);
			}
		} else if (name === "--targets") {
			const hosts: string[] = [];
			if (inline !== undefined) {
				hosts.push(...inline.split(",").filter((host) => host.length > 0));
			}
			while (isValue(argv[i + 1])) {
				hosts.push(argv[++i]);
			}
			if (hosts.length === 0) {
				throw new ArgsError("--targets requires at least one host");
			}
			result.targets = hosts;
		} else if (/^--[a-z_]+\.[a-z_]+$/.test(name)) {
			const key = name.slice(2);
			if (inline !== undefined) {
				result.overrides[key] = inline;
			} else if (isValue(argv[i + 1])) {
				result.overrides[key] = argv[++i];
			} else if (BOOLEAN_FIELDS.has(key)) {
				result.overrides[key] = "true";
			} else {
				throw new ArgsError(`${name} requires a value`);
			}
		} else {
			throw new ArgsError(`Unknown argument: ${arg}`);
		}
	}

	return result;
}

/** 帮助文本 */
export function helpText(version: string, defaultConfigPath: string): string {
	return `gpumon v${version} - Live GPU availability across a fleet of SSH hosts

Usage:
  gpumon [options]

Options:
  -c, --config <path>        Config file (default: ${defaultConfigPath})
  --get_config_path          Print the default config path and exit
  --targets <host...>        Probe these hosts instead of the configured targets
  --once                     Probe every target once, print the table and exit
  --<section>.<field> <v>    Override a config field, e.g. --ssh.username=alice
                             (ssh.*, display.refresh_rate, display.render_interval,
                              polling.max_concurrency, debug.*)
  -h, --help                 Show this help
  -v, --version              Show version

Keys:
  q, Ctrl+C                  Quit

Environment:
  GPUMON_CONFIG              Default config file path`;
}
