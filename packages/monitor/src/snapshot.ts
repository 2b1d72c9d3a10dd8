/**
 * @file 集群快照
 *
 * 每个目标一个条目，创建时全部为 pending，之后只由调度器的完成路径写入。
 * 条目数量固定为目标数量，不会增长。
 */
import type { FleetEntry, ProbeResult, Target } from "./types.js";

export class FleetSnapshot {
	private entries = new Map<string, FleetEntry>();

	constructor(targets: readonly Target[]) {
		for (const target of targets) {
			this.entries.set(target.id, Object.freeze({ target }));
		}
	}

	get size(): number {
		return this.entries.size;
	}

	get(targetId: string): FleetEntry | undefined {
		return this.entries.get(targetId);
	}

	/** 按目标顺序返回全部条目 */
	values(): FleetEntry[] {
		return [...this.entries.values()];
	}

	/**
	 * 写入一个目标的最新结果（后写者胜）
	 * @throws Error 目标不在快照中
	 */
	set(targetId: string, result: ProbeResult, updatedAt = Date.now()): FleetEntry {
		const current = this.entries.get(targetId);
		if (!current) {
			throw new Error(`Unknown target: ${targetId}`);
		}
		const entry = Object.freeze({ target: current.target, result, updatedAt });
		this.entries.set(targetId, entry);
		return entry;
	}

	/** 各状态计数：成功 / 失败 / 尚未完成首次探测 */
	counts(): { ok: number; failed: number; pending: number } {
		let ok = 0;
		let failed = 0;
		let pending = 0;
		for (const { result } of this.entries.values()) {
			if (!result) pending++;
			else if (result.status === "success") ok++;
			else failed++;
		}
		return { ok, failed, pending };
	}
}
