/**
 * @file 并发槽位池
 *
 * 限制同时进行的探测数量。等待者按 FIFO 顺序获得槽位，
 * 因此一轮探测按目标列表顺序启动。limit 为 0 表示不限制。
 */
import { ProbeCancelledError } from "./errors.js";

/** 释放槽位的函数，重复调用无效 */
export type Release = () => void;

type Waiter = (release: Release) => void;

export class SlotPool {
	private readonly limit: number;
	private active = 0;
	private waiters: Waiter[] = [];

	constructor(limit: number) {
		this.limit = limit;
	}

	/** 当前占用的槽位数 */
	get inUse(): number {
		return this.active;
	}

	/** 正在排队的等待者数量 */
	get pending(): number {
		return this.waiters.length;
	}

	private createRelease(): Release {
		let released = false;
		return () => {
			if (released) return;
			released = true;
			const next = this.waiters.shift();
			if (next) {
				// 槽位直接转交给下一个等待者，active 不变
				next(this.createRelease());
			} else {
				this.active--;
			}
		};
	}

	/**
	 * 获取一个槽位
	 * @param signal - 取消后从队列移除并以 ProbeCancelledError 拒绝
	 * @param owner - 用于错误信息的标识
	 */
	acquire(signal?: AbortSignal, owner = "slot"): Promise<Release> {
		if (signal?.aborted) {
			return Promise.reject(new ProbeCancelledError(owner));
		}
		if (this.limit === 0 || this.active < this.limit) {
			this.active++;
			return Promise.resolve(this.createRelease());
		}

		return new Promise<Release>((resolve, reject) => {
			const onAbort = () => {
				const index = this.waiters.indexOf(waiter);
				if (index !== -1) this.waiters.splice(index, 1);
				reject(new ProbeCancelledError(owner));
			};
			const waiter: Waiter = (release) => {
				signal?.removeEventListener("abort", onAbort);
				resolve(release);
			};
			this.waiters.push(waiter);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}
