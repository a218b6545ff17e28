import type { StorageTarget } from './QuadTreeFailure';

/**
 * 存储分配器接口
 *
 * 点缓冲区与子节点数组在分配、释放时通过分配器记账，
 * allocate 返回 false 表示拒绝本次分配
 */
export interface StorageAllocator {
  allocate(target: StorageTarget, bytes: number): boolean;
  release(target: StorageTarget, bytes: number): void;
}

/** 每个点占用的字节数 (x, y 两个 float64) */
export const POINT_BYTES = 16;

/** 每个节点的估算字节数 */
export const NODE_BYTES = 64;

/**
 * 默认分配器，不做任何限制
 */
export class HeapAllocator implements StorageAllocator {
  allocate(): boolean {
    return true;
  }

  release(): void {}
}

/** 共享的默认分配器 */
export const defaultAllocator: StorageAllocator = new HeapAllocator();

/**
 * 带记账的分配器
 *
 * 统计当前存活字节数与峰值，可设置字节上限以模拟分配失败
 */
export class TrackingAllocator implements StorageAllocator {
  /** 字节上限，0 表示不限制 */
  public limit: number;

  private _live: Record<StorageTarget, number> = { points: 0, children: 0 };
  private _peak: number = 0;
  private _allocations: number = 0;
  private _releases: number = 0;

  /**
   * @param limit - 字节上限 (默认: 0，不限制)
   */
  constructor(limit: number = 0) {
    this.limit = Math.max(0, limit);
  }

  /** 当前存活字节数 */
  get liveBytes(): number {
    return this._live.points + this._live.children;
  }

  /** 峰值字节数 */
  get peakBytes(): number {
    return this._peak;
  }

  /** 分配次数 */
  get allocations(): number {
    return this._allocations;
  }

  /** 释放次数 */
  get releases(): number {
    return this._releases;
  }

  /**
   * 指定类型的存活字节数
   */
  liveBytesOf(target: StorageTarget): number {
    return this._live[target];
  }

  allocate(target: StorageTarget, bytes: number): boolean {
    if (this.limit > 0 && this.liveBytes + bytes > this.limit) {
      return false;
    }
    this._live[target] += bytes;
    this._allocations++;
    this._peak = Math.max(this._peak, this.liveBytes);
    return true;
  }

  release(target: StorageTarget, bytes: number): void {
    if (bytes > this._live[target]) {
      console.warn(`TrackingAllocator: 释放 ${bytes} 字节超过存活的 ${this._live[target]} 字节 (${target})`);
      this._live[target] = 0;
    } else {
      this._live[target] -= bytes;
    }
    this._releases++;
  }

  /**
   * 重置统计
   */
  reset(): void {
    this._live = { points: 0, children: 0 };
    this._peak = 0;
    this._allocations = 0;
    this._releases = 0;
  }
}
