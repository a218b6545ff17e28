import { Vector2 } from '@galacean/engine-math';
import { allocationFailure, type QuadTreeFailure } from './QuadTreeFailure';
import { POINT_BYTES, defaultAllocator, type StorageAllocator } from './StorageAllocator';

/**
 * 点缓冲区
 *
 * 以 x, y 交错的 Float64Array 存储二维点，容量按 blockSize 分块增长：
 * 当 count 恰为 blockSize 的整数倍时扩容一个块
 */
export class PointBuffer {
  /** 扩容块大小 */
  public readonly blockSize: number;

  private _data: Float64Array = new Float64Array(0);
  private _count: number = 0;
  private _allocator: StorageAllocator;

  /**
   * 创建点缓冲区
   * @param blockSize - 扩容块大小 (默认: 10)
   * @param allocator - 存储分配器
   */
  constructor(blockSize: number = 10, allocator: StorageAllocator = defaultAllocator) {
    this.blockSize = Math.max(1, Math.floor(blockSize));
    this._allocator = allocator;
  }

  /** 点数 */
  get count(): number {
    return this._count;
  }

  /** 容量（点） */
  get capacity(): number {
    return this._data.length / 2;
  }

  /**
   * 追加一个点
   * @returns 追加后的点数；扩容失败时返回 QuadTreeFailure，缓冲区保持不变
   */
  push(x: number, y: number): number | QuadTreeFailure {
    if (this._count % this.blockSize === 0) {
      const failure = this.grow(this._count + this.blockSize);
      if (failure) return failure;
    }

    this._data[2 * this._count] = x;
    this._data[2 * this._count + 1] = y;
    return ++this._count;
  }

  /**
   * 获取第 index 个点
   */
  getPoint(index: number, out: Vector2 = new Vector2()): Vector2 {
    if (index < 0 || index >= this._count) {
      throw new RangeError(`PointBuffer: 索引 ${index} 超出范围 [0, ${this._count})`);
    }
    return out.set(this._data[2 * index], this._data[2 * index + 1]);
  }

  /**
   * 按插入顺序遍历所有点
   */
  forEach(callback: (x: number, y: number, index: number) => void): void {
    for (let i = 0; i < this._count; i++) {
      callback(this._data[2 * i], this._data[2 * i + 1], i);
    }
  }

  /**
   * 释放存储，点数归零
   */
  release(): void {
    if (this._data.length > 0) {
      this._allocator.release('points', this._data.length * 8);
    }
    this._data = new Float64Array(0);
    this._count = 0;
  }

  private grow(capacity: number): QuadTreeFailure | null {
    const bytes = capacity * POINT_BYTES;
    if (!this._allocator.allocate('points', bytes)) {
      return allocationFailure('points', bytes, `无法将点缓冲区扩容到 ${capacity} 个点`);
    }

    let data: Float64Array;
    try {
      data = new Float64Array(capacity * 2);
    } catch (error) {
      this._allocator.release('points', bytes);
      if (error instanceof RangeError) {
        return allocationFailure('points', bytes, error.message);
      }
      throw error;
    }

    data.set(this._data);
    if (this._data.length > 0) {
      this._allocator.release('points', this._data.length * 8);
    }
    this._data = data;
    return null;
  }
}
