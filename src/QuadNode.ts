import { Rect, Vector2 } from '@galacean/engine-math';
import { Quadrant, QuadNodeKind } from './enums';
import { PointBuffer } from './PointBuffer';
import { allocationFailure, type QuadTreeFailure } from './QuadTreeFailure';
import { NODE_BYTES, defaultAllocator, type StorageAllocator } from './StorageAllocator';
import type { LeafVisitor } from './types';

/** 4 个子节点，按象限索引排列 */
export type QuadChildren = [QuadNode, QuadNode, QuadNode, QuadNode];

/**
 * 节点创建选项
 */
export interface QuadNodeOptions {
  /** 节点深度 (默认: 0) */
  depth?: number;
  /** 点缓冲区扩容块大小 (默认: 10) */
  blockSize?: number;
  /** 存储分配器 */
  allocator?: StorageAllocator;
}

/**
 * 四叉树节点
 *
 * 描述一个矩形区域：叶子节点持有点缓冲区，内部节点持有 4 个子节点
 */
export class QuadNode {
  /** 中心点 */
  public readonly center: Vector2;
  /** 宽高 */
  public readonly size: Vector2;
  /** 节点深度 */
  public readonly depth: number;
  /** 节点类型 */
  public kind: QuadNodeKind = QuadNodeKind.Leaf;
  /** 子节点（仅内部节点） */
  public children: QuadChildren | null = null;
  /** 是否为溢出叶子 */
  public overflow: boolean = false;

  private _points: PointBuffer | null;
  private _allocator: StorageAllocator;

  constructor(x: number, y: number, w: number, h: number, options: QuadNodeOptions = {}) {
    this.center = new Vector2(x, y);
    this.size = new Vector2(w, h);
    this.depth = options.depth ?? 0;
    this._allocator = options.allocator ?? defaultAllocator;
    this._points = new PointBuffer(options.blockSize, this._allocator);
  }

  /**
   * 创建空叶子节点
   */
  static create(x: number, y: number, w: number, h: number, options?: QuadNodeOptions): QuadNode {
    return new QuadNode(x, y, w, h, options);
  }

  get x(): number {
    return this.center.x;
  }

  get y(): number {
    return this.center.y;
  }

  get width(): number {
    return this.size.x;
  }

  get height(): number {
    return this.size.y;
  }

  get isLeaf(): boolean {
    return this.kind === QuadNodeKind.Leaf;
  }

  /** 点数（内部节点为 0） */
  get pointCount(): number {
    return this._points ? this._points.count : 0;
  }

  /** 点缓冲区（仅叶子节点） */
  get points(): PointBuffer | null {
    return this._points;
  }

  /** 点缓冲区扩容块大小 */
  get blockSize(): number {
    return this._points ? this._points.blockSize : 0;
  }

  /**
   * 插入一个点
   * @returns 插入后的点数，失败时返回 QuadTreeFailure
   */
  insert(point: Vector2): number | QuadTreeFailure {
    return this.insertXY(point.x, point.y);
  }

  /**
   * 按坐标插入一个点
   */
  insertXY(x: number, y: number): number | QuadTreeFailure {
    if (this.kind === QuadNodeKind.Released) {
      return { reason: 'RELEASED', details: `${this} 已释放` };
    }
    if (this._points === null) {
      return { reason: 'NOT_A_LEAF', details: `${this} 不是叶子节点` };
    }
    return this._points.push(x, y);
  }

  /**
   * 计算点所在的象限，每个轴上严格大于中心才算正侧
   */
  getQuadrant(x: number, y: number): Quadrant {
    return 2 * Number(y > this.center.y) + Number(x > this.center.x);
  }

  /**
   * 创建 4 个空叶子子节点，不修改当前节点
   *
   * 子节点宽高减半，中心偏移 ±1/4 宽高，顺序为 (−,−), (+,−), (−,+), (+,+)
   */
  createChildren(): QuadChildren | QuadTreeFailure {
    const bytes = 4 * NODE_BYTES;
    if (!this._allocator.allocate('children', bytes)) {
      return allocationFailure('children', bytes, `无法为 ${this} 分配子节点`);
    }

    const options: QuadNodeOptions = {
      depth: this.depth + 1,
      blockSize: this.blockSize,
      allocator: this._allocator,
    };
    const w = 0.5 * this.size.x;
    const h = 0.5 * this.size.y;
    const child = (i: number, j: number): QuadNode =>
      new QuadNode(
        this.center.x + (2 * i - 1) * 0.25 * this.size.x,
        this.center.y + (2 * j - 1) * 0.25 * this.size.y,
        w,
        h,
        options,
      );

    return [child(0, 0), child(1, 0), child(0, 1), child(1, 1)];
  }

  /**
   * 丢弃 createChildren 创建但未挂接的子节点
   */
  discardChildren(children: QuadChildren): void {
    for (const child of children) child.release();
    this._allocator.release('children', 4 * NODE_BYTES);
  }

  /**
   * 转换为内部节点，释放点缓冲区
   */
  resetAsInternal(children: QuadChildren): void {
    this._points?.release();
    this._points = null;
    this.children = children;
    this.kind = QuadNodeKind.Internal;
    this.overflow = false;
  }

  /**
   * 深度优先遍历叶子节点，子节点按 0..3 顺序访问
   * @param visit - 叶子回调
   * @param startIndex - 第一个叶子的序号 (默认: 0)
   * @returns 下一个未使用的序号
   */
  traverseLeaves(visit: LeafVisitor, startIndex: number = 0): number {
    let index = startIndex;
    const stack: QuadNode[] = [this];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      if (node.kind === QuadNodeKind.Leaf) {
        visit(node, index++);
      } else if (node.children) {
        for (let k = 3; k >= 0; k--) stack.push(node.children[k]);
      }
    }

    return index;
  }

  /**
   * 递归释放子节点数组与点缓冲区
   *
   * 节点本身由构造者持有，释放后类型变为 Released
   */
  release(): void {
    if (this.children) {
      for (const child of this.children) child.release();
      this.children = null;
      this._allocator.release('children', 4 * NODE_BYTES);
    }
    this._points?.release();
    this._points = null;
    this.kind = QuadNodeKind.Released;
  }

  /**
   * 获取覆盖区域，x, y 为最小角点
   */
  getBounds(): Rect {
    return new Rect(
      this.center.x - 0.5 * this.size.x,
      this.center.y - 0.5 * this.size.y,
      this.size.x,
      this.size.y,
    );
  }

  /**
   * 转换为字符串表示
   */
  toString(): string {
    return `QuadNode(center=(${this.center.x}, ${this.center.y}), size=(${this.size.x}, ${this.size.y}), depth=${this.depth}, kind=${QuadNodeKind[this.kind]})`;
  }
}
