import type { QuadNode } from './QuadNode';
import type { QuadTree } from './QuadTree';
import { formatGeneral } from './utils';

/**
 * 单个叶子的输出记录
 *
 * 字段顺序 index, x, y, width, height, count 是下游像素化程序依赖的格式
 */
export interface LeafRecord {
  /** 序号 */
  index: number;
  /** 中心 x */
  x: number;
  /** 中心 y */
  y: number;
  /** 宽度 */
  width: number;
  /** 高度 */
  height: number;
  /** 点数 */
  count: number;
  /** 是否为溢出叶子 */
  overflow: boolean;
}

/**
 * 报告选项
 */
export interface LeafReporterOptions {
  /** 列宽 (默认: 10) */
  columnWidth?: number;
  /** 实数有效数字，取 1 到 100 (默认: 6) */
  precision?: number;
  /** 在溢出叶子的记录后追加 " *" (默认: false) */
  markOverflow?: boolean;
}

/**
 * 叶子报告器
 *
 * 每个叶子输出一行：序号、中心 x、中心 y、宽、高、点数，右对齐定宽列
 */
export class LeafReporter {
  public readonly columnWidth: number;
  public readonly precision: number;
  public readonly markOverflow: boolean;

  constructor(options: LeafReporterOptions = {}) {
    this.columnWidth = Math.max(1, options.columnWidth ?? 10);
    this.precision = Math.min(100, Math.max(1, options.precision ?? 6));
    this.markOverflow = options.markOverflow ?? false;
  }

  /**
   * 从叶子生成记录
   */
  static toRecord(leaf: QuadNode, index: number): LeafRecord {
    return {
      index,
      x: leaf.x,
      y: leaf.y,
      width: leaf.width,
      height: leaf.height,
      count: leaf.pointCount,
      overflow: leaf.overflow,
    };
  }

  /**
   * 格式化一条记录
   */
  formatRecord(record: LeafRecord): string {
    const columns = [
      String(record.index),
      formatGeneral(record.x, this.precision),
      formatGeneral(record.y, this.precision),
      formatGeneral(record.width, this.precision),
      formatGeneral(record.height, this.precision),
      String(record.count),
    ];
    const line = columns.map((column) => column.padStart(this.columnWidth)).join('');
    return this.markOverflow && record.overflow ? `${line} *` : line;
  }

  /**
   * 格式化一个叶子
   */
  format(leaf: QuadNode, index: number): string {
    return this.formatRecord(LeafReporter.toRecord(leaf, index));
  }

  /**
   * 按遍历顺序输出整棵树
   * @param write - 每行的输出回调（默认收集到数组）
   * @returns 所有行
   */
  report(tree: QuadTree, write?: (line: string) => void): string[] {
    const lines: string[] = [];
    tree.forEachLeaf((leaf, index) => {
      const line = this.format(leaf, index);
      lines.push(line);
      write?.(line);
    });
    return lines;
  }
}
