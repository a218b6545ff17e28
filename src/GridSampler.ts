import { Vector2 } from '@galacean/engine-math';
import type { QuadTree } from './QuadTree';
import { isQuadTreeFailure, type QuadTreeFailure } from './QuadTreeFailure';

/**
 * 偏折模型接口
 */
export interface DeflectionModel {
  deflect(point: Vector2, out?: Vector2): Vector2;
}

/**
 * 采样统计
 */
export interface SampleSummary {
  /** 采样点总数 */
  sampled: number;
  /** 落在定义域外被丢弃的点数 */
  discarded: number;
  /** 插入到根节点的点数 */
  inserted: number;
}

/**
 * 像平面网格采样器
 *
 * 对每个像素做 N × N 超采样，经偏折模型映射到源平面后插入对应的根节点
 */
export class GridSampler {
  /**
   * 采样整个网格
   * @param tree - 目标四叉树，决定网格尺寸与超采样数
   * @param model - 偏折模型
   * @returns 采样统计，插入失败时返回 QuadTreeFailure
   */
  static sample(tree: QuadTree, model: DeflectionModel): SampleSummary | QuadTreeFailure {
    const summary: SampleSummary = { sampled: 0, discarded: 0, inserted: 0 };
    const n = tree.supersampling;
    const image = new Vector2();
    const source = new Vector2();

    for (let cell = 0; cell < tree.width * tree.height; cell++) {
      for (let k = 0; k < n * n; k++) {
        model.deflect(this.samplePoint(tree, cell, k, image), source);
        summary.sampled++;

        const index = tree.rootIndexAt(source.x, source.y);
        if (index === null) {
          summary.discarded++;
          continue;
        }

        const result = tree.insert(index[0], index[1], source);
        if (isQuadTreeFailure(result)) return result;
        summary.inserted++;
      }
    }

    return summary;
  }

  /**
   * 计算像素 cell 第 k 个采样点的像平面坐标
   */
  static samplePoint(tree: QuadTree, cell: number, k: number, out: Vector2 = new Vector2()): Vector2 {
    const n = tree.supersampling;
    return out.set(
      (cell % tree.width) + 0.5 + ((k % n) + 0.5) / n,
      Math.floor(cell / tree.width) + 0.5 + (Math.floor(k / n) + 0.5) / n,
    );
  }
}
