/**
 * lens-quadtree - 引力透镜源平面自适应四叉树
 *
 * 把像平面像素网格经闭式透镜模型映射到源平面，
 * 再用四叉树细分源平面，使每个输出单元的点数不超过阈值
 */

// 核心类
export { QuadNode } from './QuadNode';
export type { QuadChildren, QuadNodeOptions } from './QuadNode';
export { QuadTree } from './QuadTree';
export type { QuadTreeOptions } from './QuadTree';
export { QuadRefiner } from './QuadRefiner';
export type { RefineOptions } from './QuadRefiner';
export { PointBuffer } from './PointBuffer';

// 存储记账
export {
  HeapAllocator,
  NODE_BYTES,
  POINT_BYTES,
  TrackingAllocator,
  defaultAllocator,
} from './StorageAllocator';
export type { StorageAllocator } from './StorageAllocator';

// 失败
export { allocationFailure, isQuadTreeFailure } from './QuadTreeFailure';
export type { QuadTreeFailure, QuadTreeFailureReason, StorageTarget } from './QuadTreeFailure';

// 透镜、采样与报告
export { SIELens } from './SIELens';
export { GridSampler } from './GridSampler';
export type { DeflectionModel, SampleSummary } from './GridSampler';
export { LeafReporter } from './LeafReporter';
export type { LeafRecord, LeafReporterOptions } from './LeafReporter';

// 配置与构建
export {
  DEFAULT_SOURCE_GRID_CONFIG,
  parseSourceGridConfig,
  resolveSourceGridConfig,
  validateSourceGridConfig,
} from './config';
export type { SourceGridConfig, SourceGridConfigInput } from './config';
export { SourceGridBuilder } from './SourceGridBuilder';
export type { SourceGrid, SourceGridFailure } from './SourceGridBuilder';

// 枚举
export { QuadNodeKind, Quadrant } from './enums';

// 类型
export type { LeafVisitor, LensParameters, QuadTreeStats, RefineSummary } from './types';

// 工具函数
export { PerformanceTimer, formatGeneral } from './utils';

/**
 * 当前版本号 - 与 package.json 保持一致
 */
export const VERSION = '0.1.0';
