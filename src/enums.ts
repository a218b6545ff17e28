/**
 * 四叉树节点类型
 *
 * Leaf: 叶子节点，持有点缓冲区
 * Internal: 内部节点，持有 4 个子节点
 * Released: 已释放，不再持有任何存储
 */
export enum QuadNodeKind {
  /** 叶子节点 */
  Leaf = 0,
  /** 内部节点 */
  Internal = 1,
  /** 已释放 */
  Released = 2,
}

/**
 * 象限索引，符号相对于父节点中心
 */
export enum Quadrant {
  /** (−, −) */
  LowerLeft = 0,
  /** (+, −) */
  LowerRight = 1,
  /** (−, +) */
  UpperLeft = 2,
  /** (+, +) */
  UpperRight = 3,
}
