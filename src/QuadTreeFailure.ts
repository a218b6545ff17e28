/**
 * 四叉树操作失败原因
 *
 * ALLOCATION_FAILURE: 点缓冲区或子节点数组无法分配
 * NOT_A_LEAF: 向内部节点插入点
 * RELEASED: 节点已释放
 * INVALID_CONFIG: 运行配置无效
 */
export type QuadTreeFailureReason =
  | 'ALLOCATION_FAILURE'
  | 'NOT_A_LEAF'
  | 'RELEASED'
  | 'INVALID_CONFIG';

/**
 * 失败的存储类型
 */
export type StorageTarget = 'points' | 'children';

/**
 * 失败信息
 */
export interface QuadTreeFailure {
  readonly reason: QuadTreeFailureReason;
  /** 分配失败时的存储类型 */
  readonly target?: StorageTarget;
  /** 分配失败时请求的字节数 */
  readonly requestedBytes?: number;
  readonly details?: string;
}

/**
 * 判断结果是否为 QuadTreeFailure
 */
export function isQuadTreeFailure(value: unknown): value is QuadTreeFailure {
  return typeof value === 'object' && value !== null && 'reason' in value;
}

/**
 * 创建分配失败
 */
export function allocationFailure(
  target: StorageTarget,
  requestedBytes: number,
  details?: string,
): QuadTreeFailure {
  return { reason: 'ALLOCATION_FAILURE', target, requestedBytes, details };
}
