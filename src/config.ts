import type { LensParameters } from './types';

/**
 * 源平面网格运行配置
 */
export interface SourceGridConfig {
  /** 根网格宽度（单元数） */
  width: number;
  /** 根网格高度（单元数） */
  height: number;
  /** 每个单元每个轴的超采样数 N */
  supersampling: number;
  /** 阈值倍数，阈值 = 倍数 × N² */
  thresholdMultiplier: number;
  /** 最大深度 */
  maxDepth: number;
  /** 最小单元尺寸，0 表示不限制 */
  minCellSize: number;
  /** 存储字节上限，0 表示不限制 */
  memoryLimit: number;
  /** 透镜参数 */
  lens: LensParameters;
}

/**
 * 部分配置，用于覆盖默认值
 */
export type SourceGridConfigInput = Partial<Omit<SourceGridConfig, 'lens'>> & {
  lens?: Partial<LensParameters>;
};

/**
 * 默认配置
 */
export const DEFAULT_SOURCE_GRID_CONFIG: Readonly<SourceGridConfig> = Object.freeze({
  width: 20,
  height: 20,
  supersampling: 10,
  thresholdMultiplier: 1.0,
  maxDepth: 32,
  minCellSize: 0,
  memoryLimit: 0,
  lens: Object.freeze({ x: 11.23, y: 9.87, b: 6.34, q: 0.78, pa: 34.56 }),
});

const NUMBER_KEYS = [
  'width',
  'height',
  'supersampling',
  'thresholdMultiplier',
  'maxDepth',
  'minCellSize',
  'memoryLimit',
] as const;

const LENS_KEYS = ['x', 'y', 'b', 'q', 'pa'] as const;

/**
 * 用默认值补全配置
 */
export function resolveSourceGridConfig(input: SourceGridConfigInput = {}): SourceGridConfig {
  const { lens, ...rest } = input;
  return {
    ...DEFAULT_SOURCE_GRID_CONFIG,
    ...rest,
    lens: { ...DEFAULT_SOURCE_GRID_CONFIG.lens, ...lens },
  };
}

/**
 * 验证配置
 * @returns 验证结果，包含是否有效和错误信息
 */
export function validateSourceGridConfig(config: SourceGridConfig): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  for (const key of NUMBER_KEYS) {
    if (!Number.isFinite(config[key])) errors.push(`${key} 必须是有限数值`);
  }
  for (const key of LENS_KEYS) {
    if (!Number.isFinite(config.lens[key])) errors.push(`lens.${key} 必须是有限数值`);
  }
  if (errors.length > 0) return { valid: false, errors };

  for (const key of ['width', 'height', 'supersampling'] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      errors.push(`${key} 必须是正整数，实际 ${config[key]}`);
    }
  }
  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
    errors.push(`maxDepth 必须是非负整数，实际 ${config.maxDepth}`);
  }
  if (config.thresholdMultiplier <= 0) {
    errors.push(`thresholdMultiplier 必须大于 0，实际 ${config.thresholdMultiplier}`);
  }
  if (config.minCellSize < 0) {
    errors.push(`minCellSize 不能为负，实际 ${config.minCellSize}`);
  }
  if (config.memoryLimit < 0) {
    errors.push(`memoryLimit 不能为负，实际 ${config.memoryLimit}`);
  }
  if (config.lens.b < 0) {
    errors.push(`lens.b 不能为负，实际 ${config.lens.b}`);
  }
  if (config.lens.q <= 0 || config.lens.q > 1) {
    errors.push(`lens.q 必须在 (0, 1] 内，实际 ${config.lens.q}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * 从 JSON 数据解析配置，未知字段与类型错误写入 errors
 */
export function parseSourceGridConfig(data: unknown): {
  config: SourceGridConfigInput;
  errors: string[];
} {
  const config: SourceGridConfigInput = {};
  const errors: string[] = [];

  if (!isRecord(data)) {
    return { config, errors: ['配置必须是 JSON 对象'] };
  }

  for (const [key, value] of Object.entries(data)) {
    if (key === 'lens') {
      if (!isRecord(value)) {
        errors.push('lens 必须是对象');
        continue;
      }
      const lens: Partial<LensParameters> = {};
      for (const [lensKey, lensValue] of Object.entries(value)) {
        const known = LENS_KEYS.find((k) => k === lensKey);
        if (!known) {
          errors.push(`未知字段 lens.${lensKey}`);
        } else if (typeof lensValue !== 'number') {
          errors.push(`lens.${lensKey} 必须是数值`);
        } else {
          lens[known] = lensValue;
        }
      }
      config.lens = lens;
      continue;
    }

    const known = NUMBER_KEYS.find((k) => k === key);
    if (!known) {
      errors.push(`未知字段 ${key}`);
    } else if (typeof value !== 'number') {
      errors.push(`${key} 必须是数值`);
    } else {
      config[known] = value;
    }
  }

  return { config, errors };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
