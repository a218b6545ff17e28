#!/usr/bin/env tsx
/**
 * 源平面网格命令行程序
 *
 * 构建透镜源平面四叉树，按叶子输出：序号、中心 x、中心 y、宽、高、点数
 */

import { readFileSync } from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  LeafReporter,
  PerformanceTimer,
  SourceGridBuilder,
  isQuadTreeFailure,
  parseSourceGridConfig,
  type LensParameters,
  type SourceGridConfigInput,
} from '../../src';

// ============ 参数 ============

const argv = yargs(hideBin(process.argv))
  .scriptName('source-grid')
  .usage('构建透镜源平面四叉树并输出叶子单元')
  .option('config', { alias: 'c', type: 'string', describe: 'JSON 配置文件' })
  .option('width', { type: 'number', describe: '根网格宽度 (默认: 20)' })
  .option('height', { type: 'number', describe: '根网格高度 (默认: 20)' })
  .option('supersampling', { alias: 'n', type: 'number', describe: '超采样数 N (默认: 10)' })
  .option('threshold', { alias: 't', type: 'number', describe: '阈值倍数 (默认: 1.0)' })
  .option('max-depth', { type: 'number', describe: '最大深度 (默认: 32)' })
  .option('min-cell-size', { type: 'number', describe: '最小单元尺寸 (默认: 0)' })
  .option('memory-limit', { type: 'number', describe: '存储字节上限 (默认: 0，不限制)' })
  .option('lens-x', { type: 'number', describe: '透镜中心 x' })
  .option('lens-y', { type: 'number', describe: '透镜中心 y' })
  .option('lens-b', { type: 'number', describe: '透镜尺度半径' })
  .option('lens-q', { type: 'number', describe: '透镜轴比' })
  .option('lens-pa', { type: 'number', describe: '透镜位置角（度）' })
  .option('mark-overflow', { type: 'boolean', default: false, describe: '标记溢出叶子' })
  .option('partial', { type: 'boolean', default: false, describe: '分配失败时仍输出部分结果' })
  .option('stats', { type: 'boolean', default: false, describe: '输出统计信息到 stderr' })
  .example('$0 --width 40 --height 40', '40 × 40 网格')
  .example('$0 -c grid.json --stats', '从配置文件读取并输出统计')
  .strict()
  .help()
  .parseSync();

function loadConfigFile(path: string): SourceGridConfigInput {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    console.error(`无法读取配置文件 ${path}:`, error);
    process.exit(1);
  }

  const { config, errors } = parseSourceGridConfig(data);
  if (errors.length > 0) {
    for (const message of errors) console.error(`${path}: ${message}`);
    process.exit(1);
  }
  return config;
}

const fileConfig: SourceGridConfigInput = argv.config ? loadConfigFile(argv.config) : {};

// 命令行参数覆盖配置文件
const lens: Partial<LensParameters> = { ...fileConfig.lens };
const input: SourceGridConfigInput = { ...fileConfig, lens };
if (argv.width !== undefined) input.width = argv.width;
if (argv.height !== undefined) input.height = argv.height;
if (argv.supersampling !== undefined) input.supersampling = argv.supersampling;
if (argv.threshold !== undefined) input.thresholdMultiplier = argv.threshold;
if (argv['max-depth'] !== undefined) input.maxDepth = argv['max-depth'];
if (argv['min-cell-size'] !== undefined) input.minCellSize = argv['min-cell-size'];
if (argv['memory-limit'] !== undefined) input.memoryLimit = argv['memory-limit'];
if (argv['lens-x'] !== undefined) lens.x = argv['lens-x'];
if (argv['lens-y'] !== undefined) lens.y = argv['lens-y'];
if (argv['lens-b'] !== undefined) lens.b = argv['lens-b'];
if (argv['lens-q'] !== undefined) lens.q = argv['lens-q'];
if (argv['lens-pa'] !== undefined) lens.pa = argv['lens-pa'];

// ============ 构建 ============

const timer = new PerformanceTimer();
timer.start();
const grid = SourceGridBuilder.build(input);
const buildTime = timer.stop();

const reporter = new LeafReporter({ markOverflow: argv['mark-overflow'] });

if (isQuadTreeFailure(grid)) {
  console.error(`source-grid: 构建失败 (${grid.reason}) ${grid.details ?? ''}`);
  if (grid.tree && argv.partial) {
    reporter.report(grid.tree, (line) => console.log(line));
  }
  grid.tree?.release();
  process.exit(1);
}

timer.start();
const leafCount = reporter.report(grid.tree, (line) => console.log(line)).length;
const reportTime = timer.stop();

if (argv.stats) {
  const stats = grid.tree.getStats();
  console.error(`采样: ${grid.sample.sampled}, 丢弃: ${grid.sample.discarded}, 插入: ${grid.sample.inserted}`);
  console.error(
    `叶子: ${leafCount}, 节点: ${stats.nodeCount}, 最大深度: ${stats.maxDepth}, 溢出叶子: ${stats.overflowLeafCount}`,
  );
  console.error(`峰值存储: ${grid.allocator.peakBytes} 字节`);
  console.error(`构建: ${buildTime.toFixed(2)} ms, 输出: ${reportTime.toFixed(2)} ms`);
}

grid.tree.release();
if (grid.allocator.liveBytes !== 0) {
  console.warn(`source-grid: 释放后仍有 ${grid.allocator.liveBytes} 字节未释放`);
}
