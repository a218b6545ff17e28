import { MathUtil, Vector2 } from '@galacean/engine-math';
import type { LensParameters } from './types';

/**
 * 奇异等温椭球 (SIE) 透镜
 *
 * 把像平面坐标映射到源平面坐标，无状态、无失败；
 * 在透镜中心处结果为非有限值，由采样器丢弃
 */
export class SIELens {
  /** 透镜参数 */
  public readonly params: Readonly<LensParameters>;

  private readonly _cos: number;
  private readonly _sin: number;
  /** √(1 − q²) */
  private readonly _e: number;
  /** b√q / √(1 − q²) */
  private readonly _scale: number;

  /**
   * 创建透镜
   * @param params - 中心 (x, y)、尺度半径 b、轴比 q ∈ (0, 1]、位置角 pa（度）
   */
  constructor(params: LensParameters) {
    this.params = { ...params };
    const angle = MathUtil.degreeToRadian(params.pa);
    this._cos = Math.cos(angle);
    this._sin = Math.sin(angle);
    this._e = Math.sqrt(1 - params.q * params.q);
    this._scale = this._e > 0 ? (params.b * Math.sqrt(params.q)) / this._e : params.b;
  }

  /**
   * 计算偏折后的源平面坐标
   * @param point - 像平面坐标
   * @param out - 输出（默认新建）
   */
  deflect(point: Vector2, out: Vector2 = new Vector2()): Vector2 {
    const { x: x0, y: y0 } = this.params;
    const c = this._cos;
    const s = this._sin;

    // 旋转到透镜坐标系
    const dx = point.x - x0;
    const dy = point.y - y0;
    const x = dx * c - dy * s;
    const y = dx * s + dy * c;

    let ax: number;
    let ay: number;
    if (this._e > 0) {
      const q = this.params.q;
      const r = Math.sqrt(q * q * x * x + y * y);
      ax = this._scale * Math.atan((x * this._e) / r);
      ay = this._scale * Math.atanh((y * this._e) / r);
    } else {
      // q = 1 时退化为奇异等温球
      const r = Math.sqrt(x * x + y * y);
      ax = (this._scale * x) / r;
      ay = (this._scale * y) / r;
    }

    return out.set(point.x - (ax * c + ay * s), point.y - (ay * c - ax * s));
  }
}
