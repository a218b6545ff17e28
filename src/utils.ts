/** toExponential 能给出的最多小数位 */
const MAX_DIGITS = 100;

/**
 * 按 C 语言 %g 的规则格式化实数
 *
 * 保留 precision 位有效数字，指数小于 -4 或不小于 precision 时使用科学计数法，
 * 去掉末尾的 0。恰好落在两个候选值中间时舍入到偶数位
 */
export function formatGeneral(value: number, precision: number = 6): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';

  const p = Math.min(MAX_DIGITS, Math.max(1, Math.floor(precision)));
  const { digits, exponent } = roundSignificant(Math.abs(value), p);
  const sign = value < 0 ? '-' : '';

  if (exponent < -4 || exponent >= p) {
    const exponentSign = exponent < 0 ? '-' : '+';
    const exponentDigits = String(Math.abs(exponent)).padStart(2, '0');
    const mantissa = p > 1 ? stripTrailingZeros(`${digits.slice(0, 1)}.${digits.slice(1)}`) : digits;
    return `${sign}${mantissa}e${exponentSign}${exponentDigits}`;
  }

  if (exponent === p - 1) return sign + digits;
  const fixed =
    exponent >= 0
      ? `${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`
      : `0.${'0'.repeat(-exponent - 1)}${digits}`;
  return sign + stripTrailingZeros(fixed);
}

/**
 * 把正数舍入为 precision 位有效数字
 * @returns 有效数字串与十进制指数
 */
function roundSignificant(value: number, precision: number): { digits: string; exponent: number } {
  const [mantissa, exponentText] = value.toExponential(MAX_DIGITS).split('e');
  const all = mantissa.replace('.', '');
  let exponent = Number(exponentText);
  let digits = all.slice(0, precision);
  const rest = all.slice(precision);

  const half = rest.slice(0, 1);
  const beyondHalf = /[1-9]/.test(rest.slice(1));
  const odd = Number(digits.slice(-1)) % 2 === 1;
  if (half > '5' || (half === '5' && (beyondHalf || odd))) {
    digits = incrementDigits(digits);
    if (digits.length > precision) {
      digits = digits.slice(0, precision);
      exponent++;
    }
  }

  return { digits, exponent };
}

function incrementDigits(digits: string): string {
  const chars = digits.split('');
  let i = chars.length - 1;
  while (i >= 0 && chars[i] === '9') {
    chars[i] = '0';
    i--;
  }
  if (i < 0) return `1${chars.join('')}`;
  chars[i] = String(Number(chars[i]) + 1);
  return chars.join('');
}

function stripTrailingZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/\.?0+$/, '');
}

/**
 * 性能计时器辅助类
 */
export class PerformanceTimer {
  private startTime: number = 0;
  private totalTime: number = 0;

  start(): void {
    this.startTime = performance.now();
  }

  stop(): number {
    const elapsed = performance.now() - this.startTime;
    this.totalTime += elapsed;
    return elapsed;
  }

  reset(): void {
    this.totalTime = 0;
    this.startTime = 0;
  }

  getTotal(): number {
    return this.totalTime;
  }
}
