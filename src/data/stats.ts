/**
 * Numeric helpers shared by Table aggregations, the dataset summary and the
 * sandbox `stats` namespace. Missing and non-numeric entries are skipped;
 * an empty input yields NaN (0 for `sum`).
 */

/** Keep only finite numbers. */
export function numeric(values: readonly unknown[]): number[] {
    const out: number[] = [];
    for (const value of values) {
        if (typeof value === 'number' && Number.isFinite(value)) out.push(value);
    }
    return out;
}

export function count(values: readonly unknown[]): number {
    return numeric(values).length;
}

export function sum(values: readonly unknown[]): number {
    return numeric(values).reduce((acc, v) => acc + v, 0);
}

export function mean(values: readonly unknown[]): number {
    const nums = numeric(values);
    if (nums.length === 0) return NaN;
    return nums.reduce((acc, v) => acc + v, 0) / nums.length;
}

/** Quantile with linear interpolation between closest ranks. */
export function quantile(values: readonly unknown[], q: number): number {
    if (!(q >= 0 && q <= 1)) {
        throw new RangeError(`Quantile must be between 0 and 1, got ${q}`);
    }
    const nums = numeric(values).sort((a, b) => a - b);
    if (nums.length === 0) return NaN;
    const pos = (nums.length - 1) * q;
    const lower = Math.floor(pos);
    const upper = Math.ceil(pos);
    if (lower === upper) return nums[lower];
    return nums[lower] + (nums[upper] - nums[lower]) * (pos - lower);
}

export function median(values: readonly unknown[]): number {
    return quantile(values, 0.5);
}

/** Sample standard deviation (n - 1 denominator). */
export function std(values: readonly unknown[]): number {
    const nums = numeric(values);
    if (nums.length < 2) return NaN;
    const avg = nums.reduce((acc, v) => acc + v, 0) / nums.length;
    const squares = nums.reduce((acc, v) => acc + (v - avg) ** 2, 0);
    return Math.sqrt(squares / (nums.length - 1));
}

export function min(values: readonly unknown[]): number {
    const nums = numeric(values);
    return nums.length === 0 ? NaN : nums.reduce((acc, v) => (v < acc ? v : acc));
}

export function max(values: readonly unknown[]): number {
    const nums = numeric(values);
    return nums.length === 0 ? NaN : nums.reduce((acc, v) => (v > acc ? v : acc));
}

/** Round half away from zero to a fixed number of decimals. */
export function round(value: number, digits = 0): number {
    if (!Number.isFinite(value)) return value;
    const factor = 10 ** digits;
    return Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
}
