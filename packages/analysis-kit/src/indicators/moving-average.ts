/**
 * Trailing-window reductions: simple moving average and rolling extrema.
 *
 * Every function returns an array aligned 1:1 with its input. Positions
 * before the window fills, and windows that contain NaN, are NaN. Each runs
 * in a single pass, independent of the window length.
 */

function validateWindow(window: number): void {
  if (!Number.isInteger(window) || window <= 0) {
    throw new Error(`Window must be a positive integer, got ${window}`);
  }
}

/**
 * Running sum with Neumaier compensation, so long windows do not
 * accumulate rounding from values entering and leaving.
 */
class WindowSum {
  private sum = 0;
  private compensation = 0;

  /** Values in the window that are not exactly zero */
  private nonZero = 0;

  add(value: number): void {
    this.accumulate(value);
    if (value !== 0) {
      this.nonZero += 1;
    }
  }

  remove(value: number): void {
    this.accumulate(-value);
    if (value !== 0) {
      this.nonZero -= 1;
    }
  }

  /** An all-zero window sums to exactly 0 */
  total(): number {
    return this.nonZero === 0 ? 0 : this.sum + this.compensation;
  }

  private accumulate(value: number): void {
    const next = this.sum + value;
    if (Math.abs(this.sum) >= Math.abs(value)) {
      this.compensation += this.sum - next + value;
    } else {
      this.compensation += value - next + this.sum;
    }
    this.sum = next;
  }
}

/**
 * Arithmetic mean of `values[i-window+1..i]`.
 *
 * @example
 * ```typescript
 * sma([1, 2, 3, 4], 2); // [NaN, 1.5, 2.5, 3.5]
 * ```
 */
export function sma(values: readonly number[], window: number): number[] {
  validateWindow(window);

  const out = new Array<number>(values.length).fill(Number.NaN);
  const sum = new WindowSum();
  let lastNaN = -1;

  values.forEach((value, i) => {
    if (Number.isNaN(value)) {
      lastNaN = i;
    } else {
      sum.add(value);
    }

    const leaving = values[i - window];
    if (leaving !== undefined && !Number.isNaN(leaving)) {
      sum.remove(leaving);
    }

    if (i - lastNaN >= window) {
      out[i] = sum.total() / window;
    }
  });

  return out;
}

/**
 * Trailing extremum via a monotonic deque of indices: the head always
 * holds the best value still inside the window.
 */
function rollingExtreme(
  values: readonly number[],
  window: number,
  beats: (candidate: number, incumbent: number) => boolean
): number[] {
  validateWindow(window);

  const out = new Array<number>(values.length).fill(Number.NaN);
  const deque: number[] = [];
  let head = 0;
  let lastNaN = -1;

  values.forEach((value, i) => {
    if (Number.isNaN(value)) {
      lastNaN = i;
    } else {
      while (deque.length > head) {
        const tail = deque[deque.length - 1];
        if (tail === undefined || beats(values[tail] ?? Number.NaN, value)) {
          break;
        }
        deque.pop();
      }
      deque.push(i);
    }

    while (deque.length > head && (deque[head] ?? i) <= i - window) {
      head += 1;
    }

    const best = deque[head];
    if (i - lastNaN >= window && best !== undefined) {
      out[i] = values[best] ?? Number.NaN;
    }
  });

  return out;
}

/** Highest value over the trailing window */
export function rollingMax(values: readonly number[], window: number): number[] {
  return rollingExtreme(values, window, (candidate, incumbent) => candidate > incumbent);
}

/** Lowest value over the trailing window */
export function rollingMin(values: readonly number[], window: number): number[] {
  return rollingExtreme(values, window, (candidate, incumbent) => candidate < incumbent);
}
