/**
 * Natural cubic spline through (t, v) knots.
 *
 * Second derivatives come from the usual tridiagonal system with zero end
 * conditions (Thomas algorithm). Outside the knot range the spline continues
 * along the end tangent, which is what a natural spline does.
 */
export function naturalCubicSpline(ts: number[], vs: number[]): (t: number) => number {
  const n = ts.length;
  if (n === 0 || n !== vs.length) return () => NaN;
  if (n === 1) return () => vs[0];

  const m = new Float64Array(n); // second derivatives, m[0] = m[n-1] = 0
  if (n > 2) {
    const sub = new Float64Array(n);
    const diag = new Float64Array(n);
    const rhs = new Float64Array(n);
    for (let i = 1; i < n - 1; i++) {
      const h0 = ts[i] - ts[i - 1];
      const h1 = ts[i + 1] - ts[i];
      sub[i] = h0;
      diag[i] = 2 * (h0 + h1);
      rhs[i] = 6 * ((vs[i + 1] - vs[i]) / h1 - (vs[i] - vs[i - 1]) / h0);
    }
    // forward sweep over interior rows 1..n-2; super-diagonal of row i is h_i
    for (let i = 2; i < n - 1; i++) {
      const w = sub[i] / diag[i - 1];
      diag[i] -= w * (ts[i] - ts[i - 1]);
      rhs[i] -= w * rhs[i - 1];
    }
    for (let i = n - 2; i >= 1; i--) {
      const sup = i < n - 2 ? (ts[i + 1] - ts[i]) * m[i + 1] : 0;
      m[i] = (rhs[i] - sup) / diag[i];
    }
  }

  const slopeAt = (i: number, atRight: boolean): number => {
    const h = ts[i + 1] - ts[i];
    const d = (vs[i + 1] - vs[i]) / h;
    return atRight ? d + (h * (2 * m[i + 1] + m[i])) / 6 : d - (h * (2 * m[i] + m[i + 1])) / 6;
  };

  return (t: number) => {
    if (t <= ts[0]) return vs[0] + slopeAt(0, false) * (t - ts[0]);
    if (t >= ts[n - 1]) return vs[n - 1] + slopeAt(n - 2, true) * (t - ts[n - 1]);

    let lo = 0;
    let hi = n - 1;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (ts[mid] > t) hi = mid;
      else lo = mid;
    }
    const h = ts[hi] - ts[lo];
    const a = (ts[hi] - t) / h;
    const b = (t - ts[lo]) / h;
    return (
      a * vs[lo] +
      b * vs[hi] +
      ((a * a * a - a) * m[lo] + (b * b * b - b) * m[hi]) * (h * h) / 6
    );
  };
}
