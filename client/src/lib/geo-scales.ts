// Axis helpers for longitude, latitude and pressure-level dimensions

const STANDARD_PRESSURE_LEVELS = [1000, 925, 850, 700, 500, 400, 300, 250, 200, 150, 100, 70, 50, 30, 20, 10];

function trimNumber(value: number): string {
  return String(Number(value.toFixed(6)));
}

/**
 * Wrap a longitude into [center - 180, center + 180)
 */
export function wrapLongitude(lon: number, center = 0): number {
  const shifted = (((lon - center + 180) % 360) + 360) % 360;
  return shifted - 180 + center;
}

export function formatLongitude(lon: number): string {
  const wrapped = wrapLongitude(lon);
  if (wrapped === -180) return '180°';
  if (wrapped === 0) return '0°';
  return wrapped < 0 ? `${trimNumber(-wrapped)}°W` : `${trimNumber(wrapped)}°E`;
}

export function formatLatitude(lat: number): string {
  if (lat === 0) return '0°';
  return lat < 0 ? `${trimNumber(-lat)}°S` : `${trimNumber(lat)}°N`;
}

export interface AxisTransform {
  name: string;
  forward: (value: number) => number;
  inverse: (value: number) => number;
}

// Reverse log10: higher pressure plots lower on the axis
export const pressureTransform: AxisTransform = {
  name: 'reverselog',
  forward: (p) => -Math.log10(p),
  inverse: (v) => Math.pow(10, -v),
};

/**
 * Standard pressure levels (hPa) inside the range, surface first
 */
export function pressureBreaks(range: [number, number]): number[] {
  const lo = Math.min(range[0], range[1]);
  const hi = Math.max(range[0], range[1]);
  return STANDARD_PRESSURE_LEVELS.filter(p => p >= lo && p <= hi);
}
