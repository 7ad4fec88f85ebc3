import { celsiusToKelvin } from "./constants.js";

/** Smallest double greater than x. NaN and infinities are returned as-is. */
export function nextUp(x: number): number {
  if (!Number.isFinite(x)) return x;
  if (x === 0) return Number.MIN_VALUE;

  const buf = new Float64Array([x]);
  const bits = new BigInt64Array(buf.buffer);
  bits[0] += x > 0 ? 1n : -1n;
  return buf[0];
}

/** Lowest temperature a tile may hold: just above absolute zero. */
export const minTemperature = nextUp(-celsiusToKelvin);

export function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v;
}

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}
