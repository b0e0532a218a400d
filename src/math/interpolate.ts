/**
 * Linear interpolation between two values
 */
export function mix(start: number, end: number, t: number): number {
  return start + (end - start) * t;
}

/**
 * Map a value from the input range onto the output range.
 * Not clamped: values outside [inMin, inMax] extrapolate.
 */
export function mapRange(
  x: number,
  inMin: number,
  inMax: number,
  outMin: number,
  outMax: number
): number {
  return ((x - inMin) * (outMax - outMin)) / (inMax - inMin) + outMin;
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
