export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Sine of an angle in degrees. Multiples of 180° return an exact zero so
 * that boundary checks do not see values such as 1.2e-16.
 */
export function sinDegrees(degrees: number): number {
  if (degrees % 180 === 0) {
    return 0;
  }
  return Math.sin(toRadians(degrees));
}

/**
 * Cosine of an angle in degrees, exactly zero for 90° + k·180°.
 */
export function cosDegrees(degrees: number): number {
  if (Math.abs(degrees % 180) === 90) {
    return 0;
  }
  return Math.cos(toRadians(degrees));
}

export function relativeDifference(actual: number, expected: number): number {
  if (expected === 0) {
    return Math.abs(actual);
  }
  return Math.abs(actual - expected) / Math.abs(expected);
}
