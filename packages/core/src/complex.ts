/**
 * Complex number utilities.
 *
 * Used for the amplitudes of generic single-qubit gates, initial state
 * vectors and the continuous state-vector / density-matrix readouts.
 */

/**
 * Complex number interface
 */
export interface Complex {
  real: number;
  imag: number;
}

/**
 * Create a complex number
 */
export function complex(real: number, imag: number = 0): Complex {
  return { real, imag };
}

/**
 * Complex zero
 */
export const ZERO: Complex = { real: 0, imag: 0 };

/**
 * Complex one
 */
export const ONE: Complex = { real: 1, imag: 0 };

/**
 * Magnitude |z| = sqrt(a² + b²)
 */
export function magnitude(c: Complex): number {
  return Math.hypot(c.real, c.imag);
}

/**
 * Magnitude squared |z|² = a² + b²
 */
export function magnitudeSquared(c: Complex): number {
  return c.real * c.real + c.imag * c.imag;
}

/**
 * Phase angle arg(z) = atan2(b, a)
 */
export function phase(c: Complex): number {
  return Math.atan2(c.imag, c.real);
}

/**
 * Complex conjugate z* = a - bi
 */
export function conjugate(c: Complex): Complex {
  return { real: c.real, imag: -c.imag };
}

/**
 * Check if two complex numbers are approximately equal
 */
export function equals(a: Complex, b: Complex, tolerance: number = 1e-10): boolean {
  return (
    Math.abs(a.real - b.real) < tolerance && Math.abs(a.imag - b.imag) < tolerance
  );
}

/**
 * Euclidean norm of a complex vector ||v|| = sqrt(Σ|v_i|²)
 */
export function norm(v: readonly Complex[]): number {
  let sum = 0;
  for (const c of v) {
    sum += magnitudeSquared(c);
  }
  return Math.sqrt(sum);
}

/**
 * Flatten a row-major complex matrix into a single vector
 */
export function flatten(matrix: readonly (readonly Complex[])[]): Complex[] {
  const result: Complex[] = [];
  for (const row of matrix) {
    for (const c of row) {
      result.push({ real: c.real, imag: c.imag });
    }
  }
  return result;
}
