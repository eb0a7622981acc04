/**
 * Single-qubit decomposition.
 *
 * A generic single-qubit unitary given by its first column (alpha, beta)
 * is expressed as the three Euler angles of a `u3` gate.
 */

import { magnitude, phase, type Complex } from './complex';

/**
 * Euler angles of a U3(theta, phi, lambda) gate
 */
export interface EulerAngles {
  theta: number;
  phi: number;
  lambda: number;
}

/**
 * Compute the U3 angles of the unitary with first column (alpha, beta).
 *
 * |alpha|² + |beta|² = 1 is assumed, not checked. |alpha| is clamped to
 * [-1, 1] before `acos` so rounding overshoot cannot produce NaN.
 */
export function eulerAngles(alpha: Complex, beta: Complex): EulerAngles {
  const absAlpha = Math.min(1, Math.max(-1, magnitude(alpha)));
  // `0 -` instead of unary minus: keeps -0 out of the rendered angles
  const angleAlpha = 0 - phase(alpha);
  const angleBeta = phase(beta);

  return {
    theta: 2 * Math.acos(absAlpha),
    phi: angleAlpha + angleBeta,
    lambda: angleAlpha - angleBeta,
  };
}
