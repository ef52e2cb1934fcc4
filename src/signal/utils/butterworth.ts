/**
 * Butterworth Band-Pass Design
 *
 * Analog low-pass prototype → band-pass transform → bilinear transform with
 * pre-warped corners, returned as second-order sections. The corners are the
 * half-power (-3 dB) frequencies and the gain at the geometric center is 1.
 *
 * @module signal/utils/butterworth
 */

import { ConfigurationError } from '../../utils/errors';
import { magnitudeResponse, type Biquad, type SecondOrderSections } from './filters';

// =============================================================================
// Complex Arithmetic
// =============================================================================

interface Complex {
  re: number;
  im: number;
}

const complex = (re: number, im: number = 0): Complex => ({ re, im });

const add = (x: Complex, y: Complex): Complex => complex(x.re + y.re, x.im + y.im);

const sub = (x: Complex, y: Complex): Complex => complex(x.re - y.re, x.im - y.im);

const mul = (x: Complex, y: Complex): Complex =>
  complex(x.re * y.re - x.im * y.im, x.re * y.im + x.im * y.re);

const scale = (x: Complex, k: number): Complex => complex(x.re * k, x.im * k);

function div(x: Complex, y: Complex): Complex {
  const d = y.re * y.re + y.im * y.im;
  return complex((x.re * y.re + x.im * y.im) / d, (x.im * y.re - x.re * y.im) / d);
}

/**
 * Principal square root
 */
function sqrt(x: Complex): Complex {
  const r = Math.hypot(x.re, x.im);
  const re = Math.sqrt(Math.max(0, (r + x.re) / 2));
  const im = Math.sqrt(Math.max(0, (r - x.re) / 2));
  return complex(re, x.im < 0 ? -im : im);
}

const conj = (x: Complex): Complex => complex(x.re, -x.im);

// =============================================================================
// Design
// =============================================================================

/**
 * Left-half-plane poles of the normalized Butterworth low-pass prototype
 */
function prototypePoles(order: number): Complex[] {
  const poles: Complex[] = [];
  for (let k = 0; k < order; k++) {
    const theta = (Math.PI * (2 * k + order + 1)) / (2 * order);
    poles.push(complex(Math.cos(theta), Math.sin(theta)));
  }
  return poles;
}

/**
 * Map an analog pole to the z-plane, s = (1 - z^-1) / (1 + z^-1)
 */
function bilinear(s: Complex): Complex {
  return div(add(complex(1), s), sub(complex(1), s));
}

/**
 * Biquad with zeros at z = 1 and z = -1 and the given pair of z-plane poles.
 * The pair must be conjugate or both real.
 */
function bandpassSection(p1: Complex, p2: Complex): Biquad {
  const sumPoles = add(p1, p2);
  const product = mul(p1, p2);
  return {
    b: [1, 0, -1],
    a: [1, -sumPoles.re, product.re],
  };
}

/**
 * Design a Butterworth band-pass filter.
 *
 * @param order Band-pass order (number of poles); must be even. An order-4
 *   band-pass comes from a second-order prototype and yields two sections.
 * @param lowHz Lower half-power frequency
 * @param highHz Upper half-power frequency
 */
export function designButterworthBandpass(
  order: number,
  lowHz: number,
  highHz: number,
  sampleRate: number
): SecondOrderSections {
  if (!Number.isInteger(order) || order < 2 || order % 2 !== 0) {
    throw new ConfigurationError('Band-pass order must be a positive even integer', 'order', order);
  }
  if (!(lowHz > 0 && lowHz < highHz)) {
    throw new ConfigurationError('Band-pass corners must satisfy 0 < low < high', 'bandpass', [lowHz, highHz]);
  }
  if (highHz >= sampleRate / 2) {
    throw new ConfigurationError(
      `Upper corner ${highHz} Hz must be below Nyquist (${sampleRate / 2} Hz)`,
      'bandpass',
      [lowHz, highHz]
    );
  }

  // Pre-warped analog corners for the bilinear transform
  const w1 = Math.tan((Math.PI * lowHz) / sampleRate);
  const w2 = Math.tan((Math.PI * highHz) / sampleRate);
  const w0Squared = w1 * w2;
  const bandwidth = w2 - w1;

  const sections: SecondOrderSections = [];

  for (const p of prototypePoles(order / 2)) {
    // s^2 - p*bw*s + w0^2 = 0 gives the two band-pass poles of p
    const pb = scale(p, bandwidth);
    const root = sqrt(sub(mul(pb, pb), complex(4 * w0Squared)));
    const sA = scale(add(pb, root), 0.5);
    const sB = scale(sub(pb, root), 0.5);

    if (Math.abs(p.im) < 1e-12) {
      // Real prototype pole: its two band-pass poles are a conjugate or real pair
      sections.push(bandpassSection(bilinear(sA), bilinear(sB)));
    } else if (p.im > 0) {
      // The conjugate prototype pole contributes conj(sA) and conj(sB)
      const zA = bilinear(sA);
      const zB = bilinear(sB);
      sections.push(bandpassSection(zA, conj(zA)));
      sections.push(bandpassSection(zB, conj(zB)));
    }
  }

  // Unit gain at the digital center frequency
  const centerHz = (Math.atan(Math.sqrt(w0Squared)) * sampleRate) / Math.PI;
  const gain = magnitudeResponse(sections, centerHz, sampleRate);
  const first = sections[0];
  sections[0] = {
    b: [first.b[0] / gain, first.b[1] / gain, first.b[2] / gain],
    a: first.a,
  };

  return sections;
}

/**
 * Largest pole radius of a cascade; below 1 means stable
 */
export function maxPoleRadius(sections: SecondOrderSections): number {
  let radius = 0;
  for (const { a } of sections) {
    // Roots of z^2 + a1 z + a2
    const disc = complex(a[1] * a[1] - 4 * a[2]);
    const root = sqrt(disc);
    const r1 = scale(add(complex(-a[1]), root), 0.5);
    const r2 = scale(sub(complex(-a[1]), root), 0.5);
    radius = Math.max(radius, Math.hypot(r1.re, r1.im), Math.hypot(r2.re, r2.im));
  }
  return radius;
}
