/**
 * Signal Filtering Utilities
 *
 * IIR filtering with second-order sections, zero-phase forward-backward
 * filtering and DC removal.
 *
 * @module signal/utils/filters
 */

// =============================================================================
// Second-Order Sections
// =============================================================================

/**
 * Biquad coefficients, normalized so that a[0] = 1
 */
export interface Biquad {
  b: [number, number, number];
  a: [number, number, number];
}

/**
 * Cascade of biquads applied in order
 */
export type SecondOrderSections = Biquad[];

/**
 * Internal state of a transposed direct form II biquad
 */
type BiquadState = [number, number];

/**
 * Apply a biquad (second-order IIR) filter to a signal
 * Uses direct form II transposed for numerical stability
 */
export function applyBiquad(
  signal: number[],
  section: Biquad,
  initialState: BiquadState = [0, 0]
): number[] {
  const { b, a } = section;
  const output = new Array<number>(signal.length);
  let [z1, z2] = initialState;

  for (let i = 0; i < signal.length; i++) {
    const x = signal[i];
    const y = b[0] * x + z1;
    z1 = b[1] * x - a[1] * y + z2;
    z2 = b[2] * x - a[2] * y;
    output[i] = y;
  }

  return output;
}

/**
 * Apply a cascade of biquads. `initialStates` holds one state per section.
 */
export function sosFilter(
  signal: number[],
  sections: SecondOrderSections,
  initialStates?: BiquadState[]
): number[] {
  let output = signal;
  sections.forEach((section, k) => {
    output = applyBiquad(output, section, initialStates?.[k]);
  });
  return output === signal ? [...signal] : output;
}

/**
 * DC gain of a biquad, sum(b) / sum(a)
 */
function dcGain(section: Biquad): number {
  const num = section.b[0] + section.b[1] + section.b[2];
  const den = section.a[0] + section.a[1] + section.a[2];
  return den === 0 ? 0 : num / den;
}

/**
 * Steady-state initial conditions of a cascade for a unit step input.
 * Scaling them by the first input sample starts the filter without a
 * transient at the signal edge.
 */
export function sosSteadyState(sections: SecondOrderSections): BiquadState[] {
  const states: BiquadState[] = [];
  let scale = 1;

  for (const section of sections) {
    const { b, a } = section;
    const gain = dcGain(section);
    const z2 = b[2] - a[2] * gain;
    const z1 = b[1] - a[1] * gain + z2;
    states.push([z1 * scale, z2 * scale]);
    scale *= gain;
  }

  return states;
}

function scaleStates(states: BiquadState[], factor: number): BiquadState[] {
  return states.map(([z1, z2]) => [z1 * factor, z2 * factor]);
}

/**
 * Default edge padding for forward-backward filtering
 */
export function defaultPadLength(sections: SecondOrderSections): number {
  return 3 * (2 * sections.length + 1);
}

/**
 * Apply forward-backward filtering (zero-phase) to avoid phase distortion.
 *
 * The signal is extended at both ends by odd reflection and each pass starts
 * from the cascade's steady state scaled to the first sample it sees, so the
 * output has no group delay and no edge transient from a cold start.
 */
export function filtfilt(
  signal: number[],
  sections: SecondOrderSections,
  padLength: number = defaultPadLength(sections)
): number[] {
  const n = signal.length;
  if (n === 0) return [];
  if (sections.length === 0) return [...signal];

  const padLen = Math.max(0, Math.min(padLength, n - 1));
  const extended = new Array<number>(n + 2 * padLen);

  // Reflect the beginning
  for (let i = 0; i < padLen; i++) {
    extended[i] = 2 * signal[0] - signal[padLen - i];
  }
  for (let i = 0; i < n; i++) {
    extended[padLen + i] = signal[i];
  }
  // Reflect the end
  for (let i = 0; i < padLen; i++) {
    extended[padLen + n + i] = 2 * signal[n - 1] - signal[n - 2 - i];
  }

  const steady = sosSteadyState(sections);

  // Forward pass
  const forward = sosFilter(extended, sections, scaleStates(steady, extended[0]));
  // Backward pass
  forward.reverse();
  const backward = sosFilter(forward, sections, scaleStates(steady, forward[0]));
  backward.reverse();

  return backward.slice(padLen, padLen + n);
}

// =============================================================================
// Notch
// =============================================================================

/**
 * Second-order notch at `notchFreq` with -3 dB bandwidth notchFreq / Q
 */
export function notchCoefficients(
  notchFreq: number,
  sampleRate: number,
  qualityFactor: number
): Biquad {
  const w0 = (2 * Math.PI * notchFreq) / sampleRate;
  const bandwidth = w0 / qualityFactor;
  const gain = 1 / (1 + Math.tan(bandwidth / 2));
  const cosW0 = Math.cos(w0);

  return {
    b: [gain, -2 * gain * cosW0, gain],
    a: [1, -2 * gain * cosW0, 2 * gain - 1],
  };
}

// =============================================================================
// Frequency Response
// =============================================================================

/**
 * Magnitude response of a cascade at `frequency` Hz
 */
export function magnitudeResponse(
  sections: SecondOrderSections,
  frequency: number,
  sampleRate: number
): number {
  const w = (2 * Math.PI * frequency) / sampleRate;
  const c1 = Math.cos(w);
  const s1 = Math.sin(w);
  const c2 = Math.cos(2 * w);
  const s2 = Math.sin(2 * w);

  let magnitude = 1;
  for (const { b, a } of sections) {
    // Evaluate at z^-1 = e^{-jw}
    const numRe = b[0] + b[1] * c1 + b[2] * c2;
    const numIm = -(b[1] * s1 + b[2] * s2);
    const denRe = a[0] + a[1] * c1 + a[2] * c2;
    const denIm = -(a[1] * s1 + a[2] * s2);
    magnitude *= Math.hypot(numRe, numIm) / Math.hypot(denRe, denIm);
  }

  return magnitude;
}

// =============================================================================
// Baseline Correction
// =============================================================================

/**
 * Remove DC offset using mean subtraction
 */
export function removeDCOffset(signal: number[]): number[] {
  if (signal.length === 0) return [];

  let total = 0;
  for (let i = 0; i < signal.length; i++) {
    total += signal[i];
  }
  const mean = total / signal.length;
  return signal.map((val) => val - mean);
}
