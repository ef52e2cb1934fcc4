declare module 'fft.js' {
  /**
   * Radix-4 FFT over interleaved complex arrays ([re0, im0, re1, im1, ...]).
   * `size` must be a power of two greater than 1.
   */
  export default class FFT {
    constructor(size: number);
    createComplexArray(): number[];
    completeSpectrum(spectrum: number[]): void;
    realTransform(out: number[], data: ArrayLike<number>): void;
  }
}
