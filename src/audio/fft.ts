// ─── FFT ────────────────────────────────────────────────────────────────────
//
// Forward DFT of any length. Powers of two go straight through an in-place
// radix-2 Cooley-Tukey pass; other lengths use Bluestein's chirp-z
// algorithm on a padded power-of-two convolution.
// ─────────────────────────────────────────────────────────────────────────────

export interface Spectrum {
  re: Float64Array;
  im: Float64Array;
}

/** Forward FFT of a real signal (imaginary parts zero). */
export function realFft(samples: ArrayLike<number>): Spectrum {
  const n = samples.length;
  const re = Float64Array.from(samples);
  const im = new Float64Array(n);

  if (n <= 1) return { re, im };
  if (isPowerOfTwo(n)) {
    fftRadix2(re, im, false);
    return { re, im };
  }
  return bluestein(re, im);
}

/** |X[k]| */
export function magnitude(spectrum: Spectrum, bin: number): number {
  return Math.hypot(spectrum.re[bin], spectrum.im[bin]);
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

// ─── Radix-2 (in-place) ─────────────────────────────────────────────────────

export function fftRadix2(re: Float64Array, im: Float64Array, inverse: boolean): void {
  const n = re.length;
  if (!isPowerOfTwo(n) || im.length !== n) {
    throw new RangeError(`radix-2 FFT needs equal power-of-two buffers, got ${n} and ${im.length}`);
  }

  // Bit-reversal permutation
  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    while (j & bit) { j ^= bit; bit >>= 1; }
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
      [im[i], im[j]] = [im[j], im[i]];
    }
  }

  // Butterfly passes; twiddles computed directly to keep long transforms accurate
  for (let len = 2; len <= n; len *= 2) {
    const halfLen = len / 2;
    const step = ((inverse ? 2 : -2) * Math.PI) / len;

    for (let k = 0; k < halfLen; k++) {
      const wRe = Math.cos(step * k);
      const wIm = Math.sin(step * k);
      for (let i = k; i < n; i += len) {
        const j = i + halfLen;
        const tRe = wRe * re[j] - wIm * im[j];
        const tIm = wRe * im[j] + wIm * re[j];
        re[j] = re[i] - tRe;
        im[j] = im[i] - tIm;
        re[i] += tRe;
        im[i] += tIm;
      }
    }
  }

  if (inverse) {
    for (let i = 0; i < n; i++) { re[i] /= n; im[i] /= n; }
  }
}

// ─── Bluestein ──────────────────────────────────────────────────────────────

function bluestein(re: Float64Array, im: Float64Array): Spectrum {
  const n = re.length;
  let m = 1;
  while (m < 2 * n - 1) m *= 2;

  // Chirp w[k] = exp(-iπk²/n); k² taken mod 2n to keep the angle small
  const chirpRe = new Float64Array(n);
  const chirpIm = new Float64Array(n);
  for (let k = 0; k < n; k++) {
    const angle = (Math.PI * ((k * k) % (2 * n))) / n;
    chirpRe[k] = Math.cos(angle);
    chirpIm[k] = -Math.sin(angle);
  }

  // a[k] = x[k] · w[k]
  const aRe = new Float64Array(m);
  const aIm = new Float64Array(m);
  for (let k = 0; k < n; k++) {
    aRe[k] = re[k] * chirpRe[k] - im[k] * chirpIm[k];
    aIm[k] = re[k] * chirpIm[k] + im[k] * chirpRe[k];
  }

  // b[k] = conj(w[k]), mirrored so the circular convolution is linear
  const bRe = new Float64Array(m);
  const bIm = new Float64Array(m);
  bRe[0] = chirpRe[0];
  bIm[0] = -chirpIm[0];
  for (let k = 1; k < n; k++) {
    bRe[k] = bRe[m - k] = chirpRe[k];
    bIm[k] = bIm[m - k] = -chirpIm[k];
  }

  fftRadix2(aRe, aIm, false);
  fftRadix2(bRe, bIm, false);
  for (let k = 0; k < m; k++) {
    const r = aRe[k] * bRe[k] - aIm[k] * bIm[k];
    aIm[k] = aRe[k] * bIm[k] + aIm[k] * bRe[k];
    aRe[k] = r;
  }
  fftRadix2(aRe, aIm, true);

  // X[k] = w[k] · (a ⊛ b)[k]
  const outRe = new Float64Array(n);
  const outIm = new Float64Array(n);
  for (let k = 0; k < n; k++) {
    outRe[k] = aRe[k] * chirpRe[k] - aIm[k] * chirpIm[k];
    outIm[k] = aRe[k] * chirpIm[k] + aIm[k] * chirpRe[k];
  }
  return { re: outRe, im: outIm };
}
