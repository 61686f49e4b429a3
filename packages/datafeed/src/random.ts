export type RandomSource = () => number;

function gaussian(random: RandomSource): number {
  const u1 = 1 - random();
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

// Marsaglia–Tsang; shapes below 1 are boosted and scaled back.
function gamma(shape: number, random: RandomSource): number {
  if (shape < 1) return gamma(shape + 1, random) * Math.pow(random(), 1 / shape);
  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x = gaussian(random);
    let v = 1 + c * x;
    while (v <= 0) {
      x = gaussian(random);
      v = 1 + c * x;
    }
    v = v * v * v;
    const u = random();
    if (u < 1 - 0.0331 * x ** 4) return d * v;
    if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
  }
}

/** Draw from Beta(alpha, beta); exactly `random()` when both are 1. */
export function sampleBeta(alpha: number, beta: number, random: RandomSource = Math.random): number {
  if (alpha === 1 && beta === 1) return random();
  const x = gamma(alpha, random);
  const y = gamma(beta, random);
  return x / (x + y);
}
