/**
 * Score normalization utilities
 * All scores are normalized to 0-100 scale
 */

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

export function linearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = 0,
  outputMax: number = 100
): number {
  if (inputMax === inputMin) return (outputMin + outputMax) / 2;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  return clamp(outputMin + normalized * (outputMax - outputMin), outputMin, outputMax);
}

// NaN, Infinity, null and undefined all map to the fallback
export function finiteOr(value: number | null | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function roundScore(score: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}
