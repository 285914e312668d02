/**
 * Volatility risk: ATR as a percent of price, mapped onto 20-80.
 */

import { clamp, linearScale } from './normalize';

const LOW_RISK_FLOOR = 20;
const HIGH_RISK_CEILING = 80;

export function atrPercent(atr: number, price: number): number {
  if (price <= 0) return 0;
  return (atr / price) * 100;
}

export function riskScore(atr: number, price: number): number {
  const pct = atrPercent(atr, price);

  let risk: number;
  if (pct < 1) {
    risk = LOW_RISK_FLOOR;
  } else if (pct > 5) {
    risk = HIGH_RISK_CEILING;
  } else {
    // 20 + (pct / 5) * 60
    risk = linearScale(pct, 0, 5, LOW_RISK_FLOOR, HIGH_RISK_CEILING);
  }

  return clamp(risk);
}
