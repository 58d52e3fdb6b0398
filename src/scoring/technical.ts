/**
 * Technicals pillar (T)
 * Fixed five-component blend: trend (price vs 200 DMA), moving-average cross,
 * RSI position, breakout strength and volume surprise. Any component whose
 * inputs are missing scores a neutral 50.
 */

import { finiteValues, mean } from '@/utils/stats';
import { NEUTRAL_POINTS, clamp, linearScale } from './normalize';
import type { TechnicalsParams } from './scoring_config';
import type { PillarResult, PriceRecord, TechnicalComponent, TechnicalsDetails } from './types';

function neutral(weight: number, reason: string): TechnicalComponent {
  return { value: NEUTRAL_POINTS, weight, imputed: true, reason };
}

export function scoreAbove200(prices: PriceRecord, weight: number): TechnicalComponent {
  if (prices.close === null || prices.dma200 === null) {
    return neutral(weight, 'missing close or dma200');
  }
  return { value: prices.close > prices.dma200 ? 100 : 0, weight, imputed: false };
}

export function scoreGoldenCross(prices: PriceRecord, weight: number): TechnicalComponent {
  if (prices.dma20 === null || prices.dma50 === null) {
    return neutral(weight, 'missing dma20 or dma50');
  }
  return { value: prices.dma20 > prices.dma50 ? 100 : 0, weight, imputed: false };
}

export function scoreRsi(
  prices: PriceRecord,
  weight: number,
  params: TechnicalsParams
): TechnicalComponent {
  if (prices.rsi14 === null) {
    return neutral(weight, 'missing rsi14');
  }
  return {
    value: linearScale(prices.rsi14, params.rsiOversold, params.rsiOverbought),
    weight,
    imputed: false,
  };
}

/**
 * Distance of the close above resistance (the higher of the 20-day high and
 * the 20 DMA), relative to max(k1 * ATR, k2 * close).
 */
export function scoreBreakout(
  prices: PriceRecord,
  weight: number,
  params: TechnicalsParams
): TechnicalComponent {
  const { close, high20, dma20, atr14 } = prices;
  const levels = finiteValues([high20, dma20]);
  if (close === null || levels.length === 0) {
    return neutral(weight, 'missing close or resistance level');
  }

  const resistance = Math.max(...levels);
  const gap = Math.max(0, close - resistance);
  const threshold = Math.max(
    atr14 !== null ? params.breakoutAtrMultiple * atr14 : 0,
    params.breakoutCloseFraction * Math.abs(close)
  );

  if (gap === 0 || threshold <= 0) {
    return { value: 0, weight, imputed: false };
  }
  return { value: Math.min(100, (gap / threshold) * 100), weight, imputed: false };
}

export function scoreVolumeSurprise(
  prices: PriceRecord,
  weight: number,
  params: TechnicalsParams
): TechnicalComponent {
  const history = finiteValues(prices.volumeHistory);
  if (prices.volume === null) {
    return neutral(weight, 'missing volume');
  }
  if (history.length < params.volumeMinHistory) {
    return neutral(weight, `volume history ${history.length} < ${params.volumeMinHistory}`);
  }

  const trailing = mean(history.slice(-params.volumeMinHistory));
  if (!(trailing > 0)) {
    return neutral(weight, 'zero trailing volume');
  }

  const ratio = prices.volume / trailing;
  return {
    value: linearScale(ratio, params.volumeRatioFloor, params.volumeRatioCeiling),
    weight,
    imputed: false,
  };
}

export function calculateTechnicalScore(
  prices: PriceRecord,
  params: TechnicalsParams
): PillarResult<TechnicalsDetails> {
  const weights = params.weights;
  const components = {
    above200: scoreAbove200(prices, weights.above_200),
    goldenCross: scoreGoldenCross(prices, weights.golden_cross),
    rsi: scoreRsi(prices, weights.rsi, params),
    breakout: scoreBreakout(prices, weights.breakout, params),
    volume: scoreVolumeSurprise(prices, weights.volume, params),
  };

  const parts = Object.entries(components);
  const total = parts.reduce((sum, [, c]) => sum + c.value * c.weight, 0);

  return {
    score: clamp(total),
    details: {
      components,
      missingFields: parts.filter(([, c]) => c.imputed).map(([name]) => name),
    },
  };
}
