export type PriceStatus = 'underpriced' | 'overpriced' | 'fair' | 'unknown';

export interface PriceComparison {
  listedPrice: number;
  marketPrice: number;
  differenceAmount: number;
  /** Signed, relative to market, rounded to 1 decimal */
  differencePct: number;
  status: PriceStatus;
  recommendation: string;
}

const FAIR_BAND_PERCENT = 15;

export function comparePriceToMarket(listedPrice: number, marketPrice: number): PriceComparison {
  if (marketPrice <= 0) {
    return {
      listedPrice,
      marketPrice,
      differenceAmount: 0,
      differencePct: 0,
      status: 'unknown',
      recommendation: 'Unable to compare',
    };
  }

  const difference = listedPrice - marketPrice;
  // The band applies to the unrounded percentage
  const rawPct = (difference * 100) / marketPrice;

  let status: PriceStatus = 'fair';
  let recommendation = 'Price is competitive';
  if (rawPct < -FAIR_BAND_PERCENT) {
    status = 'underpriced';
    recommendation = 'Consider raising price';
  } else if (rawPct > FAIR_BAND_PERCENT) {
    status = 'overpriced';
    recommendation = 'Consider lowering price';
  }

  return {
    listedPrice,
    marketPrice,
    differenceAmount: Math.round(difference * 100) / 100,
    differencePct: Math.round(rawPct * 10) / 10,
    status,
    recommendation,
  };
}
