import type { VolumeProfileAnalysis } from './volumeProfile.js';

export const formatVolumeProfile = (symbol: string, interval: string, analysis: VolumeProfileAnalysis): string => {
  const { summary, profile } = analysis;
  if (!summary.dataAvailable) {
    return [
      'Volume Profile Analysis:',
      `No volume profile data available for ${symbol} with interval ${interval}.`
    ].join('\n');
  }

  return [
    'Volume Profile Analysis:',
    `- Point of Control (POC): ${summary.pocPrice.toFixed(2)} (price level with highest trading volume)`,
    `- Value Area High (VAH): ${summary.valueAreaHigh.toFixed(2)}`,
    `- Value Area Low (VAL): ${summary.valueAreaLow.toFixed(2)}`,
    `- Current Price: ${summary.currentPrice.toFixed(2)}`,
    `- Position: Price is ${summary.priceVsPoc} POC and ${summary.priceVsValueArea} Value Area`,
    '',
    'Trading Implications:',
    '- POC acts as a magnet for price and often serves as support/resistance',
    `- Value Area represents where ${Math.round(profile.valueAreaPct * 100)}% of trading occurred, suggesting fair value range`,
    '- Price tends to revert to Value Area when trading outside it',
    '- Breakouts above VAH or below VAL with strong volume suggest potential trend continuation'
  ].join('\n');
};
