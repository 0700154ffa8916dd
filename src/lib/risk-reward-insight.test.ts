import { describe, expect, it } from 'vitest';
import {
  buildFinancialSummary,
  classifyRatio,
  deriveInsight,
  deriveRatioDelta,
  formatRiskRewardRatio,
} from './risk-reward-insight';

describe('deriveInsight', () => {
  it('classifies a 1:2 setup as good', () => {
    expect(deriveInsight(20, 40)).toEqual({
      classification: 'good',
      ratio: 2,
      tone: 'success',
      message: 'Good Risk-Reward ratio of 1:2.000. This trade has favorable odds.',
    });
  });

  it('uses 3 / 2 / 1 thresholds', () => {
    expect(deriveInsight(10, 30).classification).toBe('excellent');
    expect(deriveInsight(10, 29.9).classification).toBe('good');
    expect(deriveInsight(10, 10).classification).toBe('moderate');
    expect(deriveInsight(10, 9.9).classification).toBe('poor');
  });

  it('writes the ratio into the message', () => {
    expect(deriveInsight(10, 30).message).toBe(
      'Excellent Risk-Reward ratio of 1:3.000! This is a very favorable trade setup.'
    );
    expect(deriveInsight(10, 15).message).toBe(
      'Moderate Risk-Reward ratio of 1:1.500. Consider if the probability of success justifies this ratio.'
    );
    expect(deriveInsight(10, 5)).toMatchObject({
      tone: 'error',
      message: 'Poor Risk-Reward ratio of 1:0.500. This trade setup is not favorable.',
    });
  });

  it('uses the magnitude of a negative risk', () => {
    expect(deriveInsight(-10, 30)).toMatchObject({ classification: 'excellent', ratio: 3 });
  });

  it('flags zero risk as informational instead of dividing', () => {
    expect(deriveInsight(0, 40)).toEqual({
      classification: 'undefined',
      ratio: null,
      tone: 'info',
      message: 'Risk is zero - please verify your inputs.',
    });
  });

  it('classifyRatio maps null to undefined', () => {
    expect(classifyRatio(null)).toBe('undefined');
    expect(classifyRatio(0)).toBe('poor');
  });
});

describe('deriveRatioDelta', () => {
  it('uses its own 2 / 1 scale', () => {
    expect(deriveRatioDelta(10, 20)).toBe('Good');
    expect(deriveRatioDelta(10, 35)).toBe('Good');
    expect(deriveRatioDelta(10, 15)).toBe('Poor');
    expect(deriveRatioDelta(10, 10)).toBe('Poor');
    expect(deriveRatioDelta(10, 5)).toBe('Bad');
  });

  it('disagrees with the insight scale between 1 and 2', () => {
    expect(deriveInsight(10, 15).classification).toBe('moderate');
    expect(deriveRatioDelta(10, 15)).toBe('Poor');
  });

  it('reports zero risk', () => {
    expect(deriveRatioDelta(0, 5)).toBe('Risk is zero');
  });
});

describe('formatRiskRewardRatio', () => {
  it('formats as 1:N with 3 decimals', () => {
    expect(formatRiskRewardRatio(20, 40)).toBe('1:2.000');
    expect(formatRiskRewardRatio(3, 10)).toBe('1:3.333');
  });

  it('rounds small ratios on the stored value', () => {
    // 1 / 2000 = 0.0005 is stored slightly above the midpoint
    expect(formatRiskRewardRatio(2000, 1)).toBe('1:0.001');
  });

  it('returns N/A when risk is zero', () => {
    expect(formatRiskRewardRatio(0, 10)).toBe('N/A');
  });
});

describe('buildFinancialSummary', () => {
  it('reports profit potential and risk as a share of position value', () => {
    const summary = buildFinancialSummary(
      { avgPrice: 0.008, numLots: 10 },
      { totalRisk: 20, totalReward: 40 }
    );

    expect(summary).toEqual({
      maximumLoss: '$20.00',
      potentialProfit: '$40.00',
      profitPotentialPercent: '200.0% of risk',
      riskPercentOfPosition: '25000.00%',
    });
  });

  it('omits profit potential when risk is not positive', () => {
    const summary = buildFinancialSummary(
      { avgPrice: 10, numLots: 1 },
      { totalRisk: -3, totalReward: 6 }
    );
    expect(summary.profitPotentialPercent).toBeNull();
    expect(summary.maximumLoss).toBe('$-3.00');
  });

  it('omits risk percentage when position value is not positive', () => {
    const summary = buildFinancialSummary(
      { avgPrice: -5, numLots: 2 },
      { totalRisk: 10, totalReward: 20 }
    );
    expect(summary.riskPercentOfPosition).toBeNull();
    expect(summary.profitPotentialPercent).toBe('200.0% of risk');
  });
});
