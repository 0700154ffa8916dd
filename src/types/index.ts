// ============================================================
// Risk-Reward Analyzer — Type Definitions
// ============================================================

// ---- Risk / Reward ----
export interface RiskRewardInputs {
  avgPrice: number;
  maxAgainstPrice: number; // stop-loss level
  targetPrice: number;
  tickSize: number; // must be non-zero
  numLots: number;
  tickValue: number; // $ per tick per lot
  totalLotsEntryExit: number;
  costPerLot?: number; // defaults to 0
  rebatePerLot?: number; // defaults to 0
}

export type RiskRewardField = keyof RiskRewardInputs;

export interface RiskRewardResult {
  totalRisk: number;
  totalReward: number;
}

export interface RiskRewardBreakdown extends RiskRewardResult {
  priceMovementRisk: number; // ticks
  riskFromPrice: number;
  priceMovementReward: number; // ticks
  rewardFromPrice: number;
  transactionCost: number;
  rebateBenefit: number;
}

export type InsightClassification = 'excellent' | 'good' | 'moderate' | 'poor' | 'undefined';

export type InsightTone = 'success' | 'warning' | 'error' | 'info';

export interface RiskRewardInsight {
  classification: InsightClassification;
  ratio: number | null;
  tone: InsightTone;
  message: string;
}

// Secondary label shown next to the ratio. Uses its own thresholds,
// separate from InsightClassification.
export type RatioDelta = 'Good' | 'Poor' | 'Bad' | 'Risk is zero';

export interface BreakdownRow {
  component: string;
  risk: string;
  reward: string;
}

export interface FinancialSummary {
  maximumLoss: string;
  potentialProfit: string;
  profitPotentialPercent: string | null; // only when risk > 0
  riskPercentOfPosition: string | null; // only when avg × lots > 0
}

export interface RiskRewardReport {
  inputs: Required<RiskRewardInputs>;
  result: RiskRewardResult;
  totalRiskDisplay: string;
  totalRewardDisplay: string;
  ratio: number | null;
  ratioDisplay: string; // "1:2.000" or "N/A"
  ratioDelta: RatioDelta;
  breakdown: BreakdownRow[];
  insight: RiskRewardInsight;
  summary: FinancialSummary;
}
