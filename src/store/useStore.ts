import { create } from 'zustand';
import { DEFAULT_FORM_VALUES } from '@/lib/risk-reward-input';
import type { RiskRewardField, RiskRewardReport } from '@/types';

// ---- Store Types ----
export interface CalculatorError {
  code?: string;
  message: string;
}

interface CalculatorState {
  // Raw text as typed — parsed only on submit
  values: Record<RiskRewardField, string>;

  // Last submission
  report: RiskRewardReport | null;
  error: CalculatorError | null;
  isCalculating: boolean;

  // Actions
  setValue: (field: RiskRewardField, value: string) => void;
  setValues: (values: Partial<Record<RiskRewardField, string>>) => void;
  setCalculating: (calculating: boolean) => void;
  setReport: (report: RiskRewardReport) => void;
  setError: (error: CalculatorError) => void;
  reset: () => void;
}

// In-memory only: nothing survives a reload.
export const useStore = create<CalculatorState>()((set) => ({
  values: { ...DEFAULT_FORM_VALUES },
  report: null,
  error: null,
  isCalculating: false,

  setValue: (field, value) =>
    set((state) => ({ values: { ...state.values, [field]: value } })),
  setValues: (values) =>
    set((state) => ({ values: { ...state.values, ...values } })),
  setCalculating: (calculating) => set({ isCalculating: calculating }),
  setReport: (report) => set({ report, error: null, isCalculating: false }),
  setError: (error) => set({ error, report: null, isCalculating: false }),
  reset: () =>
    set({ values: { ...DEFAULT_FORM_VALUES }, report: null, error: null, isCalculating: false }),
}));
