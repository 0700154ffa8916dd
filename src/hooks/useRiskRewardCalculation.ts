'use client';

import { useCallback } from 'react';
import { ApiClientError, postRiskReward } from '@/lib/api-client';
import { useStore } from '@/store/useStore';

export function useRiskRewardCalculation() {
  const { values, report, error, isCalculating, setValue, setCalculating, setReport, setError, reset } = useStore();

  const calculate = useCallback(async () => {
    setCalculating(true);
    try {
      setReport(await postRiskReward(values));
    } catch (err) {
      if (err instanceof ApiClientError) {
        setError({ code: err.code, message: err.message });
      } else {
        console.error('[RiskReward] Request failed:', err);
        setError({ message: 'Could not reach the calculator. Please try again.' });
      }
    }
  }, [values, setCalculating, setReport, setError]);

  return {
    values,
    report,
    error,
    isCalculating,
    setValue,
    calculate,
    reset,
  };
}
