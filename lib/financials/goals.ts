import type { AppSettings } from '@/lib/settings/appSettings';

export const MONTHS_PER_YEAR = 12;
export const WEEKS_PER_YEAR = 52;
export const DAYS_PER_YEAR = 365;

export type GoalsBreakdown = {
  yearlyGross: number;
  yearlyNet: number;
  monthlyGross: number;
  monthlyNet: number;
  weeklyGross: number;
  weeklyNet: number;
  dailyGross: number;
  dailyNet: number;
  taxRate: number;
};

export function roundMoney(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(value * 100) / 100;
}

/**
 * Splits the yearly goals into month, week and day targets.
 * The tax rate is reported as stored.
 */
export function computeGoalsBreakdown(goals: AppSettings['goals']): GoalsBreakdown {
  const gross = goals.yearlyGrossGoal;
  const net = goals.yearlyNetGoal;

  return {
    yearlyGross: roundMoney(gross),
    yearlyNet: roundMoney(net),
    monthlyGross: roundMoney(gross / MONTHS_PER_YEAR),
    monthlyNet: roundMoney(net / MONTHS_PER_YEAR),
    weeklyGross: roundMoney(gross / WEEKS_PER_YEAR),
    weeklyNet: roundMoney(net / WEEKS_PER_YEAR),
    dailyGross: roundMoney(gross / DAYS_PER_YEAR),
    dailyNet: roundMoney(net / DAYS_PER_YEAR),
    taxRate: goals.taxRate,
  };
}
