// History summary tiers: lookup, ordering and labels

import type { HistorySummaryDays, HistorySummaryOption } from '../types';

/** Tiers in rank order */
export const HISTORY_SUMMARY_DAYS = [
  'ONE_DAY',
  'ONE_WEEK',
  'TWO_WEEKS',
  'ONE_MONTH',
  'TWO_MONTHS',
  'ONE_YEAR',
] as const satisfies readonly HistorySummaryDays[];

const HISTORY_SUMMARY_CONFIG: Record<HistorySummaryDays, { days: number; label: string }> = {
  ONE_DAY: { days: 1, label: '1 day' },
  ONE_WEEK: { days: 7, label: '7 days' },
  TWO_WEEKS: { days: 14, label: '14 days' },
  ONE_MONTH: { days: 30, label: '30 days' },
  TWO_MONTHS: { days: 60, label: '60 days' },
  ONE_YEAR: { days: 365, label: '365 days' },
};

export const DEFAULT_HISTORY_SUMMARY_DAYS: HistorySummaryDays = 'ONE_MONTH';

/**
 * Resolve a stored day count to its tier.
 * Counts without an exact tier (including NaN and negatives) resolve to ONE_MONTH.
 */
export function historySummaryDaysFor(days: number): HistorySummaryDays {
  return (
    HISTORY_SUMMARY_DAYS.find((tier) => HISTORY_SUMMARY_CONFIG[tier].days === days) ??
    DEFAULT_HISTORY_SUMMARY_DAYS
  );
}

export function getHistorySummaryDays(tier: HistorySummaryDays): number {
  return HISTORY_SUMMARY_CONFIG[tier].days;
}

export function getHistorySummaryLabel(tier: HistorySummaryDays): string {
  return HISTORY_SUMMARY_CONFIG[tier].label;
}

export function getHistorySummaryRank(tier: HistorySummaryDays): number {
  return HISTORY_SUMMARY_DAYS.indexOf(tier);
}

/**
 * True when `tier` ranks at or above `other`
 */
export function isHistorySummaryAtLeast(tier: HistorySummaryDays, other: HistorySummaryDays): boolean {
  return getHistorySummaryRank(tier) >= getHistorySummaryRank(other);
}

export function getHistorySummaryOptions(): HistorySummaryOption[] {
  return HISTORY_SUMMARY_DAYS.map((value) => ({
    value,
    days: HISTORY_SUMMARY_CONFIG[value].days,
    label: HISTORY_SUMMARY_CONFIG[value].label,
  }));
}
