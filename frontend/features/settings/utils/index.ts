export * from './historySummaryDays';
