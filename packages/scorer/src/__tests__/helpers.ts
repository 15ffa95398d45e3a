import type { ExpectedIssue, PredictedIssue, Severity } from '@skillbench/core';

export function expected(
  title: string,
  severity: Severity,
  locations: string[] = ['f:10'],
  extra: Partial<ExpectedIssue> = {},
): ExpectedIssue {
  return { title, severity, locations, fix: 'apply the fix', ...extra };
}

export function predicted(
  title: string,
  severity: PredictedIssue['severity'],
  locations: string[] = ['f:10'],
  extra: Partial<PredictedIssue> = {},
): PredictedIssue {
  return { title, severity, locations, description: '', ...extra };
}
