/**
 * Types for row- and page-level diagnostics collected while scraping.
 */

export type DataIssueType =
  | 'PARSE_WARNING'
  | 'ROW_WITHOUT_EVENT'
  | 'DETAIL_PARSE_WARNING'
  | 'TIME_PARSE_FALLBACK';

export interface DataIssue {
  type: DataIssueType;
  message: string;
  url?: string;
  details?: Record<string, unknown>;
}

export type IssueCounts = Record<DataIssueType, number>;

export interface PageFailure {
  url: string;
  dates: string[];
  message: string;
}

export interface ValidationResult<T> {
  valid: T[];
  issues: DataIssue[];
}

export function emptyIssueCounts(): IssueCounts {
  return {
    PARSE_WARNING: 0,
    ROW_WITHOUT_EVENT: 0,
    DETAIL_PARSE_WARNING: 0,
    TIME_PARSE_FALLBACK: 0,
  };
}

export function countIssues(issues: readonly DataIssue[]): IssueCounts {
  const counts = emptyIssueCounts();
  for (const issue of issues) {
    counts[issue.type]++;
  }
  return counts;
}
