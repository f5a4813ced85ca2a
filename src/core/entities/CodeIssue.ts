export type IssueType = 'syntax_error' | 'infinite_loop' | 'resource_heavy' | 'warning';

export type IssueSeverity = 'high' | 'medium' | 'low';

/**
 * One static-analysis finding
 */
export interface CodeIssue {
  type: IssueType;
  severity: IssueSeverity;
  line: number;
  message: string;
  suggestion?: string;
}

export interface AnalysisSummary {
  totalIssues: number;
  high: number;
  medium: number;
  low: number;
}

/**
 * Admission verdict for one submission
 */
export interface AnalysisVerdict {
  language: string;
  shouldExecute: boolean;
  issues: CodeIssue[];
  suggestions: string[];
  summary: AnalysisSummary;
}

export function summarizeIssues(issues: CodeIssue[]): AnalysisSummary {
  return {
    totalIssues: issues.length,
    high: issues.filter((i) => i.severity === 'high').length,
    medium: issues.filter((i) => i.severity === 'medium').length,
    low: issues.filter((i) => i.severity === 'low').length,
  };
}
