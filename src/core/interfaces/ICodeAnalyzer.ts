import { AnalysisVerdict } from '../entities/CodeIssue.js';

/**
 * Static analyzer front-end for one source language
 */
export interface ICodeAnalyzer {
  readonly language: string;

  /**
   * Never throws; unparseable input yields a rejecting verdict.
   */
  analyze(code: string): AnalysisVerdict;

  /**
   * Shell command that runs the submission on a worker agent
   */
  buildCommand(code: string): string;
}
