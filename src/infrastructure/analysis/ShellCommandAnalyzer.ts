import { ICodeAnalyzer } from '../../core/interfaces/ICodeAnalyzer.js';
import { AnalysisVerdict, CodeIssue, summarizeIssues } from '../../core/entities/CodeIssue.js';
import { isCommentOrBlank } from './lineScan.js';

const UNCONDITIONED_LOOP = /\b(?:while\s+(?:true|:)|until\s+false)\b\s*;?\s*do\b|\bwhile\s+(?:true|:)\s*$/;
const FORK_BOMB = /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/;

const BLOCKING_COMMANDS: Array<{ pattern: RegExp; message: string }> = [
  { pattern: /\btail\s+(?:-\w*f\w*|--follow)\b/, message: 'tail -f never exits on its own' },
  { pattern: /\bsleep\s+infinity\b/, message: 'sleep infinity never exits' },
  { pattern: /(^|[;&|]\s*)yes(\s|$)/, message: 'yes writes output forever' },
];

const HEAVY_COMMANDS: Array<{ pattern: RegExp; message: string }> = [
  { pattern: /\bdd\s+.*if=\/dev\/(?:zero|u?random)\b/, message: 'dd from an endless device' },
  { pattern: /\bcat\s+\/dev\/(?:zero|u?random)\b/, message: 'Reading from an endless device' },
  { pattern: /\b(?:curl|wget)\b/, message: 'Network download detected' },
  { pattern: /\bfind\s+\/(?:\s|$)/, message: 'Filesystem-wide search' },
];

/**
 * Analyzer for shell command submissions.
 *
 * No grammar is involved: unbalanced quotes or unmatched `do`/`done` and
 * `if`/`fi` count as syntax errors, and the remaining checks are line scans.
 */
export class ShellCommandAnalyzer implements ICodeAnalyzer {
  readonly language = 'shell';

  buildCommand(code: string): string {
    return code;
  }

  analyze(code: string): AnalysisVerdict {
    const syntaxError = this.checkSyntax(code);
    if (syntaxError) {
      return this.verdict([syntaxError]);
    }

    const issues: CodeIssue[] = [];
    const lines = code.split('\n');

    lines.forEach((line, index) => {
      if (isCommentOrBlank(line)) return;

      if (FORK_BOMB.test(line)) {
        issues.push({
          type: 'infinite_loop',
          severity: 'high',
          line: index + 1,
          message: 'Fork bomb detected',
          suggestion: 'Remove the self-replicating function',
        });
      }

      if (UNCONDITIONED_LOOP.test(line)) {
        const rest = lines.slice(index).join('\n');
        const loopEnd = rest.search(/\bdone\b/);
        const body = loopEnd === -1 ? rest : rest.slice(0, loopEnd);
        const escapes = /\b(?:break|exit|return)\b/.test(body);
        issues.push({
          type: 'infinite_loop',
          severity: escapes ? 'medium' : 'high',
          line: index + 1,
          message: escapes
            ? 'Unconditioned loop detected (has break/exit)'
            : 'Potential infinite loop detected with no break condition',
          suggestion: escapes ? 'Consider using a more explicit condition' : 'Bound the loop with a counter',
        });
      }

      for (const { pattern, message } of BLOCKING_COMMANDS) {
        if (pattern.test(line)) {
          issues.push({
            type: 'infinite_loop',
            severity: 'high',
            line: index + 1,
            message,
            suggestion: 'Use a bounded variant (for example timeout N <command>)',
          });
        }
      }

      for (const { pattern, message } of HEAVY_COMMANDS) {
        if (pattern.test(line)) {
          issues.push({
            type: 'resource_heavy',
            severity: 'medium',
            line: index + 1,
            message,
            suggestion: 'Limit the amount of data processed',
          });
        }
      }
    });

    return this.verdict(issues);
  }

  private verdict(issues: CodeIssue[]): AnalysisVerdict {
    const summary = summarizeIssues(issues);
    return {
      language: this.language,
      shouldExecute: summary.high === 0,
      issues,
      suggestions: [],
      summary,
    };
  }

  private checkSyntax(code: string): CodeIssue | null {
    if (/[\u0000-\u0008\u000e-\u001f]/.test(code)) {
      return this.syntaxIssue(1, 'binary content is not a command');
    }

    let quote: string | null = null;
    let quoteLine = 1;
    let line = 1;
    for (let i = 0; i < code.length; i++) {
      const ch = code[i];
      if (ch === '\n') line++;
      if (ch === '\\' && quote !== "'") {
        i++;
        continue;
      }
      if (quote === null && (ch === '"' || ch === "'")) {
        quote = ch;
        quoteLine = line;
      } else if (quote !== null && ch === quote) {
        quote = null;
      }
    }
    if (quote !== null) {
      return this.syntaxIssue(quoteLine, `unterminated ${quote === '"' ? 'double' : 'single'} quote`);
    }

    const words = code.replace(/(["'])(?:\\.|(?!\1).)*\1/g, '').split(/[\s;&|()]+/);
    const count = (word: string) => words.filter((w) => w === word).length;
    if (count('do') !== count('done')) {
      return this.syntaxIssue(1, "unmatched 'do'/'done'");
    }
    if (count('if') !== count('fi')) {
      return this.syntaxIssue(1, "unmatched 'if'/'fi'");
    }
    return null;
  }

  private syntaxIssue(line: number, detail: string): CodeIssue {
    return {
      type: 'syntax_error',
      severity: 'high',
      line,
      message: `Syntax error: ${detail}`,
      suggestion: 'Fix syntax errors before execution',
    };
  }
}
