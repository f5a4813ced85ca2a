import { parser } from '@lezer/python';
import type { SyntaxNode, Tree } from '@lezer/common';
import { ICodeAnalyzer } from '../../core/interfaces/ICodeAnalyzer.js';
import { AnalysisVerdict, CodeIssue, summarizeIssues } from '../../core/entities/CodeIssue.js';
import {
  blockText,
  isCommentOrBlank,
  lineNumberAt,
  parseNumericLiteral,
} from './lineScan.js';

export const LARGE_RANGE_THRESHOLD = 100_000;
export const LARGE_SEQUENCE_THRESHOLD = 10_000;
export const LARGE_ARRAY_THRESHOLD = 10_000;
export const LARGE_BUFFER_BYTES = 10_000_000;
export const MAX_LOOP_NESTING = 2;

const UNCONDITIONED_LOOP_PATTERNS: RegExp[] = [
  /^\s*while\s+\(?\s*True\s*\)?\s*:/,
  /^\s*while\s+\(?\s*1\s*\)?\s*:/,
  /^\s*while\s+not\s+False\s*:/,
  /^\s*(?:async\s+)?for\s+\w+\s+in\s+itertools\.count\(/,
];

const HEREDOC_MARKER = 'EXEC_PY_SOURCE';

const FUNCTION_HEADER = /^\s*(?:async\s+)?def\s+(\w+)\s*\(/;

interface ResourceRule {
  id: string;
  /**
   * Returns true when the line trips the rule
   */
  test(line: string): boolean;
  message: string;
  suggestion: string;
}

function largestNumber(args: string): number {
  return args
    .split(',')
    .map((part) => parseNumericLiteral(part.replace(/[()]/g, '')))
    .reduce<number>((max, value) => (value !== null && value > max ? value : max), 0);
}

function shapeSize(args: string): number {
  const values = args
    .split(',')
    .map((part) => parseNumericLiteral(part.replace(/[()]/g, '')))
    .filter((value): value is number => value !== null);
  return values.length === 0 ? 0 : values.reduce((product, value) => product * value, 1);
}

const RESOURCE_RULES: ResourceRule[] = [
  {
    id: 'large-range',
    test: (line) =>
      Array.from(line.matchAll(/\brange\(([^)]*)\)/g)).some(
        (m) => largestNumber(m[1]) >= LARGE_RANGE_THRESHOLD
      ),
    message: `Loop over more than ${LARGE_RANGE_THRESHOLD.toLocaleString('en-US')} iterations`,
    suggestion: 'Process the range in batches and report progress',
  },
  {
    id: 'unbounded-read',
    test: (line) => /\.read\(\s*\)/.test(line),
    message: 'Unbounded read() loads the whole stream into memory',
    suggestion: 'Pass a size to read() or iterate over the stream in chunks',
  },
  {
    id: 'network-request',
    test: (line) => /\brequests\.(?:get|post|put|delete|request)\(/.test(line) || /\burllib\.request\b/.test(line),
    message: 'Network request detected',
    suggestion: 'Set an explicit timeout on network calls',
  },
  {
    id: 'subprocess',
    test: (line) => /\bsubprocess\./.test(line),
    message: 'Subprocess spawn detected',
    suggestion: 'Pass a timeout to subprocess calls',
  },
  {
    id: 'large-sequence',
    test: (line) =>
      Array.from(line.matchAll(/\[[^\]]*\]\s*\*\s*([\d_]+(?:\s*\*\*\s*\d+)?)/g)).some(
        (m) => (parseNumericLiteral(m[1]) ?? 0) >= LARGE_SEQUENCE_THRESHOLD
      ),
    message: 'Large list allocation',
    suggestion: 'Use a generator or allocate lazily',
  },
  {
    id: 'large-array',
    test: (line) =>
      Array.from(line.matchAll(/\b(?:numpy|np)\.(?:zeros|ones|empty|full)\(\s*(\([^)]*\)|[\d_]+)/g)).some(
        (m) => shapeSize(m[1]) >= LARGE_ARRAY_THRESHOLD
      ),
    message: 'Large array allocation',
    suggestion: 'Consider chunked processing or a memory-mapped array',
  },
  {
    id: 'large-buffer',
    test: (line) =>
      Array.from(line.matchAll(/\b(?:bytearray|bytes)\(\s*([\d_]+(?:\s*\*\*\s*\d+)?)\s*\)/g)).some(
        (m) => (parseNumericLiteral(m[1]) ?? 0) >= LARGE_BUFFER_BYTES
      ),
    message: 'Large fixed-size buffer allocation',
    suggestion: 'Stream the data instead of preallocating the whole buffer',
  },
];

// A call to `name` itself or through self/cls; other attribute calls are a different function
function selfCall(name: string): RegExp {
  return new RegExp(`(?:^|[^\\w.]|\\b(?:self|cls)\\.)${name}\\s*\\(`, 'm');
}

function isLoop(node: SyntaxNode): boolean {
  return node.name === 'WhileStatement' || node.name === 'ForStatement';
}

function loopDepth(node: SyntaxNode): number {
  let deepest = 0;
  for (let child = node.firstChild; child; child = child.nextSibling) {
    deepest = Math.max(deepest, loopDepth(child));
  }
  return isLoop(node) ? deepest + 1 : deepest;
}

function containsNode(node: SyntaxNode, name: string): boolean {
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.name === name || containsNode(child, name)) return true;
  }
  return false;
}

function isStaticallyTrue(condition: string): boolean {
  let text = condition.trim().replace(/:$/, '').trim();
  while (text.startsWith('(') && text.endsWith(')')) {
    text = text.slice(1, -1).trim();
  }
  return /^True$/.test(text) || /^[1-9][\d_]*$/.test(text) || /^not\s+(False|0|None)$/.test(text);
}

interface SyntaxProblem {
  from: number;
  to: number;
  message?: string;
}

const ASSIGN_SEPARATORS = new Set(['AssignOp', '=']);
const TARGET_PUNCTUATION = new Set([',', '(', ')', '[', ']', '*', 'ArithOp', 'TypeDef', ':', 'Comment']);
const TARGET_CONTAINERS = new Set(['TupleExpression', 'ArrayExpression', 'ParenthesizedExpression']);
const TARGET_LEAVES = new Set(['VariableName', 'MemberExpression']);

// `print (x)` is a call in Python 3; only the bare statement form is rejected
function isParenthesizedPrint(code: string, node: SyntaxNode): boolean {
  const keyword = node.firstChild;
  return code.slice(keyword ? keyword.to : node.from, node.to).trimStart().startsWith('(');
}

function invalidTargetIn(node: SyntaxNode): SyntaxNode | null {
  if (TARGET_LEAVES.has(node.name) || TARGET_PUNCTUATION.has(node.name)) return null;
  if (!TARGET_CONTAINERS.has(node.name)) return node;
  for (let child = node.firstChild; child; child = child.nextSibling) {
    const invalid = invalidTargetIn(child);
    if (invalid) return invalid;
  }
  return null;
}

/**
 * Targets are the children left of the last `=`; each must be a name, an
 * attribute or subscript, or a tuple/list of those
 */
function invalidAssignTarget(statement: SyntaxNode): SyntaxNode | null {
  const children: SyntaxNode[] = [];
  for (let child = statement.firstChild; child; child = child.nextSibling) {
    children.push(child);
  }
  let lastSeparator = -1;
  children.forEach((child, index) => {
    if (ASSIGN_SEPARATORS.has(child.name)) lastSeparator = index;
  });

  for (const child of children.slice(0, Math.max(lastSeparator, 0))) {
    if (ASSIGN_SEPARATORS.has(child.name)) continue;
    const invalid = invalidTargetIn(child);
    if (invalid) return invalid;
  }
  return null;
}

/**
 * Static analyzer for Python submissions.
 *
 * A submission is parsed with the lezer Python grammar. An error node, or a
 * construct the grammar accepts but Python 3 rejects, is a syntax error and
 * ends the analysis. Otherwise two deliberately overlapping passes run: a
 * line scan for textual idioms and a syntax-tree walk for the same hazards
 * written differently. Admission requires zero high issues.
 */
export class PythonCodeAnalyzer implements ICodeAnalyzer {
  readonly language = 'python';

  /**
   * Feed the source to python3 on stdin through a quoted heredoc, so the
   * worker's shell performs no expansion inside it
   */
  buildCommand(code: string): string {
    return `python3 - <<'${HEREDOC_MARKER}'\n${code.replace(/\n?$/, '\n')}${HEREDOC_MARKER}`;
  }

  analyze(code: string): AnalysisVerdict {
    const issues: CodeIssue[] = [];

    let tree: Tree;
    try {
      tree = parser.parse(code);
    } catch (error) {
      issues.push({
        type: 'syntax_error',
        severity: 'high',
        line: 0,
        message: `Syntax error: ${error instanceof Error ? error.message : String(error)}`,
        suggestion: 'Fix syntax errors before execution',
      });
      return this.verdict(issues, []);
    }

    const syntaxError = this.findSyntaxError(code, tree);
    if (syntaxError) {
      return this.verdict([syntaxError], []);
    }

    const lines = code.split('\n');
    issues.push(...this.checkInfiniteLoops(lines));
    issues.push(...this.checkRecursion(lines));
    issues.push(...this.checkResourceUsage(lines));
    issues.push(...this.analyzeTree(code, tree));

    return this.verdict(issues, this.suggestSafePatterns(code));
  }

  private verdict(issues: CodeIssue[], suggestions: string[]): AnalysisVerdict {
    const summary = summarizeIssues(issues);
    return {
      language: this.language,
      shouldExecute: summary.high === 0,
      issues,
      suggestions,
      summary,
    };
  }

  /**
   * Error nodes from the parser, plus the constructs the grammar accepts but
   * Python 3 rejects: statement-form `print` and assignment to an expression
   */
  private findSyntaxError(code: string, tree: Tree): CodeIssue | null {
    const errors: SyntaxProblem[] = [];
    tree.iterate({
      enter: (ref) => {
        if (ref.type.isError) {
          errors.push({ from: ref.from, to: ref.to });
          return;
        }
        const node = ref.node;
        if (node.name === 'PrintStatement' && !isParenthesizedPrint(code, node)) {
          errors.push({ from: node.from, to: node.to, message: "Missing parentheses in call to 'print'" });
        } else if (node.name === 'AssignStatement') {
          const target = invalidAssignTarget(node);
          if (target) {
            errors.push({ from: target.from, to: target.to, message: 'cannot assign to expression' });
          }
        }
      },
    });
    if (errors.length === 0) return null;

    const { from, to, message } = errors.reduce((earliest, next) => (next.from < earliest.from ? next : earliest));
    const snippet = code.slice(from, Math.max(to, from + 1)).trim().slice(0, 20);
    return {
      type: 'syntax_error',
      severity: 'high',
      line: lineNumberAt(code, from),
      message: message
        ? `Syntax error: ${message}`
        : snippet
          ? `Syntax error: invalid syntax near '${snippet}'`
          : 'Syntax error: invalid syntax',
      suggestion: 'Fix syntax errors before execution',
    };
  }

  private checkInfiniteLoops(lines: string[]): CodeIssue[] {
    const issues: CodeIssue[] = [];

    lines.forEach((line, index) => {
      if (isCommentOrBlank(line)) return;
      if (!UNCONDITIONED_LOOP_PATTERNS.some((pattern) => pattern.test(line))) return;

      const body = blockText(lines, index, line.slice(line.indexOf(':') + 1));
      const escapes = /\bbreak\b/.test(body) || /\breturn\b/.test(body);

      issues.push(
        escapes
          ? {
              type: 'infinite_loop',
              severity: 'medium',
              line: index + 1,
              message: "Loop with 'while True' pattern detected (has break/return)",
              suggestion: 'Consider using a more explicit condition',
            }
          : {
              type: 'infinite_loop',
              severity: 'high',
              line: index + 1,
              message: 'Potential infinite loop detected with no break condition',
              suggestion: 'Add a break condition or use a different loop structure',
            }
      );
    });

    return issues;
  }

  private checkRecursion(lines: string[]): CodeIssue[] {
    const issues: CodeIssue[] = [];

    lines.forEach((line, index) => {
      const header = line.match(FUNCTION_HEADER);
      if (!header) return;

      const name = header[1];
      const remainder = line.match(/\)\s*(?:->[^:]*)?:(.*)$/)?.[1] ?? '';
      const body = blockText(lines, index, remainder);
      if (!selfCall(name).test(body)) return;

      const guarded = /(^|\n|;|:)\s*(if|elif)\b/.test(body) || /\bif\b.*\belse\b/.test(body);
      issues.push(
        guarded
          ? {
              type: 'infinite_loop',
              severity: 'medium',
              line: index + 1,
              message: `Recursive function '${name}' detected`,
              suggestion: 'Make sure every recursive path reaches the base case',
            }
          : {
              type: 'infinite_loop',
              severity: 'high',
              line: index + 1,
              message: `Recursive function '${name}' has no visible base case`,
              suggestion: 'Add a base case that returns without recursing',
            }
      );
    });

    return issues;
  }

  private checkResourceUsage(lines: string[]): CodeIssue[] {
    const issues: CodeIssue[] = [];

    lines.forEach((line, index) => {
      if (isCommentOrBlank(line)) return;
      for (const rule of RESOURCE_RULES) {
        if (rule.test(line)) {
          issues.push({
            type: 'resource_heavy',
            severity: 'medium',
            line: index + 1,
            message: rule.message,
            suggestion: rule.suggestion,
          });
        }
      }
    });

    return issues;
  }

  private analyzeTree(code: string, tree: Tree): CodeIssue[] {
    const issues: CodeIssue[] = [];

    tree.iterate({
      enter: (ref) => {
        const node = ref.node;
        if (!isLoop(node)) return;
        const line = lineNumberAt(code, node.from);

        const depth = loopDepth(node);
        if (depth > MAX_LOOP_NESTING) {
          issues.push({
            type: 'warning',
            severity: 'medium',
            line,
            message: `Deeply nested loops (${depth} levels) detected`,
            suggestion: 'Consider refactoring to reduce nesting',
          });
        }

        if (node.name === 'WhileStatement') {
          const keyword = node.firstChild;
          const body = node.getChild('Body');
          const condition = code.slice(keyword ? keyword.to : node.from, body ? body.from : node.to);
          if (isStaticallyTrue(condition) && !containsNode(node, 'BreakStatement')) {
            issues.push({
              type: 'infinite_loop',
              severity: 'high',
              line,
              message: 'while True loop without break statement',
              suggestion: 'Add break condition to prevent infinite loop',
            });
          }
        }
      },
    });

    return issues;
  }

  private suggestSafePatterns(code: string): string[] {
    const suggestions: string[] = [];

    if (/\bwhile\s+\(?\s*(True|1)\s*\)?\s*:/.test(code)) {
      suggestions.push("Consider using 'for i in range(max_iterations)' with a reasonable limit");
      suggestions.push('Add a counter variable and check it in the while condition');
    }

    const hasLargeRange = Array.from(code.matchAll(/\brange\(([^)]*)\)/g)).some(
      (m) => largestNumber(m[1]) >= LARGE_RANGE_THRESHOLD
    );
    if (hasLargeRange) {
      suggestions.push('For large ranges, consider using generators or batch processing');
      suggestions.push("Add progress monitoring: if i % 1000 == 0: print(f'Progress: {i}')");
    }

    return suggestions;
  }
}
