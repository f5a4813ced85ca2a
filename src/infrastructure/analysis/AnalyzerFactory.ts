import { ICodeAnalyzer } from '../../core/interfaces/ICodeAnalyzer.js';
import { ValidationError } from '../../core/errors.js';
import { PythonCodeAnalyzer } from './PythonCodeAnalyzer.js';
import { ShellCommandAnalyzer } from './ShellCommandAnalyzer.js';

export const DEFAULT_LANGUAGE = 'python';

/**
 * Registry of analyzer front-ends keyed by language
 */
export class AnalyzerFactory {
  private analyzers: Map<string, ICodeAnalyzer> = new Map();

  constructor(analyzers: ICodeAnalyzer[] = [new PythonCodeAnalyzer(), new ShellCommandAnalyzer()]) {
    analyzers.forEach((analyzer) => this.register(analyzer));
  }

  register(analyzer: ICodeAnalyzer): void {
    this.analyzers.set(analyzer.language.toLowerCase(), analyzer);
  }

  /**
   * Get an analyzer by language name
   */
  getAnalyzer(language: string = DEFAULT_LANGUAGE): ICodeAnalyzer {
    const analyzer = this.analyzers.get(language.toLowerCase());
    if (!analyzer) {
      throw new ValidationError(`Unknown analyzer language: ${language}`, [
        `Supported languages: ${this.getLanguages().join(', ')}`,
      ]);
    }
    return analyzer;
  }

  supports(language: string): boolean {
    return this.analyzers.has(language.toLowerCase());
  }

  getLanguages(): string[] {
    return Array.from(this.analyzers.keys());
  }
}
