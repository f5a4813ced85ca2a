import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { AnalysisRejected } from '../../core/errors.js';
import { serializeVerdict } from '../serializers.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function jsonResult(title: string, payload: unknown): CallToolResult {
  return textResult(`# ${title}\n\n\`\`\`json\n${JSON.stringify(payload, null, 2)}\n\`\`\``);
}

export function errorResult(action: string, error: unknown): CallToolResult {
  const message = error instanceof Error ? error.message : String(error);
  const text =
    error instanceof AnalysisRejected
      ? `${action}: ${message}\n\n\`\`\`json\n${JSON.stringify(serializeVerdict(error.analysis), null, 2)}\n\`\`\``
      : `${action}: ${message}`;
  return { isError: true, content: [{ type: 'text', text }] };
}
