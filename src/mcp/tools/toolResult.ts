import type { PageWiseError } from '../../domain/errors/DomainErrors.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

/** 工具層錯誤：回傳給 client 而非丟出，格式與 CLI 相同 */
export function errorResult(error: PageWiseError): ToolResult {
  return {
    content: [{ type: 'text', text: `Error [${error.code}]: ${error.message}` }],
    isError: true,
  };
}
