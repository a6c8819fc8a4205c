import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { ProgressiveDisclosureFormatter } from '../../cli/formatters/ProgressiveDisclosureFormatter.js';
import { errorResult, textResult } from './toolResult.js';

/**
 * MCP Tool: pagewise_ask
 * 對應 CLI: pagewise ask <question>
 * 答案生成逾時或失敗時仍回傳檢索到的引用（status: degraded）。
 */
export function registerAskTool(server: McpServer, deps: McpDependencies): void {
  const formatter = new ProgressiveDisclosureFormatter();

  server.tool(
    'pagewise_ask',
    'Answer a question from an ingested document, with parent chunk and page citations',
    {
      question: z.string().describe('Natural-language question'),
      collection: z.string().optional().describe('Collection name'),
      topK: z.number().int().positive().optional().describe('Number of child chunks to retrieve'),
      contextBudget: z.number().int().positive().optional().describe('Context budget in estimated tokens'),
    },
    async ({ question, collection, topK, contextBudget }) => {
      const result = await deps.ask.ask({
        question,
        collectionName: collection ?? deps.defaultCollection,
        topK,
        contextBudget,
      });
      if (!result.ok) return errorResult(result.error);
      return textResult(formatter.formatAnswer(result.value, 'text', 'brief'));
    },
  );
}
