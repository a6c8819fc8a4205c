import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { ProgressiveDisclosureFormatter } from '../../cli/formatters/ProgressiveDisclosureFormatter.js';
import { errorResult, textResult } from './toolResult.js';

/**
 * MCP Tool: pagewise_retrieve
 * 對應 CLI: pagewise retrieve <query>
 * 子塊檢索 + 父塊擴展，回傳完整 parent 文字，不呼叫 LLM。
 */
export function registerRetrieveTool(server: McpServer, deps: McpDependencies): void {
  const formatter = new ProgressiveDisclosureFormatter();

  server.tool(
    'pagewise_retrieve',
    'Retrieve the full parent passages that best match a query, with citations',
    {
      query: z.string().describe('Search query'),
      collection: z.string().optional().describe('Collection name'),
      topK: z.number().int().positive().optional().describe('Number of child chunks to retrieve'),
      contextBudget: z.number().int().positive().optional().describe('Context budget in estimated tokens'),
    },
    async ({ query, collection, topK, contextBudget }) => {
      const result = await deps.ask.retrieve({
        question: query,
        collectionName: collection ?? deps.defaultCollection,
        topK,
        contextBudget,
      });
      if (!result.ok) return errorResult(result.error);
      return textResult(formatter.formatRetrieval(result.value, 'text', 'full'));
    },
  );
}
