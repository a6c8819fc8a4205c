import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import path from 'node:path';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './toolResult.js';

/**
 * MCP Tool: pagewise_ingest
 * 對應 CLI: pagewise ingest <file>
 * 相對路徑以 server 的工作根目錄解析。
 */
export function registerIngestTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'pagewise_ingest',
    'Ingest a PDF, text or Markdown document into a collection, replacing its previous contents',
    {
      filePath: z.string().describe('Path to the document (absolute or relative to the working root)'),
      collection: z.string().optional().describe('Collection name'),
    },
    async ({ filePath, collection }) => {
      const collectionName = collection ?? deps.defaultCollection;
      const result = await deps.ingest.execute(path.resolve(deps.repoRoot, filePath), collectionName);
      if (!result.ok) return errorResult(result.error);

      const stats = result.value;
      const { session } = stats;
      const lines = [
        `Ingested ${session.sourceName} into "${collectionName}" (generation ${stats.generation})`,
        `Pages: ${stats.pageCount}, OCR pages: ${session.ocrPages.join(', ') || 'none'}, skipped pages: ${session.gapPages.join(', ') || 'none'}`,
        `Language: ${session.language}`,
        `Parents: ${stats.parentsCreated}, children: ${stats.childrenCreated}`,
      ];
      if (stats.warnings.length > 0) {
        lines.push('', 'Warnings:', ...stats.warnings.map((w) => `- ${w}`));
      }
      return textResult(lines.join('\n'));
    },
  );
}
