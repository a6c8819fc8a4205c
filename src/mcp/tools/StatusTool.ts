import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { errorResult, textResult } from './toolResult.js';

/**
 * MCP Tool: pagewise_status
 * 對應 CLI: pagewise health
 * collection metadata、筆數與一致性檢查。
 */
export function registerStatusTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'pagewise_status',
    'Show collection metadata, record counts and consistency status',
    {
      collection: z.string().optional().describe('Collection name'),
    },
    async ({ collection }) => {
      const collectionName = collection ?? deps.defaultCollection;
      const result = await deps.health.check(collectionName);
      if (!result.ok) return errorResult(result.error);

      const report = result.value;
      const described = await deps.index.describe(collectionName);
      const session = described?.info.session;

      const lines: string[] = [
        `# Collection ${collectionName}`,
        '',
        `Generation: ${report.generation}`,
        `Parents: ${report.counts.parents}`,
        `Child records: ${report.counts.records}`,
        `Vectors: ${report.counts.vectors}`,
        `Healthy: ${report.healthy ? 'yes' : 'no'}`,
      ];

      if (session) {
        lines.push(
          '',
          '## Document',
          `Source: ${session.sourceName}`,
          `Language: ${session.language}`,
          `OCR pages: ${session.ocrPages.join(', ') || 'none'}`,
          `Skipped pages: ${session.gapPages.join(', ') || 'none'}`,
          `Embedding model: ${session.embeddingModel}`,
          `Ingested at: ${new Date(session.ingestedAt).toISOString()}`,
        );
      }

      if (!report.healthy) {
        lines.push(
          '',
          '## Issues',
          `Orphan child records: ${report.orphanRecordIds.length}`,
          `Dangling vectors: ${report.danglingVectorRowIds.length}`,
        );
      }

      return textResult(lines.join('\n'));
    },
  );
}
