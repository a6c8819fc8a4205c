import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { textResult } from './toolResult.js';

/**
 * MCP Tool: pagewise_collections
 * 對應 CLI: pagewise collections list|delete
 */
export function registerCollectionsTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'pagewise_collections',
    'List collections, or delete one when "delete" is given',
    {
      delete: z.string().optional().describe('Name of a collection to delete'),
    },
    async (args) => {
      if (args.delete !== undefined) {
        const deleted = await deps.index.dropCollection(args.delete);
        return textResult(deleted
          ? `Deleted collection "${args.delete}".`
          : `Collection "${args.delete}" does not exist.`);
      }

      const collections = deps.index.listCollections();
      if (collections.length === 0) return textResult('No collections.');

      return textResult(collections.map((c) => {
        const doc = c.session
          ? `${c.session.sourceName} (${c.session.parentCount} parents, ${c.session.childCount} children)`
          : 'no session';
        return `${c.name} [generation ${c.generation}]: ${doc}`;
      }).join('\n'));
    },
  );
}
