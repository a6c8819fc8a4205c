import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { IngestUseCase } from '../application/IngestUseCase.js';
import type { AskUseCase } from '../application/AskUseCase.js';
import type { VectorIndex } from '../application/VectorIndex.js';
import type { CollectionHealthUseCase } from '../application/CollectionHealthUseCase.js';
import { registerIngestTool } from './tools/IngestTool.js';
import { registerAskTool } from './tools/AskTool.js';
import { registerRetrieveTool } from './tools/RetrieveTool.js';
import { registerStatusTool } from './tools/StatusTool.js';
import { registerCollectionsTool } from './tools/CollectionsTool.js';

/**
 * MCP Server Factory
 *
 * 設計意圖：建立 MCP server 實例並註冊所有工具。
 * 工具與 CLI 指令對應，提供一致的匯入、問答、檢索與狀態查詢功能。
 * 透過 stdio 或 HTTP transport 與 LLM client 通訊。
 */

export interface McpDependencies {
  ingest: IngestUseCase;
  ask: AskUseCase;
  index: VectorIndex;
  health: CollectionHealthUseCase;
  /** 工具未指定 collection 時使用 */
  defaultCollection: string;
  repoRoot: string;
  version: string;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'pagewise', version: deps.version },
    { instructions: buildInstructions(deps.repoRoot, deps.defaultCollection) },
  );

  registerIngestTool(server, deps);
  registerAskTool(server, deps);
  registerRetrieveTool(server, deps);
  registerStatusTool(server, deps);
  registerCollectionsTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(repoRoot: string, defaultCollection: string): string {
  return [
    'pagewise: question answering over a single ingested document with page citations.',
    '',
    'Available tools:',
    '- pagewise_ingest: Extract, chunk and index a PDF, text or Markdown file into a collection',
    '- pagewise_ask: Answer a question from the collection, citing parent chunks and pages',
    '- pagewise_retrieve: Return the parent contexts a question would be answered from (no LLM call)',
    '- pagewise_status: Collection metadata, counts and consistency report',
    '- pagewise_collections: List collections or delete one',
    '',
    'Recommended workflow:',
    '1. pagewise_ingest with the document path',
    '2. pagewise_ask for each question; cite the returned pages',
    '3. pagewise_retrieve when you want to read the passages yourself',
    '',
    'Score interpretation (cosine similarity of the best matching child chunk):',
    '- 0.7-1.0: Highly relevant',
    '- 0.5-0.7: Related',
    '- below the configured minimum: dropped',
    '',
    `Default collection: ${defaultCollection}`,
    `Working root: ${repoRoot}`,
  ].join('\n');
}
