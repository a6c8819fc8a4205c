import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

/**
 * Stdio Transport
 *
 * 標準 MCP 傳輸方式，透過 stdin/stdout 與 client 通訊。
 * stdout 專供協定使用，log 一律寫 stderr。
 */
export async function startStdioTransport(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
