import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { startHttpTransport } from '../../mcp/transports/HttpTransport.js';
import { setDefaultLogLevel } from '../../shared/Logger.js';
import { createServices } from '../services.js';
import { PACKAGE_VERSION } from '../version.js';

interface McpOptions {
  repoRoot: string;
  http?: boolean;
  port: number;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError('must be a TCP port number');
  }
  return port;
}

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   pagewise mcp [--repo-root .] [--http] [--port 8181]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start MCP server for LLM tool integration')
    .option('--repo-root <path>', 'Working root directory', '.')
    .option('--http', 'Use HTTP transport instead of stdio')
    .option('--port <number>', 'HTTP server port (with --http)', parsePort, 8181)
    .action(async (opts: McpOptions) => {
      const repoRoot = path.resolve(opts.repoRoot);
      const config = loadConfig(repoRoot);
      setDefaultLogLevel(config.logging.level);
      const services = createServices(repoRoot, config);

      const server = createMcpServer({
        ingest: services.ingest,
        ask: services.ask,
        index: services.index,
        health: services.health,
        defaultCollection: config.store.defaultCollection,
        repoRoot,
        version: PACKAGE_VERSION,
      });

      if (opts.http) {
        const httpServer = await startHttpTransport(server, opts.port);

        // 優雅關閉
        const shutdown = () => {
          httpServer.close();
          services.close();
          process.exit(0);
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      } else {
        // stdio 模式：持續執行直到 stdin 關閉
        await startStdioTransport(server);

        process.on('SIGINT', () => {
          services.close();
          process.exit(0);
        });
      }
    });
}
