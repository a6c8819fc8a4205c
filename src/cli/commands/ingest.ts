import type { Command } from 'commander';
import path from 'node:path';
import { reportFailure, withServices } from '../services.js';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { OutputFormat } from '../formatters/ProgressiveDisclosureFormatter.js';

interface IngestOptions {
  repoRoot: string;
  collection?: string;
  format: OutputFormat;
}

/**
 * 註冊 ingest 指令
 *
 * 用法：
 *   pagewise ingest report.pdf [--collection pdf_collection] [--format json]
 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest <file>')
    .description('Extract, chunk and index a document into a collection (replaces the previous contents)')
    .option('--repo-root <path>', 'Working root directory', '.')
    .option('-c, --collection <name>', 'Collection name (default: store.defaultCollection)')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (file: string, opts: IngestOptions) => {
      const formatter = new ProgressiveDisclosureFormatter();

      await withServices(opts.repoRoot, async ({ config, ingest }) => {
        const collectionName = opts.collection ?? config.store.defaultCollection;
        const result = await ingest.execute(path.resolve(file), collectionName);
        if (!result.ok) {
          reportFailure(result.error);
          return;
        }

        const stats = result.value;
        for (const warning of stats.warnings) {
          process.stderr.write(`Warning: ${warning}\n`);
        }

        if (opts.format === 'json') {
          process.stdout.write(formatter.formatObject(stats, 'json') + '\n');
          return;
        }

        const { session } = stats;
        const lines = [
          `Ingested ${session.sourceName} into "${collectionName}" (generation ${stats.generation})`,
          `  Pages: ${stats.pageCount} (OCR: ${session.ocrPages.length}, skipped: ${session.gapPages.length})`,
          `  Language: ${session.language} (${session.languageConfidence.toFixed(2)})`,
          `  Parents: ${stats.parentsCreated}, children: ${stats.childrenCreated}`,
          `  Duration: ${stats.durationMs}ms`,
        ];
        process.stdout.write(lines.join('\n') + '\n');
      });
    });
}
