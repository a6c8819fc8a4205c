import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { reportFailure, withServices } from '../services.js';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { OutputFormat, DetailLevel } from '../formatters/ProgressiveDisclosureFormatter.js';

interface QueryOptions {
  repoRoot: string;
  collection?: string;
  topK?: number;
  budget?: number;
  level: DetailLevel;
  format: OutputFormat;
}

function queryOptions(cmd: Command): Command {
  return cmd
    .option('--repo-root <path>', 'Working root directory', '.')
    .option('-c, --collection <name>', 'Collection name (default: store.defaultCollection)')
    .option('--top-k <number>', 'Number of child chunks to retrieve', parsePositiveInt)
    .option('--budget <tokens>', 'Context budget in estimated tokens', parsePositiveInt)
    .option('--level <level>', 'Detail level: brief, normal, full', 'normal')
    .option('--format <format>', 'Output format: json or text', 'text');
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

/** 註冊 ask 與 retrieve 指令 */
export function registerAskCommand(program: Command): void {
  queryOptions(
    program
      .command('ask <question>')
      .description('Answer a question from an ingested document, with page citations'),
  ).action(async (question: string, opts: QueryOptions) => {
    const formatter = new ProgressiveDisclosureFormatter();

    await withServices(opts.repoRoot, async ({ config, ask }) => {
      const result = await ask.ask({
        question,
        collectionName: opts.collection ?? config.store.defaultCollection,
        topK: opts.topK,
        contextBudget: opts.budget,
      });
      if (!result.ok) {
        reportFailure(result.error);
        return;
      }
      process.stdout.write(formatter.formatAnswer(result.value, opts.format, opts.level) + '\n');
    });
  });

  // retrieve：只做檢索擴展，不呼叫 LLM
  queryOptions(
    program
      .command('retrieve <query>')
      .description('Show the parent contexts a question would be answered from'),
  ).action(async (query: string, opts: QueryOptions) => {
    const formatter = new ProgressiveDisclosureFormatter();

    await withServices(opts.repoRoot, async ({ config, ask }) => {
      const result = await ask.retrieve({
        question: query,
        collectionName: opts.collection ?? config.store.defaultCollection,
        topK: opts.topK,
        contextBudget: opts.budget,
      });
      if (!result.ok) {
        reportFailure(result.error);
        return;
      }
      process.stdout.write(formatter.formatRetrieval(result.value, opts.format, opts.level) + '\n');
    });
  });
}
