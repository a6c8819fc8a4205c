import type { Command } from 'commander';
import { withServices } from '../services.js';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { OutputFormat } from '../formatters/ProgressiveDisclosureFormatter.js';

interface CollectionsOptions {
  repoRoot: string;
  format: OutputFormat;
}

/** 註冊 collections 指令群組 */
export function registerCollectionsCommand(program: Command): void {
  const collectionsCmd = program
    .command('collections')
    .description('Manage indexed collections');

  collectionsCmd
    .command('list')
    .description('List collections and the document each one holds')
    .option('--repo-root <path>', 'Working root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: CollectionsOptions) => {
      const formatter = new ProgressiveDisclosureFormatter();

      await withServices(opts.repoRoot, async ({ index }) => {
        const collections = index.listCollections();
        if (opts.format === 'json') {
          process.stdout.write(formatter.formatObject(collections, 'json') + '\n');
          return;
        }
        if (collections.length === 0) {
          process.stdout.write('No collections.\n');
          return;
        }
        const lines = collections.map((c) => {
          const doc = c.session
            ? `${c.session.sourceName}, ${c.session.parentCount} parents / ${c.session.childCount} children, ${c.session.language}`
            : 'no session';
          return `${c.name} (generation ${c.generation}): ${doc}`;
        });
        process.stdout.write(lines.join('\n') + '\n');
      });
    });

  collectionsCmd
    .command('delete <name>')
    .description('Delete a collection and all of its chunks')
    .option('--repo-root <path>', 'Working root directory', '.')
    .action(async (name: string, opts: CollectionsOptions) => {
      await withServices(opts.repoRoot, async ({ index }) => {
        const deleted = await index.dropCollection(name);
        if (!deleted) {
          process.stderr.write(`Collection "${name}" does not exist.\n`);
          process.exitCode = 1;
          return;
        }
        process.stdout.write(`Deleted collection "${name}".\n`);
      });
    });
}
