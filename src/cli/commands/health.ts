import type { Command } from 'commander';
import { reportFailure, withServices } from '../services.js';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { OutputFormat } from '../formatters/ProgressiveDisclosureFormatter.js';

interface HealthOptions {
  repoRoot: string;
  collection?: string;
  fix: boolean;
  format: OutputFormat;
}

/** 註冊 health 指令 */
export function registerHealthCommand(program: Command): void {
  program
    .command('health')
    .description('Check collection health and consistency')
    .option('--repo-root <path>', 'Working root directory', '.')
    .option('-c, --collection <name>', 'Collection name (default: store.defaultCollection)')
    .option('--fix', 'Attempt to fix issues', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: HealthOptions) => {
      const formatter = new ProgressiveDisclosureFormatter();

      await withServices(opts.repoRoot, async ({ config, health }) => {
        const result = await health.check(
          opts.collection ?? config.store.defaultCollection,
          { fix: opts.fix },
        );
        if (!result.ok) {
          reportFailure(result.error);
          return;
        }

        const report = result.value;
        process.stdout.write(formatter.formatObject(report, opts.format) + '\n');
        process.exitCode = report.healthy || report.fixActions.length > 0 ? 0 : 1;
      });
    });
}
