import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { formatPackageCount, formatPathForDisplay } from '../utils/formatters.js';
import { createCliExecutionContext, getGlobalOptions } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { runDumpPipeline } from '../core/dump/dump-pipeline.js';

interface DumpOptions {
  packagesDir?: string;
}

async function dumpCommand(options: DumpOptions, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const out = resolveOutput(ctx);

  const result = await runDumpPipeline(ctx, {
    vendorDir: globals.vendorDir,
    packagesDir: options.packagesDir
  });

  for (const plugin of result.plugins) {
    out.step(`${plugin.namespace} -> ${formatPathForDisplay(plugin.path, ctx.projectRoot)} (${plugin.source})`);
  }
  out.success(
    `Generated ${formatPathForDisplay(result.outputFile, ctx.projectRoot)} with ${formatPackageCount(result.entries.length)}`
  );
}

export function setupDumpCommand(program: Command): void {
  program
    .command('dump')
    .description('Regenerate the package map (run from the post-autoload-dump hook)')
    .option('--packages-dir <dir>', 'local packages directory (default: packages/ next to the vendor directory)')
    .action(withErrorHandling(dumpCommand));
}
