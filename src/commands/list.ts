import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { exists } from '../utils/fs.js';
import { formatPackageMapTable, formatPathForDisplay } from '../utils/formatters.js';
import { createCliExecutionContext, getGlobalOptions } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { loadInstallerConfig } from '../core/config.js';
import { readPackageMap } from '../core/package-map/package-map-file.js';

interface ListOptions {
  json?: boolean;
}

async function listCommand(options: ListOptions, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const out = resolveOutput(ctx);
  const config = await loadInstallerConfig(ctx.projectRoot, { vendorDir: globals.vendorDir });

  if (!(await exists(config.outputFile))) {
    out.info(`No package map at ${formatPathForDisplay(config.outputFile, ctx.projectRoot)}. Run \`volcano-installer dump\`.`);
    return;
  }

  const entries = await readPackageMap(config.outputFile);

  if (options.json) {
    const packages = Object.fromEntries(entries.map(entry => [entry.namespace, entry.path]));
    console.log(JSON.stringify({ packages }, null, 2));
    return;
  }

  out.message(formatPackageMapTable(entries, ctx.projectRoot).join('\n'));
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('Show the entries of the package map')
    .option('--json', 'print the entries as JSON')
    .action(withErrorHandling(listCommand));
}
