import { resolve } from 'path';
import { Command } from 'commander';

import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { formatPathForDisplay } from '../utils/formatters.js';
import { createCliExecutionContext, getGlobalOptions } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { loadInstallerConfig } from '../core/config.js';
import { toNamespaceKey } from '../core/namespace-resolver.js';
import { upsertPackagePath } from '../core/package-map/incremental-updater.js';

async function setCommand(namespace: string, path: string, _options: unknown, command: Command): Promise<void> {
  const key = toNamespaceKey(namespace);
  if (key === '') {
    throw new ValidationError('Namespace must not be empty');
  }

  const globals = getGlobalOptions(command);
  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const config = await loadInstallerConfig(ctx.projectRoot, { vendorDir: globals.vendorDir });
  const absolutePath = resolve(ctx.sourceCwd, path);

  await upsertPackagePath(config.outputFile, namespace, absolutePath);
  resolveOutput(ctx).success(`${key} -> ${formatPathForDisplay(absolutePath, ctx.projectRoot)}`);
}

async function unsetCommand(namespace: string, _options: unknown, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const config = await loadInstallerConfig(ctx.projectRoot, { vendorDir: globals.vendorDir });

  const remaining = await upsertPackagePath(config.outputFile, namespace, null);
  resolveOutput(ctx).success(`Removed ${toNamespaceKey(namespace)} (${remaining.length} remaining)`);
}

export function setupSetCommand(program: Command): void {
  program
    .command('set')
    .argument('<namespace>', 'package namespace, e.g. Acme\\Blog or Acme/Blog')
    .argument('<path>', 'package directory')
    .description('Add or replace one entry in the package map')
    .action(withErrorHandling(setCommand));

  program
    .command('unset')
    .argument('<namespace>', 'package namespace to remove')
    .description('Remove one entry from the package map')
    .action(withErrorHandling(unsetCommand));
}
