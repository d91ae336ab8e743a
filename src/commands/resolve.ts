import { basename, resolve } from 'path';
import { Command } from 'commander';

import { withErrorHandling, ResolutionError, ValidationError } from '../utils/errors.js';
import { formatPathForDisplay } from '../utils/formatters.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { createCliExecutionContext, getGlobalOptions } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { readPackageManifest } from '../core/host/composer-host.js';
import { matchPrimaryNamespace, toNamespaceKey } from '../core/namespace-resolver.js';

async function resolveCommand(dirArg: string | undefined, _options: unknown, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const packageDir = dirArg ? resolve(ctx.sourceCwd, dirArg) : ctx.projectRoot;

  const manifest = await readPackageManifest(packageDir, basename(packageDir));
  if (!manifest) {
    throw new ValidationError(
      `No readable ${FILE_PATTERNS.COMPOSER_JSON} in ${formatPathForDisplay(packageDir, ctx.sourceCwd)}`
    );
  }

  const match = matchPrimaryNamespace(manifest.autoload);
  if (!match) {
    throw new ResolutionError(manifest.name);
  }

  resolveOutput(ctx).success(`${manifest.name}: ${toNamespaceKey(match.namespace)} (rule: ${match.rule})`);
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .argument('[dir]', 'package directory (default: project root)')
    .description('Show the primary namespace derived from a package autoload section')
    .action(withErrorHandling(resolveCommand));
}
