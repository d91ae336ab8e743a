import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { HOST_HOOKS, PACKAGE_TYPES } from '../constants/index.js';
import { createCliExecutionContext, getGlobalOptions } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { readRootManifest } from '../core/host/composer-host.js';
import { checkUsage } from '../core/usage-check.js';

async function checkCommand(_options: unknown, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const out = resolveOutput(ctx);
  const manifest = await readRootManifest(ctx.projectRoot);

  if (checkUsage(manifest, ctx.usageCheck, out)) {
    process.exitCode = 1;
    return;
  }

  if (manifest?.type === PACKAGE_TYPES.PROJECT) {
    out.success(`${HOST_HOOKS.POST_AUTOLOAD_DUMP} runs "${HOST_HOOKS.DUMP_COMMAND}"`);
  } else {
    out.info(`Root package is not of type "${PACKAGE_TYPES.PROJECT}"; no hook required`);
  }
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Verify that the root manifest runs the dump hook')
    .action(withErrorHandling(checkCommand));
}
