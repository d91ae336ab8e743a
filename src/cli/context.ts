/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific output injected.
 * Command handlers use this instead of calling createExecutionContext()
 * directly.
 */

import type { Command } from 'commander';
import type { ExecutionContext } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';

/** Options declared on the root program, shared by every command */
export interface GlobalOptions {
  cwd?: string;
  vendorDir?: string;
}

export interface CliContextOptions {
  cwd?: string;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export function getGlobalOptions(command: Command): GlobalOptions {
  return command.parent?.opts<GlobalOptions>() ?? {};
}

/**
 * Create an ExecutionContext with the CLI output adapter injected.
 */
export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  return createExecutionContext({
    cwd: options.cwd,
    output: getCliOutput(detectInteractive(options.interactive))
  });
}
