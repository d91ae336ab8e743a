/**
 * Execution Context Types
 *
 * Everything a command needs to run against one project: where the project
 * lives, where output goes, and the per-session usage-check flag.
 */

import type { OutputPort } from '../core/ports/output.js';

/**
 * Tracks whether the usage hint has already been considered in this session.
 * Owned by the context so that repeated installer construction does not
 * repeat the warning.
 */
export interface UsageCheckState {
  checked: boolean;
}

export interface ExecutionContext {
  /**
   * Absolute path to the original working directory.
   * Used for resolving input arguments (e.g. `resolve ./packages/blog`).
   */
  sourceCwd: string;

  /**
   * Absolute path to the project root holding the root manifest.
   * - For normal commands: current working directory
   * - For --cwd commands: specified directory
   */
  projectRoot: string;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  usageCheck: UsageCheckState;
}

export interface ExecutionOptions {
  cwd?: string;
  output?: OutputPort;
}
