/**
 * Execution Context Module
 *
 * Creates and validates the ExecutionContext for commands:
 * - where input arguments are resolved (sourceCwd)
 * - which project is operated on (projectRoot)
 */

import { resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { isDirectory } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { createUsageCheckState } from './usage-check.js';

/**
 * Create an ExecutionContext from command options.
 *
 * projectRoot is --cwd when given (resolved against process.cwd()),
 * otherwise process.cwd() itself.
 *
 * @throws ValidationError if the project root is not a directory
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = process.cwd();
  const projectRoot = options.cwd ? resolve(sourceCwd, options.cwd) : sourceCwd;

  if (!(await isDirectory(projectRoot))) {
    throw new ValidationError(`'${options.cwd ?? projectRoot}' is not a directory`, { projectRoot });
  }

  const context: ExecutionContext = {
    sourceCwd,
    projectRoot,
    output: options.output,
    usageCheck: createUsageCheckState()
  };

  logger.debug('Execution context created', { sourceCwd, projectRoot });
  return context;
}
