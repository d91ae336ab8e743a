/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementations: @clack/prompts for interactive
 * terminals, plain console output for CI and piped sessions.
 */

import { log } from '@clack/prompts';
import type { OutputPort } from '../core/ports/output.js';

const ALERT_STYLE = '\x1b[37;41m';
const RESET = '\x1b[0m';

/**
 * White on red for every non-empty line; spacer lines stay plain.
 */
export function highlightAlertLines(lines: readonly string[]): string[] {
  return lines.map(line => (line === '' ? line : `${ALERT_STYLE}${line}${RESET}`));
}

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    alert(lines: readonly string[]): void {
      log.warn(highlightAlertLines(lines).join('\n'));
    }
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 * Host hooks run here: Composer pipes script output, so nothing is styled.
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    step(message: string): void {
      console.log(message);
    },

    message(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(`✓ ${message}`);
    },

    alert(lines: readonly string[]): void {
      console.error(lines.join('\n'));
    }
  };
}
