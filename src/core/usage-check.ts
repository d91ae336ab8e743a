/**
 * Usage hint for application projects.
 *
 * The package map is only kept current when the root manifest runs
 * `volcano-installer dump` after the host's autoload dump. An application
 * that lacks the hook gets a one-time warning; plugins under development
 * (any non-project root) are left alone.
 */

import type { RootManifest, UsageCheckState } from '../types/index.js';
import { FILE_PATTERNS, HOST_HOOKS, PACKAGE_TYPES } from '../constants/index.js';
import type { OutputPort } from './ports/output.js';
import { wordWrap } from '../utils/text.js';
import { logger } from '../utils/logger.js';

export const USAGE_WARNING_TITLE = 'Action required!';
export const USAGE_WARNING_TEXT =
  `Please update your application ${FILE_PATTERNS.COMPOSER_JSON} file to add ` +
  `"${HOST_HOOKS.DUMP_COMMAND}" to its ${HOST_HOOKS.POST_AUTOLOAD_DUMP} scripts.`;

const BOX_INDENT = '     ';
const BOX_WIDTH = 75;
const TEXT_WIDTH = 68;

export function createUsageCheckState(): UsageCheckState {
  return { checked: false };
}

/**
 * True when a post-autoload-dump listener runs the dump command, with or
 * without further options.
 */
export function hasDumpHook(manifest: RootManifest): boolean {
  const listeners = manifest.scripts[HOST_HOOKS.POST_AUTOLOAD_DUMP] ?? [];
  return listeners.some(listener => {
    const command = listener.trim().replace(/\s+/g, ' ');
    return command === HOST_HOOKS.DUMP_COMMAND || command.startsWith(`${HOST_HOOKS.DUMP_COMMAND} `);
  });
}

/**
 * Lay out a warning as a padded block: two blank lines, the boxed title
 * and text, two blank lines.
 */
export function formatUsageWarning(title: string, text: string): string[] {
  const box = (content: string): string => `${BOX_INDENT}${content.padEnd(BOX_WIDTH)}`;

  return [
    '',
    '',
    box(''),
    box(title),
    box(''),
    ...wordWrap(text, TEXT_WIDTH).map(box),
    box(''),
    '',
    ''
  ];
}

/**
 * Warn once per state when an application project does not run the dump hook.
 *
 * @returns true when the warning was emitted
 */
export function checkUsage(manifest: RootManifest | null, state: UsageCheckState, output: OutputPort): boolean {
  if (state.checked) {
    return false;
  }
  state.checked = true;

  if (!manifest || manifest.type !== PACKAGE_TYPES.PROJECT) {
    logger.debug('Root package is not a project; skipping usage check');
    return false;
  }

  if (hasDumpHook(manifest)) {
    return false;
  }

  output.alert(formatUsageWarning(USAGE_WARNING_TITLE, USAGE_WARNING_TEXT));
  return true;
}
