/**
 * Package Map File
 *
 * Renders and parses the generated `volcano-packages.php` file:
 *
 *   <?php
 *
 *   $baseDir = dirname(dirname(__FILE__));
 *
 *   return array(
 *       'packages' => array(
 *           'Acme/Plugin' => $baseDir . '/vendor/acme/plugin/',
 *       ),
 *   );
 *
 * Paths under the project root are written relative to `$baseDir` so the
 * file keeps working when the project directory moves.
 */

import { dirname, join } from 'path';
import type { PackageMapEntry } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { MalformedPackageMapError } from '../../utils/errors.js';
import { readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { normalizePackagePath, relativeToRoot } from '../../utils/paths.js';
import { logger } from '../../utils/logger.js';

const HEADER_LINES = [
  '<?php',
  '',
  '$baseDir = dirname(dirname(__FILE__));',
  '',
  'return array('
];

const ENTRY_INDENT = '        ';

const PHP_OPEN_TAG = /^<\?php\s*$/;
const BASE_DIR_STATEMENT = /^\s*\$baseDir\s*=\s*dirname\(\s*dirname\(\s*__FILE__\s*\)\s*\)\s*;\s*$/;
const RETURN_ARRAY = /^\s*return\s+array\(\s*$/;
const RETURN_CLOSE = /^\s*\)\s*;\s*$/;
const PACKAGES_EMPTY = /^\s*'packages'\s*=>\s*array\(\s*\)\s*,?\s*$/;
const PACKAGES_OPEN = /^\s*'packages'\s*=>\s*array\(\s*$/;
const BLOCK_CLOSE = /^\s*\)\s*,?\s*$/;
const ENTRY_LINE = /^\s*'((?:[^'\\]|\\.)*)'\s*=>\s*(?:(\$baseDir)\s*\.\s*)?'((?:[^'\\]|\\.)*)'\s*,?\s*$/;

/**
 * Path of the package map inside a vendor directory
 */
export function getPackageMapPath(vendorDir: string, fileName: string = FILE_PATTERNS.PACKAGE_MAP): string {
  return join(vendorDir, fileName);
}

/**
 * Directory `$baseDir` evaluates to: two levels above the map file
 * (the project root, for a map inside the vendor directory).
 */
export function getPackageMapRoot(packageMapPath: string): string {
  return dirname(dirname(packageMapPath));
}

function escapePhpString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

function unescapePhpString(value: string): string {
  return value.replace(/\\(['\\])/g, '$1');
}

function withTrailingSlash(path: string): string {
  return path.endsWith('/') ? path : `${path}/`;
}

/**
 * Ordinal comparison, independent of locale.
 */
export function compareNamespaces(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortPackageMapEntries(entries: readonly PackageMapEntry[]): PackageMapEntry[] {
  return [...entries].sort((a, b) => compareNamespaces(a.namespace, b.namespace));
}

function formatPathExpression(path: string, rootDir: string): string {
  const normalized = normalizePackagePath(path);
  const relative = relativeToRoot(normalized, rootDir);

  if (relative !== null) {
    return `$baseDir . '${escapePhpString(withTrailingSlash(relative))}'`;
  }
  return `'${escapePhpString(withTrailingSlash(normalized))}'`;
}

/**
 * Render the full file contents. Entries are sorted by namespace so that
 * the same input always produces the same bytes.
 */
export function renderPackageMap(entries: readonly PackageMapEntry[], rootDir: string): string {
  const lines = [...HEADER_LINES];

  if (entries.length === 0) {
    lines.push("    'packages' => array(),");
  } else {
    lines.push("    'packages' => array(");
    for (const entry of sortPackageMapEntries(entries)) {
      lines.push(`${ENTRY_INDENT}'${escapePhpString(entry.namespace)}' => ${formatPathExpression(entry.path, rootDir)},`);
    }
    lines.push('    ),');
  }

  lines.push(');', '');
  return lines.join('\n');
}

/** Where the parser is within the generated layout */
type ParseState = 'open-tag' | 'header' | 'packages' | 'entries' | 'closing' | 'done';

const END_OF_FILE_REASONS: Record<Exclude<ParseState, 'done'>, string> = {
  'open-tag': 'missing <?php tag',
  header: 'missing return array(',
  packages: "missing 'packages' array",
  entries: "unterminated 'packages' array",
  closing: 'unterminated return array('
};

/**
 * Parse a package map back into entries (file order, later duplicates win).
 * `$baseDir` values are resolved against `rootDir`.
 *
 * The whole file must be in the generated layout: only the `$baseDir`
 * statement may precede `return array(`, and only `);` may follow the
 * packages block. Blank lines are allowed anywhere.
 *
 * @throws MalformedPackageMapError when the contents are not in the generated shape
 */
export function parsePackageMap(
  contents: string,
  rootDir: string,
  source: string = FILE_PATTERNS.PACKAGE_MAP
): PackageMapEntry[] {
  const lines = contents.split(/\r?\n/);
  const root = normalizePackagePath(rootDir);
  const entries = new Map<string, string>();
  const unexpected = (index: number) => new MalformedPackageMapError(source, `unexpected content on line ${index + 1}`);

  let state: ParseState = 'open-tag';

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (line.trim() === '') {
      continue;
    }

    switch (state) {
      case 'open-tag':
        if (!PHP_OPEN_TAG.test(line.trim())) {
          throw new MalformedPackageMapError(source, END_OF_FILE_REASONS['open-tag']);
        }
        state = 'header';
        break;

      case 'header':
        if (RETURN_ARRAY.test(line)) {
          state = 'packages';
        } else if (!BASE_DIR_STATEMENT.test(line)) {
          throw unexpected(index);
        }
        break;

      case 'packages':
        if (PACKAGES_EMPTY.test(line)) {
          state = 'closing';
        } else if (PACKAGES_OPEN.test(line)) {
          state = 'entries';
        } else {
          throw new MalformedPackageMapError(source, END_OF_FILE_REASONS.packages);
        }
        break;

      case 'entries': {
        if (BLOCK_CLOSE.test(line)) {
          state = 'closing';
          break;
        }

        const match = ENTRY_LINE.exec(line);
        if (!match) {
          throw unexpected(index);
        }

        const [, rawNamespace, baseDirRef, rawPath] = match;
        const path = unescapePhpString(rawPath);
        const absolute = baseDirRef ? `${root === '/' ? '' : root}${path.startsWith('/') ? path : `/${path}`}` : path;
        entries.set(unescapePhpString(rawNamespace), normalizePackagePath(absolute));
        break;
      }

      case 'closing':
        if (!RETURN_CLOSE.test(line)) {
          throw unexpected(index);
        }
        state = 'done';
        break;

      case 'done':
        throw unexpected(index);
    }
  }

  if (state !== 'done') {
    throw new MalformedPackageMapError(source, END_OF_FILE_REASONS[state]);
  }
  return Array.from(entries, ([namespace, path]) => ({ namespace, path }));
}

/**
 * Read and parse an existing package map file.
 */
export async function readPackageMap(packageMapPath: string): Promise<PackageMapEntry[]> {
  const contents = await readTextFile(packageMapPath);
  return parsePackageMap(contents, getPackageMapRoot(packageMapPath), packageMapPath);
}

/**
 * Replace the package map with the given entries.
 */
export async function writePackageMap(packageMapPath: string, entries: readonly PackageMapEntry[]): Promise<void> {
  const contents = renderPackageMap(entries, getPackageMapRoot(packageMapPath));
  await writeTextFileAtomic(packageMapPath, contents);
  logger.debug(`Package map written: ${packageMapPath}`, { entries: entries.length });
}
