/**
 * Namespace Resolver
 *
 * Derives the primary namespace of a plugin package from its psr-4 autoload
 * declaration. The namespace identifies the package in the generated
 * package map.
 */

import type { AutoloadDeclaration, AutoloadPaths, PackageDescriptor } from '../types/index.js';
import { AUTOLOAD_TYPES } from '../constants/index.js';
import { ResolutionError } from '../utils/errors.js';

export type NamespaceRuleName = 'single-entry' | 'src-directory' | 'package-root';

/** A psr-4 entry with its paths flattened to a list, in declaration order. */
type Psr4Entry = readonly [prefix: string, paths: readonly string[]];

interface NamespaceRule {
  name: NamespaceRuleName;
  match(entries: readonly Psr4Entry[]): string | null;
}

export interface NamespaceMatch {
  /** Namespace with leading and trailing `\` trimmed */
  namespace: string;
  rule: NamespaceRuleName;
}

const SRC_DIRECTORY_PATTERN = /^(\.\/)?src\/?$/;
const PACKAGE_ROOT_PATHS: ReadonlySet<string> = new Set(['', '.']);

/**
 * Ordered rules; the first one that yields a prefix wins.
 */
const NAMESPACE_RULES: readonly NamespaceRule[] = [
  {
    name: 'single-entry',
    match: (entries) => (entries.length === 1 ? entries[0][0] : null)
  },
  {
    name: 'src-directory',
    match: (entries) => {
      const entry = entries.find(([, paths]) => paths.some(path => SRC_DIRECTORY_PATTERN.test(path)));
      return entry ? entry[0] : null;
    }
  },
  {
    // Last match in declaration order wins: an entry for "." declared after
    // one for "" takes precedence, and vice versa.
    name: 'package-root',
    match: (entries) => {
      let found: string | null = null;
      for (const [prefix, paths] of entries) {
        if (paths.some(path => PACKAGE_ROOT_PATHS.has(path))) {
          found = prefix;
        }
      }
      return found;
    }
  }
];

function toPathList(paths: AutoloadPaths): string[] {
  return Array.isArray(paths) ? paths : [paths];
}

/**
 * Locate the psr-4 path map. Loader types declared before it are skipped;
 * only the first psr-4 declaration is considered.
 */
function findPsr4Entries(autoload: AutoloadDeclaration): Psr4Entry[] | null {
  for (const [loaderType, declaration] of Object.entries(autoload)) {
    if (loaderType !== AUTOLOAD_TYPES.PSR4) {
      continue;
    }
    if (Array.isArray(declaration)) {
      return null;
    }
    return Object.entries(declaration).map(([prefix, paths]): Psr4Entry => [prefix, toPathList(paths)]);
  }
  return null;
}

/**
 * Trim leading and trailing namespace separators: `\Acme\Plugin\` -> `Acme\Plugin`.
 */
export function trimNamespace(namespace: string): string {
  return namespace.replace(/^\\+|\\+$/g, '');
}

/**
 * Key form of a namespace as written in the package map: `Acme\Plugin\` -> `Acme/Plugin`.
 */
export function toNamespaceKey(namespace: string): string {
  return trimNamespace(namespace).replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
}

/**
 * Apply the namespace rules to an autoload declaration.
 * Returns null when no rule matches.
 */
export function matchPrimaryNamespace(autoload: AutoloadDeclaration): NamespaceMatch | null {
  const entries = findPsr4Entries(autoload);
  if (!entries || entries.length === 0) {
    return null;
  }

  for (const rule of NAMESPACE_RULES) {
    const prefix = rule.match(entries);
    if (prefix !== null) {
      return { namespace: trimNamespace(prefix), rule: rule.name };
    }
  }
  return null;
}

/**
 * Get the primary namespace of a plugin package.
 *
 * @throws ResolutionError when the autoload declaration yields none
 */
export function resolvePrimaryNamespace(pkg: Pick<PackageDescriptor, 'name' | 'autoload'>): string {
  const match = matchPrimaryNamespace(pkg.autoload);
  if (!match) {
    throw new ResolutionError(pkg.name);
  }
  return match.namespace;
}
