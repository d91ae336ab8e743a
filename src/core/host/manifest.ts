/**
 * Narrowing of host manifest JSON (composer.json, installed.json entries)
 * into the installer's types. Unknown or ill-typed fields are dropped
 * rather than trusted, except autoload prefixes (see toPathMap).
 */

import type { AutoloadDeclaration, AutoloadPathMap, PackageDescriptor, RootManifest } from '../../types/index.js';
import { PACKAGE_TYPES } from '../../constants/index.js';

const DEFAULT_VERSION = 'dev-main';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Every declared prefix is kept so entry counts match the manifest; a prefix
 * whose paths are not strings gets an empty list, which matches no path rule.
 */
function toPathMap(value: Record<string, unknown>): AutoloadPathMap {
  const map: AutoloadPathMap = {};
  for (const [prefix, paths] of Object.entries(value)) {
    map[prefix] = typeof paths === 'string' || isStringArray(paths) ? paths : [];
  }
  return map;
}

/**
 * Keep declaration order; loader types with a path map (psr-4, psr-0) and
 * those with a path list (classmap, files) are both retained.
 */
export function toAutoloadDeclaration(value: unknown): AutoloadDeclaration {
  if (!isRecord(value)) {
    return {};
  }

  const autoload: AutoloadDeclaration = {};
  for (const [loaderType, declaration] of Object.entries(value)) {
    if (isStringArray(declaration)) {
      autoload[loaderType] = declaration;
    } else if (isRecord(declaration)) {
      autoload[loaderType] = toPathMap(declaration);
    }
  }
  return autoload;
}

/**
 * Build a descriptor from a manifest object. Returns null when the manifest
 * carries no usable name and no fallback is given.
 */
export function toPackageDescriptor(raw: unknown, fallbackName?: string): PackageDescriptor | null {
  if (!isRecord(raw)) {
    return null;
  }

  const name = typeof raw.name === 'string' && raw.name !== '' ? raw.name : fallbackName;
  if (!name) {
    return null;
  }

  return {
    name,
    type: typeof raw.type === 'string' ? raw.type : PACKAGE_TYPES.LIBRARY,
    version: typeof raw.version === 'string' ? raw.version : DEFAULT_VERSION,
    autoload: toAutoloadDeclaration(raw.autoload)
  };
}

function toScripts(value: unknown): Record<string, string[]> {
  if (!isRecord(value)) {
    return {};
  }

  const scripts: Record<string, string[]> = {};
  for (const [event, listeners] of Object.entries(value)) {
    if (typeof listeners === 'string') {
      scripts[event] = [listeners];
    } else if (isStringArray(listeners)) {
      scripts[event] = listeners;
    }
  }
  return scripts;
}

export function toRootManifest(raw: unknown): RootManifest | null {
  if (!isRecord(raw)) {
    return null;
  }

  return {
    name: typeof raw.name === 'string' ? raw.name : undefined,
    type: typeof raw.type === 'string' ? raw.type : undefined,
    scripts: toScripts(raw.scripts),
    config: isRecord(raw.config) ? raw.config : {},
    extra: isRecord(raw.extra) ? raw.extra : {}
  };
}
