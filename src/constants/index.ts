/**
 * Shared constants for volcano-installer.
 * Single source of truth for file names, the handled package type and the
 * host hook wiring.
 */

export const FILE_PATTERNS = {
  /** Host manifest, both at the project root and inside each package */
  COMPOSER_JSON: 'composer.json',
  /** Generated package map, written inside the vendor directory */
  PACKAGE_MAP: 'volcano-packages.php',
  /** Host's installed repository, relative to the vendor directory */
  INSTALLED_JSON: 'composer/installed.json'
} as const;

export const DEFAULT_DIRS = {
  VENDOR: 'vendor',
  /** Local packages directory, sibling of the vendor directory */
  PACKAGES: 'packages'
} as const;

export const PACKAGE_TYPES = {
  /** Packages of this type are registered in the package map */
  PLUGIN: 'volcano-package',
  /** Root package type that is expected to wire the dump hook */
  PROJECT: 'project',
  LIBRARY: 'library'
} as const;

export const HOST_HOOKS = {
  POST_AUTOLOAD_DUMP: 'post-autoload-dump',
  /** Script the root manifest should list under post-autoload-dump */
  DUMP_COMMAND: 'volcano-installer dump'
} as const;

/** Key of the installer settings under the root manifest's `extra` section */
export const EXTRA_CONFIG_KEY = 'volcano-installer';

export const ENV_VARS = {
  VERBOSE: 'VOLCANO_INSTALLER_VERBOSE',
  VENDOR_DIR: 'COMPOSER_VENDOR_DIR'
} as const;

export const AUTOLOAD_TYPES = {
  PSR4: 'psr-4'
} as const;
