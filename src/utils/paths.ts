/**
 * Path normalization for the generated package map.
 *
 * The map is read on every host OS, so paths are always written with
 * forward slashes regardless of where they were produced.
 */

/**
 * Convert backslashes to forward slashes and collapse repeated separators.
 */
export function toPosixPath(path: string): string {
  return path.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
}

/**
 * Normalize a package install path: forward slashes, no trailing separator.
 * The filesystem root stays "/".
 */
export function normalizePackagePath(path: string): string {
  const posix = toPosixPath(path);
  if (posix.length > 1 && posix.endsWith('/')) {
    return posix.replace(/\/+$/, '') || '/';
  }
  return posix;
}

/**
 * Express `path` relative to `root`, keeping the leading separator
 * ("/vendor/acme/plugin"). Returns null when `path` is not `root` itself
 * or below it. Both inputs are normalized first.
 */
export function relativeToRoot(path: string, root: string): string | null {
  const normalizedPath = normalizePackagePath(path);
  const normalizedRoot = normalizePackagePath(root);

  if (normalizedPath === normalizedRoot) {
    return '';
  }
  if (normalizedRoot === '/') {
    return normalizedPath.startsWith('/') ? normalizedPath : null;
  }
  if (normalizedPath.startsWith(`${normalizedRoot}/`)) {
    return normalizedPath.slice(normalizedRoot.length);
  }
  return null;
}
