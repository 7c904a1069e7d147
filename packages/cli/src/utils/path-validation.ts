/**
 * @fileoverview Path checks for the files the CLI reads and writes.
 *
 * Input and output paths inside credential or system directories are
 * refused. Input files that look like secrets, and relative paths that
 * climb out of the working directory, produce a warning instead.
 *
 * @module @rowcast/cli/utils/path-validation
 */

import path from 'node:path';

/**
 * Whether the path is read from or written to.
 */
export type PathPurpose = 'input' | 'output';

/**
 * File names that usually hold credentials.
 */
const SENSITIVE_FILE_PATTERNS = [
  /^\.env(\..+)?$/i,
  /^credentials\.json$/i,
  /^secrets\.json$/i,
  /\.pem$/i,
  /\.key$/i,
  /^id_(rsa|ed25519)$/i,
  /^\.(npmrc|pypirc|netrc)$/i,
];

/**
 * Directory fragments that are never read or written, in forward-slash form.
 */
const RESTRICTED_FRAGMENTS = [
  '/.ssh/',
  '/.gnupg/',
  '/.aws/',
  '/.docker/',
  '/etc/passwd',
  '/etc/shadow',
  '/etc/sudoers',
];

/**
 * Result of a path check.
 */
export interface PathCheck {
  /** Absolute path the CLI will use */
  resolvedPath: string;
  /** Advisory message to log before using the path */
  warning?: string;
  /** Reason the path is refused */
  error?: string;
}

/**
 * Check a user-supplied path before reading or writing it.
 *
 * @param filePath - Path as given on the command line or in configuration
 * @param purpose - Whether the file is read or written
 * @param basePath - Directory relative paths resolve against (defaults to cwd)
 *
 * @example
 * ```typescript
 * checkPath('../records.json', 'input');
 * // { resolvedPath: '/home/ann/records.json', warning: 'Warning: "../records.json" resolves outside ...' }
 * ```
 */
export function checkPath(
  filePath: string,
  purpose: PathPurpose,
  basePath: string = process.cwd()
): PathCheck {
  const base = path.resolve(basePath);
  const resolvedPath = path.resolve(base, filePath);
  const comparable = resolvedPath.replace(/\\/g, '/').toLowerCase();

  for (const fragment of RESTRICTED_FRAGMENTS) {
    if (comparable.includes(fragment)) {
      return {
        resolvedPath,
        error: `Access denied: "${filePath}" is in a restricted system directory`,
      };
    }
  }

  if (purpose === 'input') {
    const fileName = path.basename(resolvedPath);
    if (SENSITIVE_FILE_PATTERNS.some((pattern) => pattern.test(fileName))) {
      return {
        resolvedPath,
        warning: `Warning: "${filePath}" may contain sensitive data (credentials, keys)`,
      };
    }
  }

  const relative = path.relative(base, resolvedPath);
  if (!path.isAbsolute(filePath) && (relative.startsWith('..') || path.isAbsolute(relative))) {
    return {
      resolvedPath,
      warning: `Warning: "${filePath}" resolves outside the current directory (${resolvedPath})`,
    };
  }

  return { resolvedPath };
}

/**
 * Check a path and throw if it is refused.
 *
 * @throws Error if the path is in a restricted directory
 * @returns The resolved path and optional warning
 */
export function checkPathOrThrow(
  filePath: string,
  purpose: PathPurpose,
  basePath: string = process.cwd()
): { resolvedPath: string; warning?: string } {
  const result = checkPath(filePath, purpose, basePath);

  if (result.error !== undefined) {
    throw new Error(result.error);
  }

  return result.warning === undefined
    ? { resolvedPath: result.resolvedPath }
    : { resolvedPath: result.resolvedPath, warning: result.warning };
}
