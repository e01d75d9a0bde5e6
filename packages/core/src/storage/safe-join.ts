/**
 * Safe path composition
 *
 * Every storage path is built here. A part may never climb out of the base
 * with a `..` segment, whatever separator style it uses.
 */

import { InvalidPathError, PathTraversalError } from '../utils/errors.js';

const SEPARATORS = /[\\/]/;

/**
 * True when any segment of `part` is `..`
 */
export function hasParentSegment(part: string): boolean {
  return part.split(SEPARATORS).some(segment => segment === '..');
}

/**
 * Join `parts` under `base`.
 *
 * - trailing separators are stripped from `base`
 * - leading (and trailing) separators are stripped from each part, empty parts dropped
 * - a part containing a `..` segment raises PathTraversalError
 *
 * @param base Base directory or key prefix
 * @param parts Path parts, possibly user supplied
 * @returns `base` followed by the cleaned parts, joined with `/`
 */
export function safeJoinPaths(base: string, ...parts: string[]): string {
  if (base.includes('\0')) {
    throw new InvalidPathError('Path base contains a NUL byte');
  }
  const cleanBase = base.replace(/[\\/]+$/, '');

  const cleanParts: string[] = [];
  for (const part of parts) {
    if (part.includes('\0')) {
      throw new InvalidPathError('Path part contains a NUL byte');
    }
    if (hasParentSegment(part)) {
      throw new PathTraversalError(`Path part escapes its base: ${part}`);
    }
    const stripped = part.replace(/^[\\/]+/, '').replace(/[\\/]+$/, '');
    if (stripped.length > 0) {
      cleanParts.push(stripped);
    }
  }

  if (cleanParts.length === 0) {
    return cleanBase;
  }
  // An empty base yields a relative key; "/" keeps its root
  return base.length > 0 ? `${cleanBase}/${cleanParts.join('/')}` : cleanParts.join('/');
}
