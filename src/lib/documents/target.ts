/**
 * Target Documents
 *
 * Resolves the served root and the document to render within it. Everything
 * here runs before any server or browser is started, so a bad path never
 * costs an acquisition.
 */

import { stat } from 'fs/promises';
import { isAbsolute, relative, resolve, sep } from 'path';
import {
  DocumentNotFoundError,
  DocumentOutsideServedRootError,
  InvalidServedRootError,
  systemErrorCode,
} from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface TargetDocument {
  absolutePath: string;
  /** Path below the served root, always `/`-separated */
  relativePath: string;
}

// ============================================================================
// Path checks
// ============================================================================

/**
 * True when `candidate` is `root` itself or lies below it.
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const rel = relative(resolve(root), resolve(candidate));
  if (rel === '') return true;
  return !escapesRoot(rel);
}

function escapesRoot(rel: string): boolean {
  return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

export async function resolveServedRoot(rootDir: string): Promise<string> {
  const absolute = resolve(rootDir);
  try {
    const stats = await stat(absolute);
    if (!stats.isDirectory()) {
      throw new InvalidServedRootError(absolute, 'is not a directory');
    }
  } catch (error) {
    if (error instanceof InvalidServedRootError) throw error;
    const reason = systemErrorCode(error) === 'ENOENT' ? 'does not exist' : 'is not readable';
    throw new InvalidServedRootError(absolute, reason, { cause: error });
  }
  return absolute;
}

/**
 * Resolve an absolute or root-relative document path against the served root.
 */
export async function resolveTargetDocument(rootDir: string, documentPath: string): Promise<TargetDocument> {
  const root = await resolveServedRoot(rootDir);
  const absolutePath = resolve(root, documentPath);

  const rel = relative(root, absolutePath);
  if (rel === '' || escapesRoot(rel)) {
    throw new DocumentOutsideServedRootError(absolutePath, root);
  }

  try {
    const stats = await stat(absolutePath);
    if (!stats.isFile()) {
      throw new DocumentNotFoundError(absolutePath);
    }
  } catch (error) {
    if (error instanceof DocumentNotFoundError) throw error;
    throw new DocumentNotFoundError(absolutePath, { cause: error });
  }

  return {
    absolutePath,
    relativePath: rel.split(sep).join('/'),
  };
}

/**
 * Server URL for a root-relative path, each segment percent-encoded.
 */
export function toDocumentUrl(baseUrl: string, relativePath: string): string {
  const encoded = relativePath
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => encodeURIComponent(segment))
    .join('/');
  return `${baseUrl.replace(/\/+$/, '')}/${encoded}`;
}
