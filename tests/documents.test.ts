/**
 * Target Document Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import {
  isWithinRoot,
  resolveServedRoot,
  resolveTargetDocument,
  toDocumentUrl,
} from '../src/lib/documents/index.js';
import {
  DocumentNotFoundError,
  DocumentOutsideServedRootError,
  InvalidServedRootError,
} from '../src/lib/errors/index.js';

const TEST_ROOT = './test-documents-root';

describe('isWithinRoot', () => {
  it('should accept the root and paths below it', () => {
    expect(isWithinRoot('/srv/site', '/srv/site')).toBe(true);
    expect(isWithinRoot('/srv/site', '/srv/site/reports/a.html')).toBe(true);
    expect(isWithinRoot('/srv/site', '/srv/site/..notes.html')).toBe(true);
  });

  it('should reject siblings and parents', () => {
    expect(isWithinRoot('/srv/site', '/srv/site-other/a.html')).toBe(false);
    expect(isWithinRoot('/srv/site', '/srv')).toBe(false);
    expect(isWithinRoot('/srv/site', '/srv/site/../secret.txt')).toBe(false);
  });
});

describe('resolveTargetDocument', () => {
  beforeAll(async () => {
    await mkdir(join(TEST_ROOT, 'site', 'reports', 'q3'), { recursive: true });
    await writeFile(join(TEST_ROOT, 'site', 'reports', 'q3', 'report_dashboard.html'), '<html></html>');
    await writeFile(join(TEST_ROOT, 'outside.html'), '<html></html>');
  });

  afterAll(async () => {
    await rm(TEST_ROOT, { recursive: true, force: true });
  });

  const root = join(TEST_ROOT, 'site');

  it('should resolve a root-relative path', async () => {
    const target = await resolveTargetDocument(root, 'reports/q3/report_dashboard.html');

    expect(target).toEqual({
      absolutePath: resolve(root, 'reports/q3/report_dashboard.html'),
      relativePath: 'reports/q3/report_dashboard.html',
    });
  });

  it('should accept an absolute path under the root', async () => {
    const absolute = resolve(root, 'reports/q3/report_dashboard.html');

    const target = await resolveTargetDocument(root, absolute);

    expect(target.relativePath).toBe('reports/q3/report_dashboard.html');
  });

  it('should reject a document outside the root even when it exists', async () => {
    await expect(resolveTargetDocument(root, '../outside.html')).rejects.toBeInstanceOf(
      DocumentOutsideServedRootError
    );
    await expect(resolveTargetDocument(root, resolve(TEST_ROOT, 'outside.html'))).rejects.toThrow(
      `Document ${resolve(TEST_ROOT, 'outside.html')} is not inside served root ${resolve(root)}`
    );
  });

  it('should reject the root itself', async () => {
    await expect(resolveTargetDocument(root, '.')).rejects.toBeInstanceOf(DocumentOutsideServedRootError);
  });

  it('should reject a missing document', async () => {
    await expect(resolveTargetDocument(root, 'reports/missing.html')).rejects.toThrow(
      `Document not found: ${resolve(root, 'reports/missing.html')}`
    );
  });

  it('should reject a directory as the document', async () => {
    await expect(resolveTargetDocument(root, 'reports')).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it('should reject a missing served root', async () => {
    await expect(resolveServedRoot(join(TEST_ROOT, 'nope'))).rejects.toBeInstanceOf(InvalidServedRootError);
    await expect(resolveTargetDocument(join(TEST_ROOT, 'nope'), 'a.html')).rejects.toThrow(
      `Served root ${resolve(TEST_ROOT, 'nope')} does not exist`
    );
  });
});

describe('toDocumentUrl', () => {
  it('should join and encode each segment', () => {
    expect(toDocumentUrl('http://127.0.0.1:5000', 'reports/my report#1.html')).toBe(
      'http://127.0.0.1:5000/reports/my%20report%231.html'
    );
  });

  it('should tolerate a trailing slash on the base URL', () => {
    expect(toDocumentUrl('http://127.0.0.1:5000/', 'index.html')).toBe('http://127.0.0.1:5000/index.html');
  });
});
