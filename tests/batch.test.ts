/**
 * Batch Rendering Tests
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { BatchRunner, createBatchRunner, discoverDocuments, type RenderFn } from '../src/lib/batch/index.js';
import { DEFAULT_POLICY } from '../src/lib/config/index.js';
import { DocumentNotFoundError, PortInUseError } from '../src/lib/errors/index.js';
import { createLogger, createMemorySink, silentSink } from '../src/lib/logging/index.js';
import type { RenderResult, RenderStatus } from '../src/lib/orchestrator/index.js';

const TEST_ROOT = './test-batch-root';
const quiet = createLogger('Batch', { sink: silentSink });

function fakeResult(documentPath: string, status: RenderStatus): RenderResult {
  const outputPath = documentPath.replace(/\.html$/, '.png');
  return {
    documentPath,
    outputPath,
    url: `http://127.0.0.1:5000/${documentPath}`,
    status,
    readiness: {
      state: status === 'ok' ? 'fully-rendered' : 'timed-out',
      library: null,
      transitions: [],
      snapshots: [],
      escalation: null,
      timeouts: [],
      elapsedMs: 0,
    },
    assets: { hasImages: false, imagesVisible: false },
    capture: {
      outputPath,
      width: DEFAULT_POLICY.browser.viewport.width,
      resolvedViewportHeight: 1200,
      capturedAt: '2026-01-01T00:00:00.000Z',
    },
    warnings: status === 'ok' ? [] : [{ code: 'readiness-timed-out', message: 'Charts did not finish' }],
    timings: {},
    consoleMessages: [],
  };
}

describe('discoverDocuments', () => {
  beforeAll(async () => {
    await mkdir(join(TEST_ROOT, 'east', 'q3'), { recursive: true });
    await mkdir(join(TEST_ROOT, 'west'), { recursive: true });
    await mkdir(join(TEST_ROOT, '.cache'), { recursive: true });
    await mkdir(join(TEST_ROOT, 'node_modules', 'pkg'), { recursive: true });
    await writeFile(join(TEST_ROOT, 'east', 'q3', 'report_dashboard.html'), '<html></html>');
    await writeFile(join(TEST_ROOT, 'east', 'notes.HTM'), '<html></html>');
    await writeFile(join(TEST_ROOT, 'west', 'report_dashboard.html'), '<html></html>');
    await writeFile(join(TEST_ROOT, 'west', 'data.csv'), 'a\n1\n');
    await writeFile(join(TEST_ROOT, '.cache', 'report_dashboard.html'), '<html></html>');
    await writeFile(join(TEST_ROOT, 'node_modules', 'pkg', 'index.html'), '<html></html>');
  });

  afterAll(async () => {
    await rm(TEST_ROOT, { recursive: true, force: true });
  });

  it('should collect HTML documents, skipping hidden and dependency folders', async () => {
    const documents = await discoverDocuments([TEST_ROOT]);

    expect(documents).toEqual([
      resolve(TEST_ROOT, 'east/notes.HTM'),
      resolve(TEST_ROOT, 'east/q3/report_dashboard.html'),
      resolve(TEST_ROOT, 'west/report_dashboard.html'),
    ]);
  });

  it('should filter by file name', async () => {
    const documents = await discoverDocuments([TEST_ROOT], { fileName: 'report_dashboard.html' });

    expect(documents).toEqual([
      resolve(TEST_ROOT, 'east/q3/report_dashboard.html'),
      resolve(TEST_ROOT, 'west/report_dashboard.html'),
    ]);
  });

  it('should accept files directly and drop duplicates', async () => {
    const file = join(TEST_ROOT, 'west', 'report_dashboard.html');

    const documents = await discoverDocuments([file, join(TEST_ROOT, 'west')]);

    expect(documents).toEqual([resolve(file)]);
  });

  it('should fail for a path that does not exist', async () => {
    await expect(discoverDocuments([join(TEST_ROOT, 'missing')])).rejects.toThrow('ENOENT');
  });
});

describe('BatchRunner', () => {
  it('should render every document and tally outcomes', async () => {
    const render = vi.fn<RenderFn>(async (documentPath) => {
      if (documentPath === 'b.html') return fakeResult(documentPath, 'degraded');
      if (documentPath === 'c.html') throw new PortInUseError(5000);
      if (documentPath === 'd.html') throw new DocumentNotFoundError('d.html');
      if (documentPath === 'e.html') throw new Error('unexpected');
      return fakeResult(documentPath, 'ok');
    });

    const summary = await createBatchRunner(render, { root: '/srv' }, quiet).run([
      'a.html',
      'b.html',
      'c.html',
      'd.html',
      'e.html',
    ]);

    expect(render).toHaveBeenCalledTimes(5);
    expect(render).toHaveBeenCalledWith('a.html', { root: '/srv', outputPath: undefined });
    expect(summary.total).toBe(5);
    expect(summary.rendered).toBe(1);
    expect(summary.degraded).toBe(1);
    expect(summary.failed).toBe(3);
    expect(summary.retryable).toEqual(['c.html']);
    expect(summary.outcomes.map(o => o.status)).toEqual(['rendered', 'degraded', 'failed', 'failed', 'failed']);
    expect(summary.outcomes[1]).toMatchObject({ outputPath: 'b.png', warnings: ['Charts did not finish'] });
    expect(summary.outcomes[3]).toMatchObject({
      error: { code: 'DOCUMENT_NOT_FOUND', message: 'Document not found: d.html', retryable: false },
    });
    expect(summary.outcomes[4]).toMatchObject({
      error: { code: 'UNKNOWN', message: 'unexpected', retryable: false },
    });
  });

  it('should render documents one at a time', async () => {
    let active = 0;
    let peak = 0;
    const render: RenderFn = async (documentPath) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active -= 1;
      return fakeResult(documentPath, 'ok');
    };

    await new BatchRunner(render, {}, quiet).run(['a.html', 'b.html', 'c.html']);

    expect(peak).toBe(1);
  });

  it('should log progress and a summary line', async () => {
    const sink = createMemorySink();
    const render: RenderFn = async (documentPath) => fakeResult(documentPath, 'ok');

    await new BatchRunner(render, {}, createLogger('Batch', { sink })).run(['a.html', 'b.html']);

    expect(sink.lines).toEqual([
      'info: [Batch] (1/2) a.html',
      'info: [Batch] (2/2) b.html',
      'info: [Batch] Done: 2 rendered, 0 degraded, 0 failed',
    ]);
  });

  it('should return an empty summary for no documents', async () => {
    const summary = await new BatchRunner(async () => fakeResult('x.html', 'ok'), {}, quiet).run([]);

    expect(summary).toMatchObject({ total: 0, rendered: 0, degraded: 0, failed: 0, retryable: [], outcomes: [] });
  });
});
