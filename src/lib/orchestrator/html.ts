/**
 * Render an HTML string by writing it into a throwaway served root.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { Orchestrator, type RenderOptions, type RenderResult } from './orchestrator.js';

export async function renderHtml(
  html: string,
  outputPath: string,
  options: Omit<RenderOptions, 'outputPath' | 'root'> = {},
  orchestrator: Orchestrator = new Orchestrator()
): Promise<RenderResult> {
  const root = await mkdtemp(join(tmpdir(), 'chartshot-'));
  try {
    const documentPath = join(root, 'index.html');
    await writeFile(documentPath, html, 'utf-8');
    return await orchestrator.render(documentPath, { ...options, root, outputPath: resolve(outputPath) });
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}
