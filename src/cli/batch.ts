#!/usr/bin/env node
/**
 * CLI: Batch render
 *
 * Usage:
 *   chartshot-batch <dir...> [options]
 *
 * Example:
 *   chartshot-batch output/iterations --name report_dashboard.html --json
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import { discoverDocuments, createBatchRunner } from '../lib/batch/index.js';
import { loadRenderPolicy } from '../lib/config/index.js';
import { describeError } from '../lib/errors/index.js';
import { createOrchestrator } from '../lib/orchestrator/index.js';
import { parseBatchArgs, type BatchCliArgs } from './args.js';

const HELP = `
chartshot - Batch render

Usage:
  chartshot-batch <dir-or-file...> [options]

Options:
  --name      Only render files with this exact name (default: every .html)
  --root      Directory served to the browser (default: config root or cwd)
  --config    Config file (default: .chartshot.yml in cwd, if present)
  --debug     Verbose phase logging
  --json      Write batch-summary.json to the working directory

Example:
  chartshot-batch output/iterations --name report_dashboard.html
`;

async function main() {
  const args = process.argv.slice(2);

  let parsed: BatchCliArgs | null;
  try {
    parsed = parseBatchArgs(args);
  } catch (error) {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  if (parsed === null) {
    console.log(HELP);
    process.exit(0);
  }

  try {
    const documents = await discoverDocuments(parsed.paths, { fileName: parsed.name });
    if (documents.length === 0) {
      console.log('No documents found.');
      return;
    }

    console.log(`📸 Rendering ${documents.length} document(s)\n`);

    const policy = await loadRenderPolicy(parsed.config);
    const orchestrator = createOrchestrator(policy);
    const runner = createBatchRunner(
      (documentPath, options) => orchestrator.render(documentPath, options),
      { root: parsed.root, debug: parsed.debug }
    );

    const summary = await runner.run(documents);

    console.log(`\n✅ ${summary.rendered} rendered, ⚠️ ${summary.degraded} degraded, ❌ ${summary.failed} failed`);
    if (summary.retryable.length > 0) {
      console.log('\nRetryable failures:');
      for (const documentPath of summary.retryable) {
        console.log(`  - ${documentPath}`);
      }
    }

    if (parsed.json) {
      const jsonPath = join(process.cwd(), 'batch-summary.json');
      await writeFile(jsonPath, JSON.stringify(summary, null, 2));
      console.log(`📄 Summary saved to ${jsonPath}`);
    }

    if (summary.failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
