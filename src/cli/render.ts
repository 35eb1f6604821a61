#!/usr/bin/env node
/**
 * CLI: Render a document
 *
 * Usage:
 *   chartshot <document.html> [options]
 *
 * Example:
 *   chartshot reports/iteration_3/report_dashboard.html --out ./snapshots/report.png
 */

import { loadRenderPolicy } from '../lib/config/index.js';
import { describeError } from '../lib/errors/index.js';
import { createOrchestrator } from '../lib/orchestrator/index.js';
import { parseRenderArgs, type RenderCliArgs } from './args.js';

const HELP = `
chartshot - Render a chart document to PNG

Usage:
  chartshot <document> [options]

Arguments:
  document    HTML document, absolute or relative to the served root

Options:
  --out       Output PNG path (default: document path with .png)
  --root      Directory served to the browser (default: config root or cwd)
  --config    Config file (default: .chartshot.yml in cwd, if present)
  --width     Viewport width in px (default: 1600)
  --port      Server port (default: any free port)
  --debug     Log phase timings and readiness snapshots
  --json      Print the render result as JSON
  --strict    Exit 2 when charts did not finish rendering

Examples:
  chartshot output/report.html
  chartshot report.html --root ./output --width 1280 --debug
`;

async function main() {
  const args = process.argv.slice(2);

  let parsed: RenderCliArgs | null;
  try {
    parsed = parseRenderArgs(args);
  } catch (error) {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  if (parsed === null) {
    console.log(HELP);
    process.exit(0);
  }

  try {
    const policy = await loadRenderPolicy(parsed.config);
    const orchestrator = createOrchestrator(policy);

    const result = await orchestrator.render(parsed.document, {
      outputPath: parsed.out,
      root: parsed.root,
      viewportWidth: parsed.width,
      port: parsed.port,
      debug: parsed.debug,
    });

    if (parsed.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      const seconds = (Object.values(result.timings).reduce((a, b) => a + b, 0) / 1000).toFixed(1);
      const icon = result.status === 'ok' ? '✅' : '⚠️';
      console.log(`\n${icon} ${result.outputPath} (${result.capture.width}x${result.capture.resolvedViewportHeight}, ${seconds}s)`);
      for (const warning of result.warnings) {
        console.log(`  - ${warning.message}`);
      }
    }

    if (result.status === 'degraded' && parsed.strict) {
      process.exit(2);
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
