#!/usr/bin/env node
/**
 * CLI: Serve a directory
 *
 * Usage:
 *   chartshot-serve [options]
 *
 * Example:
 *   chartshot-serve --dir ./output --file ./output/report.html
 */

import { relative, resolve, sep } from 'path';
import { isWithinRoot, toDocumentUrl } from '../lib/documents/index.js';
import { describeError } from '../lib/errors/index.js';
import { createContentServer } from '../lib/server/index.js';
import { parseServeArgs, type ServeCliArgs } from './args.js';

const HELP = `
chartshot - Serve a directory

Usage:
  chartshot-serve [options]

Options:
  --dir       Directory to serve (default: .)
  --port      Port (default: any free port)
  --file      Print the URL of this document under the served directory

Example:
  chartshot-serve --dir ./output --port 8080
`;

async function main() {
  const args = process.argv.slice(2);

  let parsed: ServeCliArgs | null;
  try {
    parsed = parseServeArgs(args);
  } catch (error) {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  if (parsed === null) {
    console.log(HELP);
    process.exit(0);
  }

  const rootDir = resolve(parsed.dir);
  const filePath = parsed.file ? resolve(parsed.file) : undefined;
  if (filePath && !isWithinRoot(rootDir, filePath)) {
    console.error(`❌ ${filePath} is not inside ${rootDir}`);
    process.exit(1);
  }

  const server = createContentServer({ rootDir, port: parsed.port });

  try {
    const handle = await server.start();
    console.log(`\n🌐 ${handle.baseUrl}/`);
    if (filePath) {
      console.log(`📄 ${toDocumentUrl(handle.baseUrl, relative(rootDir, filePath).split(sep).join('/'))}`);
    }
    console.log('\nPress Ctrl+C to stop.');
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    process.exit(1);
  }

  // Handle shutdown
  process.on('SIGINT', () => {
    console.log('\n\nShutting down...');
    server.shutdown().then(
      () => process.exit(0),
      (error) => {
        console.error('❌ Shutdown failed:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    );
  });
}

main().catch((error) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
