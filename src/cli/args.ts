/**
 * Command-line argument helpers shared by the CLIs.
 */

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function getOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${name} requires a value`);
  }
  return value;
}

export interface IntRange {
  min?: number;
  max?: number;
}

export const PORT_RANGE: IntRange = { min: 0, max: 65535 };
export const WIDTH_RANGE: IntRange = { min: 1 };

export function getIntOption(args: string[], name: string, range: IntRange = {}): number | undefined {
  const raw = getOption(args, name);
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || String(value) !== raw.trim()) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  const min = range.min ?? 0;
  if (value < min || (range.max !== undefined && value > range.max)) {
    const bounds = range.max === undefined ? `at least ${min}` : `between ${min} and ${range.max}`;
    throw new Error(`${name} must be ${bounds}, got "${raw}"`);
  }
  return value;
}

/**
 * Positional arguments: everything that is neither a flag nor a flag's value.
 */
export function getPositionals(args: string[], valueOptions: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueOptions.includes(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('--')) continue;
    positionals.push(arg);
  }
  return positionals;
}

// ============================================================================
// render
// ============================================================================

export interface RenderCliArgs {
  document: string;
  out?: string;
  root?: string;
  config?: string;
  width?: number;
  port?: number;
  debug: boolean;
  json: boolean;
  strict: boolean;
}

const RENDER_VALUE_OPTIONS = ['--out', '--root', '--config', '--width', '--port'];

export function parseRenderArgs(args: string[]): RenderCliArgs | null {
  if (args.length === 0 || hasFlag(args, '--help') || hasFlag(args, '-h')) {
    return null;
  }

  const [document] = getPositionals(args, RENDER_VALUE_OPTIONS);
  if (!document) {
    throw new Error('A document path is required');
  }

  return {
    document,
    out: getOption(args, '--out'),
    root: getOption(args, '--root'),
    config: getOption(args, '--config'),
    width: getIntOption(args, '--width', WIDTH_RANGE),
    port: getIntOption(args, '--port', PORT_RANGE),
    debug: hasFlag(args, '--debug'),
    json: hasFlag(args, '--json'),
    strict: hasFlag(args, '--strict'),
  };
}

// ============================================================================
// batch
// ============================================================================

export interface BatchCliArgs {
  paths: string[];
  name?: string;
  root?: string;
  config?: string;
  debug: boolean;
  json: boolean;
}

const BATCH_VALUE_OPTIONS = ['--name', '--root', '--config'];

export function parseBatchArgs(args: string[]): BatchCliArgs | null {
  if (args.length === 0 || hasFlag(args, '--help') || hasFlag(args, '-h')) {
    return null;
  }

  const paths = getPositionals(args, BATCH_VALUE_OPTIONS);
  if (paths.length === 0) {
    throw new Error('At least one directory or document is required');
  }

  return {
    paths,
    name: getOption(args, '--name'),
    root: getOption(args, '--root'),
    config: getOption(args, '--config'),
    debug: hasFlag(args, '--debug'),
    json: hasFlag(args, '--json'),
  };
}

// ============================================================================
// serve
// ============================================================================

export interface ServeCliArgs {
  dir: string;
  port: number;
  file?: string;
}

export function parseServeArgs(args: string[]): ServeCliArgs | null {
  if (hasFlag(args, '--help') || hasFlag(args, '-h')) {
    return null;
  }

  return {
    dir: getOption(args, '--dir') ?? '.',
    port: getIntOption(args, '--port', PORT_RANGE) ?? 0,
    file: getOption(args, '--file'),
  };
}
