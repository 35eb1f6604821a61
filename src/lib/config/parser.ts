/**
 * Configuration Parser
 *
 * Parse .chartshot.yml (or .json) config files into the render policy:
 * served root, server probing, browser viewport, navigation timeouts,
 * readiness timings and the chart library profile.
 */

import { readFile, access } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

const ServerSchema = z.object({
  host: z.enum(['127.0.0.1', 'localhost']).default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(0),
  probe_attempts: z.number().int().positive().default(5),
  probe_interval_ms: z.number().int().min(0).default(100),
  probe_timeout_ms: z.number().int().positive().default(5000),
});

const ViewportSchema = z.object({
  width: z.number().int().positive().default(1600),
  height: z.number().int().positive().default(900),
});

const BrowserSchema = z.object({
  headless: z.boolean().default(true),
  args: z.array(z.string()).default(['--no-sandbox', '--disable-setuid-sandbox']),
  viewport: ViewportSchema.default({}),
  device_scale_factor: z.number().positive().default(1.5),
});

const NavigationSchema = z.object({
  structural_timeout_ms: z.number().int().positive().default(15000),
  network_idle_timeout_ms: z.number().int().positive().default(60000),
});

const LibraryProfileSchema = z.object({
  name: z.string().default('vega-embed'),
  global_symbol: z.string().min(1).default('vegaEmbed'),
  script_src_pattern: z.string().min(1).default('vega-embed'),
  container_selector: z.string().min(1).default('.vega-embed'),
  marks_selector: z.string().min(1).default('.marks'),
  instance_registry: z.string().min(1).default('chartInstances'),
});

const ReadinessSchema = z.object({
  library: LibraryProfileSchema.default({}),
  initial_settle_ms: z.number().int().min(0).default(3000),
  escalation_settle_ms: z.number().int().min(0).default(8000),
  container_timeout_ms: z.number().int().positive().default(10000),
  library_timeout_ms: z.number().int().positive().default(30000),
});

const AssetsSchema = z.object({
  image_timeout_ms: z.number().int().positive().default(30000),
  final_settle_ms: z.number().int().min(0).default(5000),
});

export const ChartshotConfigSchema = z.object({
  root: z.string().optional(),
  server: ServerSchema.default({}),
  browser: BrowserSchema.default({}),
  navigation: NavigationSchema.default({}),
  readiness: ReadinessSchema.default({}),
  assets: AssetsSchema.default({}),
  render_timeout_ms: z.number().int().positive().default(300000),
});

// ============================================================================
// Types
// ============================================================================

export type ChartshotConfig = z.infer<typeof ChartshotConfigSchema>;
export type ChartshotConfigInput = z.input<typeof ChartshotConfigSchema>;

export interface ChartLibraryProfile {
  name: string;
  /** Global the library defines once loaded, e.g. `vegaEmbed` */
  globalSymbol: string;
  /** Substring of the library's script src */
  scriptSrcPattern: string;
  containerSelector: string;
  /** Library-specific rendered subtree inside a container */
  marksSelector: string;
  /** Global map of tracked chart instances exposing `view.resize().run()` */
  instanceRegistry: string;
}

export interface ServerPolicy {
  host: string;
  port: number;
  probeAttempts: number;
  probeIntervalMs: number;
  probeTimeoutMs: number;
}

export interface BrowserPolicy {
  headless: boolean;
  args: string[];
  viewport: { width: number; height: number };
  deviceScaleFactor: number;
}

export interface NavigationPolicy {
  structuralTimeoutMs: number;
  networkIdleTimeoutMs: number;
}

export interface ReadinessPolicy {
  library: ChartLibraryProfile;
  initialSettleMs: number;
  escalationSettleMs: number;
  containerTimeoutMs: number;
  libraryTimeoutMs: number;
}

export interface AssetPolicy {
  imageTimeoutMs: number;
  finalSettleMs: number;
}

export interface RenderPolicy {
  root?: string;
  server: ServerPolicy;
  browser: BrowserPolicy;
  navigation: NavigationPolicy;
  readiness: ReadinessPolicy;
  assets: AssetPolicy;
  renderTimeoutMs: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const CONFIG_FILENAMES = ['.chartshot.yml', '.chartshot.yaml', '.chartshot.json'];

export const DEFAULT_CONFIG: ChartshotConfig = ChartshotConfigSchema.parse({});

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<ChartshotConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): ChartshotConfig {
    let parsed: unknown;

    if (filename.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      parsed = parseYaml(content);
    }

    // An empty YAML document parses to null
    return this.validate(parsed ?? {});
  }

  /**
   * Validate config object, filling defaults
   */
  validate(config: unknown): ChartshotConfig {
    return ChartshotConfigSchema.parse(config);
  }

  /**
   * Convert the snake_case file format into the policy the components take
   */
  toRenderPolicy(config: ChartshotConfig): RenderPolicy {
    const { server, browser, navigation, readiness, assets } = config;
    return {
      root: config.root,
      server: {
        host: server.host,
        port: server.port,
        probeAttempts: server.probe_attempts,
        probeIntervalMs: server.probe_interval_ms,
        probeTimeoutMs: server.probe_timeout_ms,
      },
      browser: {
        headless: browser.headless,
        args: [...browser.args],
        viewport: { ...browser.viewport },
        deviceScaleFactor: browser.device_scale_factor,
      },
      navigation: {
        structuralTimeoutMs: navigation.structural_timeout_ms,
        networkIdleTimeoutMs: navigation.network_idle_timeout_ms,
      },
      readiness: {
        library: {
          name: readiness.library.name,
          globalSymbol: readiness.library.global_symbol,
          scriptSrcPattern: readiness.library.script_src_pattern,
          containerSelector: readiness.library.container_selector,
          marksSelector: readiness.library.marks_selector,
          instanceRegistry: readiness.library.instance_registry,
        },
        initialSettleMs: readiness.initial_settle_ms,
        escalationSettleMs: readiness.escalation_settle_ms,
        containerTimeoutMs: readiness.container_timeout_ms,
        libraryTimeoutMs: readiness.library_timeout_ms,
      },
      assets: {
        imageTimeoutMs: assets.image_timeout_ms,
        finalSettleMs: assets.final_settle_ms,
      },
      renderTimeoutMs: config.render_timeout_ms,
    };
  }

  /**
   * Find the first config file in a directory
   */
  async findConfigFile(dir: string): Promise<string | null> {
    for (const name of CONFIG_FILENAMES) {
      const candidate = resolve(join(dir, name));
      try {
        await access(candidate);
        return candidate;
      } catch {
        continue;
      }
    }
    return null;
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# chartshot configuration

# Directory served to the browser; documents must live under it
root: .

server:
  port: 0            # 0 = any free port
  probe_attempts: 5

browser:
  viewport:
    width: 1600
    height: 900
  device_scale_factor: 1.5

navigation:
  structural_timeout_ms: 15000
  network_idle_timeout_ms: 60000

readiness:
  library:
    name: vega-embed
    global_symbol: vegaEmbed
    script_src_pattern: vega-embed
    container_selector: .vega-embed
    marks_selector: .marks
    instance_registry: chartInstances
  initial_settle_ms: 3000
  escalation_settle_ms: 8000   # raise for data-heavy documents
  container_timeout_ms: 10000
  library_timeout_ms: 30000

assets:
  image_timeout_ms: 30000
  final_settle_ms: 5000

render_timeout_ms: 300000
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

export const DEFAULT_POLICY: RenderPolicy = new ConfigParser().toRenderPolicy(DEFAULT_CONFIG);

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<ChartshotConfig> {
  return new ConfigParser().loadFile(path);
}

/**
 * Resolve the policy for a run: an explicit file, else a config file in
 * `searchDir`, else the defaults.
 */
export async function loadRenderPolicy(
  configPath?: string,
  searchDir: string = process.cwd()
): Promise<RenderPolicy> {
  const parser = new ConfigParser();
  const path = configPath ?? (await parser.findConfigFile(searchDir));
  const config = path ? await parser.loadFile(path) : DEFAULT_CONFIG;
  const policy = parser.toRenderPolicy(config);

  // A relative root in a config file is relative to that file's directory
  if (policy.root !== undefined && path) {
    policy.root = resolve(dirname(path), policy.root);
  }
  return policy;
}
