/**
 * In-page probe scripts for a chart library profile, and the schemas their
 * results are validated against.
 */

import { z } from 'zod';
import type { ChartLibraryProfile } from '../config/index.js';

// ============================================================================
// Result schemas
// ============================================================================

export const LibraryProbeSchema = z.object({
  hasGlobal: z.boolean(),
  hasScriptTag: z.boolean(),
});

export const ContainerSignalsSchema = z.object({
  id: z.string(),
  hasCanvas: z.boolean(),
  hasSvg: z.boolean(),
  hasMarks: z.boolean(),
});

export const RenderStatusSchema = z.array(ContainerSignalsSchema);

export const ForceRenderResultSchema = z.object({
  redrawn: z.number().int().min(0),
  resizeDispatched: z.boolean(),
  failures: z.array(z.string()),
});

export type LibraryProbe = z.infer<typeof LibraryProbeSchema>;
export type ContainerSignals = z.infer<typeof ContainerSignalsSchema>;
export type ForceRenderResult = z.infer<typeof ForceRenderResultSchema>;

// ============================================================================
// Scripts
// ============================================================================

export interface ProbeScripts {
  /** `{hasGlobal, hasScriptTag}` */
  library: string;
  /** Truthy once the library global is defined */
  libraryReady: string;
  /** One ContainerSignals entry per container */
  status: string;
  /** Redraw tracked instances, nudge the rest with a resize event */
  forceRender: string;
}

export function createProbeScripts(profile: ChartLibraryProfile): ProbeScripts {
  const globalSymbol = JSON.stringify(profile.globalSymbol);
  const scriptSelector = JSON.stringify(`script[src*=${JSON.stringify(profile.scriptSrcPattern)}]`);
  const containers = JSON.stringify(profile.containerSelector);
  const marks = JSON.stringify(profile.marksSelector);
  const registry = JSON.stringify(profile.instanceRegistry);

  const isRendered = `(el) => el.querySelector('canvas') !== null || el.querySelector('svg') !== null || el.querySelector(${marks}) !== null`;

  return {
    library: `(() => ({
  hasGlobal: typeof window[${globalSymbol}] !== 'undefined',
  hasScriptTag: document.querySelector(${scriptSelector}) !== null,
}))()`,

    libraryReady: `typeof window[${globalSymbol}] !== 'undefined'`,

    status: `Array.from(document.querySelectorAll(${containers})).map((el, i) => ({
  id: el.id || 'container-' + i,
  hasCanvas: el.querySelector('canvas') !== null,
  hasSvg: el.querySelector('svg') !== null,
  hasMarks: el.querySelector(${marks}) !== null,
}))`,

    forceRender: `(() => {
  const isRendered = ${isRendered};
  const failures = [];
  let redrawn = 0;
  const instances = window[${registry}];
  if (instances && typeof instances === 'object') {
    for (const chart of Object.values(instances)) {
      if (chart && chart.view && typeof chart.view.resize === 'function') {
        try {
          chart.view.resize().run();
          redrawn += 1;
        } catch (error) {
          failures.push(String(error));
        }
      }
    }
  }
  const all = Array.from(document.querySelectorAll(${containers}));
  const pending = all.filter((el) => !isRendered(el));
  const resizeDispatched = all.length === 0 || pending.length > 0;
  if (resizeDispatched) {
    window.dispatchEvent(new Event('resize'));
  }
  return { redrawn, resizeDispatched, failures };
})()`,
  };
}

export function isContainerRendered(signals: ContainerSignals): boolean {
  return signals.hasCanvas || signals.hasSvg || signals.hasMarks;
}
