/**
 * Readiness Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_POLICY } from '../src/lib/config/index.js';
import { createLogger, createMemorySink, silentSink } from '../src/lib/logging/index.js';
import {
  ReadinessDetector,
  ReadinessState,
  ReadinessStateMachine,
  canTransition,
  classifyContainers,
  createProbeScripts,
  createReadinessDetector,
  isTerminal,
  settleAssets,
} from '../src/lib/readiness/index.js';
import { FakeSession, type FakePage } from './helpers/fake-session.js';

const policy = DEFAULT_POLICY.readiness;
const quiet = createLogger('Readiness', { sink: silentSink });

function detectorFor(page: FakePage) {
  const session = new FakeSession(page);
  const detector = createReadinessDetector(session, policy, quiet);
  return { session, detector };
}

function signals(id: string, rendered: boolean) {
  return { id, hasCanvas: rendered, hasSvg: false, hasMarks: false };
}

describe('ReadinessStateMachine', () => {
  it('should only allow forward transitions', () => {
    expect(canTransition('unknown', 'library-detected')).toBe(true);
    expect(canTransition('unknown', 'fully-rendered')).toBe(true);
    expect(canTransition('containers-found', 'partially-rendered')).toBe(true);
    expect(canTransition('partially-rendered', 'containers-found')).toBe(false);
    expect(canTransition('fully-rendered', 'timed-out')).toBe(false);
    expect(canTransition('unknown', 'timed-out')).toBe(false);
  });

  it('should treat fully-rendered and timed-out as terminal', () => {
    expect(isTerminal('fully-rendered')).toBe(true);
    expect(isTerminal('timed-out')).toBe(true);
    expect(isTerminal('partially-rendered')).toBe(false);
  });

  it('should throw on an illegal transition', () => {
    const machine = new ReadinessStateMachine();
    expect(() => machine.transition('containers-found', 'skip')).toThrow(
      'Illegal readiness transition unknown → containers-found'
    );
    expect(machine.state).toBe('unknown');
  });

  it('should classify container snapshots', () => {
    expect(classifyContainers([])).toBe('library-detected');
    expect(classifyContainers([signals('a', false), signals('b', false)])).toBe('containers-found');
    expect(classifyContainers([signals('a', true), signals('b', false)])).toBe('partially-rendered');
    expect(classifyContainers([signals('a', true), signals('b', true)])).toBe('fully-rendered');
    expect(classifyContainers([{ id: 'a', hasCanvas: false, hasSvg: true, hasMarks: false }])).toBe('fully-rendered');
    expect(classifyContainers([{ id: 'a', hasCanvas: false, hasSvg: false, hasMarks: true }])).toBe('fully-rendered');
  });

  it('should pass through containers-found when advancing from library-detected', () => {
    const machine = new ReadinessStateMachine();
    machine.transition('library-detected', 'test');
    machine.advance([signals('a', true)], 'snapshot');

    expect(machine.transitions.map(t => t.to)).toEqual(['library-detected', 'containers-found', 'fully-rendered']);
  });

  it('should never move backwards on a worse snapshot', () => {
    const machine = new ReadinessStateMachine();
    machine.transition('library-detected', 'test');
    machine.advance([signals('a', true), signals('b', false)], 'first');
    const state = machine.advance([signals('a', false), signals('b', false)], 'second');

    expect(state).toBe('partially-rendered');
  });

  it('should report every transition to the listener', () => {
    const seen: string[] = [];
    const machine = new ReadinessStateMachine(t => seen.push(`${t.from}>${t.to}`));
    machine.transition('library-detected', 'a');
    machine.transition('timed-out', 'b');

    expect(seen).toEqual(['unknown>library-detected', 'library-detected>timed-out']);
    expect(machine.isTerminal).toBe(true);
  });
});

describe('createProbeScripts', () => {
  it('should embed the profile global in the ready check', () => {
    const scripts = createProbeScripts(policy.library);
    expect(scripts.libraryReady).toBe(`typeof window["vegaEmbed"] !== 'undefined'`);
  });

  it('should target the profile selectors', () => {
    const scripts = createProbeScripts({
      ...policy.library,
      containerSelector: '.chart-box',
      marksSelector: '.glyphs',
    });
    expect(scripts.status).toContain('document.querySelectorAll(".chart-box")');
    expect(scripts.status).toContain('el.querySelector(".glyphs")');
    expect(scripts.forceRender).toContain('window["chartInstances"]');
  });
});

describe('ReadinessDetector', () => {
  it('should report fully-rendered at once for a page without the library', async () => {
    const { session, detector } = detectorFor({ library: 'none' });

    const report = await detector.detect();

    expect(report.state).toBe(ReadinessState.FullyRendered);
    expect(report.library).toBeNull();
    expect(report.escalation).toBeNull();
    expect(report.transitions.map(t => [t.from, t.to])).toEqual([['unknown', 'fully-rendered']]);
    expect(session.calls).toEqual(['evaluate:library']);
  });

  it('should not escalate when every chart renders within the initial settle', async () => {
    const { session, detector } = detectorFor({
      library: 'global',
      charts: [
        { id: 'revenue', renders: 'immediately' },
        { id: 'costs', renders: 'immediately', backend: 'svg' },
      ],
    });

    const report = await detector.detect();

    expect(report.state).toBe('fully-rendered');
    expect(report.escalation).toBeNull();
    expect(session.forceRenderCount).toBe(0);
    expect(session.calls).toEqual([
      'evaluate:library',
      'waitForSelector:.vega-embed',
      'wait:3000',
      'evaluate:status',
    ]);
    expect(report.snapshots).toEqual([
      {
        label: 'initial',
        containers: [
          { id: 'revenue', hasCanvas: true, hasSvg: false, hasMarks: false },
          { id: 'costs', hasCanvas: false, hasSvg: true, hasMarks: false },
        ],
        rendered: 2,
        total: 2,
      },
    ]);
  });

  it('should escalate exactly once for charts that only render after a forced redraw', async () => {
    const { session, detector } = detectorFor({
      library: 'global',
      charts: [
        { id: 'a', renders: 'after-escalation' },
        { id: 'b', renders: 'after-escalation' },
      ],
    });

    const report = await detector.detect();

    expect(report.state).toBe('fully-rendered');
    expect(session.forceRenderCount).toBe(1);
    expect(report.escalation).toEqual({ result: { redrawn: 2, resizeDispatched: true, failures: [] } });
    expect(report.transitions.map(t => t.to)).toEqual(['library-detected', 'containers-found', 'fully-rendered']);
    expect(session.calls).toEqual([
      'evaluate:library',
      'waitForSelector:.vega-embed',
      'wait:3000',
      'evaluate:status',
      'evaluate:forceRender',
      'wait:8000',
      'evaluate:status',
    ]);
  });

  it('should pass through partially-rendered when some charts are late', async () => {
    const { detector } = detectorFor({
      library: 'global',
      charts: [
        { id: 'a', renders: 'immediately' },
        { id: 'b', renders: 'after-escalation' },
      ],
    });

    const report = await detector.detect();

    expect(report.transitions.map(t => t.to)).toEqual([
      'library-detected',
      'containers-found',
      'partially-rendered',
      'fully-rendered',
    ]);
    expect(report.escalation?.result).toEqual({ redrawn: 1, resizeDispatched: true, failures: [] });
  });

  it('should end in timed-out after a single escalation when charts never render', async () => {
    const { session, detector } = detectorFor({
      library: 'global',
      charts: [{ id: 'stuck', renders: 'never' }],
    });

    const report = await detector.detect();

    expect(report.state).toBe('timed-out');
    expect(session.forceRenderCount).toBe(1);
    expect(report.snapshots.map(s => s.label)).toEqual(['initial', 'post-escalation']);
    expect(report.snapshots.map(s => s.rendered)).toEqual([0, 0]);
    expect(report.transitions[report.transitions.length - 1]).toMatchObject({
      from: 'containers-found',
      to: 'timed-out',
      reason: 'not fully rendered after escalation',
    });
  });

  it('should time out when the library is present but no containers attach', async () => {
    const { session, detector } = detectorFor({ library: 'global', containersAttach: false });

    const report = await detector.detect();

    expect(report.state).toBe('timed-out');
    expect(report.timeouts).toEqual(['container .vega-embed']);
    expect(report.transitions.map(t => t.to)).toEqual(['library-detected', 'timed-out']);
    expect(report.escalation?.result?.resizeDispatched).toBe(true);
    expect(session.forceRenderCount).toBe(1);
  });

  it('should wait for the global when only the script tag is present', async () => {
    const { session, detector } = detectorFor({
      library: 'script-tag',
      charts: [{ id: 'a', renders: 'immediately' }],
    });

    const report = await detector.detect();

    expect(report.state).toBe('fully-rendered');
    expect(report.library).toEqual({ hasGlobal: false, hasScriptTag: true, name: 'vega-embed' });
    expect(session.calls.slice(0, 3)).toEqual(['evaluate:library', 'waitForFunction', 'waitForSelector:.vega-embed']);
    expect(report.timeouts).toEqual([]);
  });

  it('should record an expired library wait and keep going', async () => {
    const { detector } = detectorFor({
      library: 'script-tag',
      libraryLoads: false,
      containersAttach: false,
    });

    const report = await detector.detect();

    expect(report.state).toBe('timed-out');
    expect(report.timeouts).toEqual(['library global vegaEmbed', 'container .vega-embed']);
  });

  it('should keep a failed status probe on the snapshot and still converge', async () => {
    const { detector } = detectorFor({
      library: 'global',
      charts: [{ id: 'a', renders: 'immediately' }],
      statusOverride: 'not-an-array',
    });

    const report = await detector.detect();

    expect(report.state).toBe('timed-out');
    expect(report.snapshots).toHaveLength(2);
    expect(report.snapshots[0].error).toMatch(/^Unexpected probe result/);
    expect(report.snapshots[0].total).toBe(0);
  });

  it('should refuse to run twice', async () => {
    const { detector } = detectorFor({ library: 'none' });
    await detector.detect();

    await expect(detector.detect()).rejects.toThrow('may only run once per render attempt');
  });

  it('should log transitions in debug mode', async () => {
    const sink = createMemorySink();
    const session = new FakeSession({ library: 'none' });
    const detector = new ReadinessDetector(session, policy, createLogger('Readiness', { debug: true, sink }));

    await detector.detect();

    expect(sink.lines.some(line => line.startsWith('debug: [Readiness] unknown → fully-rendered'))).toBe(true);
    expect(sink.lines[sink.lines.length - 1]).toMatch(/^info: \[Readiness\] ✓ Readiness: fully-rendered in \d+ms$/);
  });
});

describe('settleAssets', () => {
  const assets = DEFAULT_POLICY.assets;

  it('should only pause when the page has no images', async () => {
    const session = new FakeSession({ hasImages: false });

    const report = await settleAssets(session, assets, quiet);

    expect(report).toEqual({ hasImages: false, imagesVisible: false });
    expect(session.calls).toEqual(['evaluate:hasImages', 'wait:5000']);
  });

  it('should wait for a visible image', async () => {
    const session = new FakeSession({ hasImages: true });

    const report = await settleAssets(session, assets, quiet);

    expect(report).toEqual({ hasImages: true, imagesVisible: true });
    expect(session.calls).toEqual(['evaluate:hasImages', 'waitForSelector:img', 'wait:5000']);
  });

  it('should report an image wait that expired', async () => {
    const session = new FakeSession({ hasImages: true, imagesLoad: false });

    const report = await settleAssets(session, assets, quiet);

    expect(report.imagesVisible).toBe(false);
    expect(report.imageWaitError).toBe('Timed out after 30000ms waiting for selector img');
  });
});
