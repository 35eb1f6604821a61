/**
 * Readiness State Machine
 *
 * States only move forward along the table below. `fully-rendered` and
 * `timed-out` are terminal.
 */

import type { ContainerSignals } from './probes.js';
import { isContainerRendered } from './probes.js';

export const ReadinessState = {
  Unknown: 'unknown',
  LibraryDetected: 'library-detected',
  ContainersFound: 'containers-found',
  PartiallyRendered: 'partially-rendered',
  FullyRendered: 'fully-rendered',
  TimedOut: 'timed-out',
} as const;

export type ReadinessState = (typeof ReadinessState)[keyof typeof ReadinessState];

const TRANSITIONS: Record<ReadinessState, readonly ReadinessState[]> = {
  [ReadinessState.Unknown]: [ReadinessState.LibraryDetected, ReadinessState.FullyRendered],
  [ReadinessState.LibraryDetected]: [ReadinessState.ContainersFound, ReadinessState.TimedOut],
  [ReadinessState.ContainersFound]: [
    ReadinessState.PartiallyRendered,
    ReadinessState.FullyRendered,
    ReadinessState.TimedOut,
  ],
  [ReadinessState.PartiallyRendered]: [ReadinessState.FullyRendered, ReadinessState.TimedOut],
  [ReadinessState.FullyRendered]: [],
  [ReadinessState.TimedOut]: [],
};

export interface ReadinessTransition {
  from: ReadinessState;
  to: ReadinessState;
  /** Milliseconds since the machine was created */
  at: number;
  reason: string;
}

export function canTransition(from: ReadinessState, to: ReadinessState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: ReadinessState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * State implied by one snapshot of container signals. With no containers
 * the library is known but nothing has been attached yet.
 */
export function classifyContainers(containers: ContainerSignals[]): ReadinessState {
  if (containers.length === 0) return ReadinessState.LibraryDetected;

  const rendered = containers.filter(isContainerRendered).length;
  if (rendered === containers.length) return ReadinessState.FullyRendered;
  if (rendered > 0) return ReadinessState.PartiallyRendered;
  return ReadinessState.ContainersFound;
}

export class ReadinessStateMachine {
  private current: ReadinessState = ReadinessState.Unknown;
  private history: ReadinessTransition[] = [];
  private startedAt = Date.now();

  constructor(private onTransition?: (transition: ReadinessTransition) => void) {}

  get state(): ReadinessState {
    return this.current;
  }

  get transitions(): ReadinessTransition[] {
    return [...this.history];
  }

  get isTerminal(): boolean {
    return isTerminal(this.current);
  }

  transition(to: ReadinessState, reason: string): void {
    if (!canTransition(this.current, to)) {
      throw new Error(`Illegal readiness transition ${this.current} → ${to}`);
    }
    const transition: ReadinessTransition = { from: this.current, to, at: Date.now() - this.startedAt, reason };
    this.current = to;
    this.history.push(transition);
    this.onTransition?.(transition);
  }

  /**
   * Move toward the state a snapshot implies, passing through
   * `containers-found` when containers show up for the first time. A
   * snapshot never moves the machine backwards.
   */
  advance(containers: ContainerSignals[], reason: string): ReadinessState {
    const target = classifyContainers(containers);
    if (target === this.current) return this.current;

    if (this.current === ReadinessState.LibraryDetected && target !== ReadinessState.LibraryDetected) {
      this.transition(ReadinessState.ContainersFound, `${containers.length} container(s) attached`);
    }
    if (target !== this.current && canTransition(this.current, target)) {
      this.transition(target, reason);
    }
    return this.current;
  }
}
