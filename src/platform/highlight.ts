/**
 * platform/highlight.ts
 *
 * HighlightSink that keeps at most one transient highlight alive and
 * drops it after `durationMs`. Rendering belongs to the host; this sink
 * records what should be on screen and reports it through the logger
 * and an optional listener (a host overlay subscribes there).
 */

import { Rect, cloneRect } from '../geometry/rect';
import { Direction, Edge, edgeOf } from '../geometry/direction';
import { scopedLogger } from '../core/logger';
import { HighlightSink } from './types';

const log = scopedLogger('platform/highlight');

export interface Highlight {
  frame: Rect;
  /** Edges drawn thick; empty means a uniform border. */
  edges: Edge[];
}

export type HighlightListener = (highlight: Highlight | null) => void;

export class TransientHighlighter implements HighlightSink {
  private active: Highlight | null = null;
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly durationMs: number,
    private readonly listener?: HighlightListener
  ) {}

  flash(frame: Rect, emphasis?: Direction | Edge[]): void {
    this.clear();

    const edges = emphasis === undefined
      ? []
      : Array.isArray(emphasis) ? [...emphasis] : [edgeOf(emphasis)];

    this.active = { frame: cloneRect(frame), edges };
    log.debug({ frame, edges }, 'Highlight shown');
    this.listener?.(this.active);

    this.timer = setTimeout(() => this.clear(), this.durationMs);
    this.timer.unref();
  }

  current(): Highlight | null {
    return this.active;
  }

  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.active) {
      this.active = null;
      this.listener?.(null);
    }
  }
}
