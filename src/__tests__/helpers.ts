import { Rect } from '../geometry/rect';
import { Direction, Edge } from '../geometry/direction';
import { DEFAULT_ENGINE_SETTINGS, EngineContext, EngineSettings } from '../engine/context';
import { UndoMemory } from '../engine/undo_memory';
import { HighlightSink } from '../platform/types';
import { DesktopLayout, VirtualDesktop } from '../platform/virtual_desktop';

export interface Flash {
  frame: Rect;
  emphasis?: Direction | Edge[];
}

export class RecordingHighlighter implements HighlightSink {
  readonly flashes: Flash[] = [];

  flash(frame: Rect, emphasis?: Direction | Edge[]): void {
    this.flashes.push({ frame, emphasis });
  }
}

export interface Rig {
  desktop: VirtualDesktop;
  ctx: EngineContext;
  highlighter: RecordingHighlighter;
  clock: { now: number };
}

export function makeRig(layout: DesktopLayout, settings: Partial<EngineSettings> = {}): Rig {
  const clock = { now: 1000 };
  const now = (): number => clock.now;
  const desktop = new VirtualDesktop(layout);
  const highlighter = new RecordingHighlighter();
  const ctx: EngineContext = {
    platform: desktop,
    memory: new UndoMemory(now),
    highlighter,
    settings: { ...DEFAULT_ENGINE_SETTINGS, ...settings },
    now
  };
  return { desktop, ctx, highlighter, clock };
}

/** One 1500x900 screen at the origin: a step is 50 by 30 at 30 parts. */
export const SINGLE_SCREEN: DesktopLayout['screens'] = [
  { id: 1, name: 'Built-in Display', frame: { x: 0, y: 0, w: 1500, h: 900 }, primary: true }
];
