/**
 * platform/types.ts
 *
 * The narrow contracts the engines consume. A platform adapter (the
 * in-process virtual desktop, the Win32 bridge, or a host runtime)
 * implements these; the engines never talk to the window system any
 * other way.
 */

import { Rect } from '../geometry/rect';
import { Direction, Edge } from '../geometry/direction';

export type WindowId = number;
export type ScreenId = number;

export interface ScreenRef {
  id(): ScreenId;
  name(): string;
  frame(): Rect;
  toWest(): ScreenRef | undefined;
  toEast(): ScreenRef | undefined;
  toNorth(): ScreenRef | undefined;
  toSouth(): ScreenRef | undefined;
}

export interface WindowRef {
  /** Stable for the lifetime of the OS window. */
  id(): WindowId;
  appName(): string;
  frame(): Rect;
  setFrame(frame: Rect): void;
  screenOf(): ScreenRef;
  /** False for panels, menus, sheets and other non-document windows. */
  isStandard(): boolean;
  isVisible(): boolean;
  raise(): void;
  focus(): void;
  minimize(): void;
  unminimize(): void;
}

export interface WindowPlatform {
  readonly kind: string;
  focusedWindow(): WindowRef | undefined;
  /** Standard windows, front to back. */
  orderedWindows(): WindowRef[];
  windowById(id: WindowId): WindowRef | undefined;
  allScreens(): ScreenRef[];
  primaryScreen(): ScreenRef | undefined;
  /** Host mouse/modifier events, where the platform can tap them. */
  pointerEvents(): PointerEventSource | undefined;
}

/**
 * Visual feedback. Given a frame and an optional direction/edges it shows
 * a transient highlight and owns its own removal timing.
 */
export interface HighlightSink {
  flash(frame: Rect, emphasis?: Direction | Edge[]): void;
}

// ---------------------------------------------------------------------------
// Pointer input (mouse drag move/resize)
// ---------------------------------------------------------------------------

export interface ModifierFlags {
  cmd?: boolean;
  alt?: boolean;
  ctrl?: boolean;
  shift?: boolean;
  fn?: boolean;
}

export type PointerEvent =
  | { kind: 'move'; x: number; y: number; dx: number; dy: number; flags: ModifierFlags }
  | { kind: 'flags'; flags: ModifierFlags };

export type PointerHandler = (event: PointerEvent) => void;

/** A host event tap. It can silently die; the drag controller watches it. */
export interface PointerEventSource {
  start(handler: PointerHandler): void;
  stop(): void;
  isEnabled(): boolean;
  /** False while the pointer is hidden (screen lock, screensaver). */
  pointerActive(): boolean;
}
