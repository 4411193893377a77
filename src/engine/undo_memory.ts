/**
 * engine/undo_memory.ts
 *
 * Per-window saved frames, one independent slot per feature family.
 * A slot holds a frame only while its toggle is "active" and is cleared
 * by the restore that consumes it. Two features never share a slot, so
 * maximizing a centered window does not clobber the centre undo.
 *
 * There is no close hook from the window system: entries for windows
 * that have gone away are pruned lazily by prune().
 */

import { Rect, cloneRect } from '../geometry/rect';
import { scopedLogger } from '../core/logger';
import { WindowId, WindowPlatform } from '../platform/types';

const log = scopedLogger('engine/undo_memory');

export type UndoSlot =
  | 'edge'
  | 'shrink.horizontal'
  | 'shrink.vertical'
  | 'maximize'
  | 'center'
  | 'halfThird'
  | 'naturalSize'
  | 'naturalPosition'
  | 'screenMove';

export interface SavedFrame {
  frame: Rect;
  savedAt: number;
  /** The frame the operation produced, for "is it still where we left it" checks. */
  result?: Rect;
  /** Free-form discriminator (e.g. the screen role of a move). */
  tag?: string;
  /** Slots the operation filled as a side effect; an undo clears them. */
  slots?: UndoSlot[];
}

export class UndoMemory {
  private readonly slots = new Map<UndoSlot, Map<WindowId, SavedFrame>>();

  constructor(private readonly now: () => number = Date.now) {}

  get(slot: UndoSlot, id: WindowId): SavedFrame | undefined {
    return this.slots.get(slot)?.get(id);
  }

  has(slot: UndoSlot, id: WindowId): boolean {
    return this.get(slot, id) !== undefined;
  }

  save(slot: UndoSlot, id: WindowId, frame: Rect, extra: Omit<SavedFrame, 'frame' | 'savedAt'> = {}): SavedFrame {
    let table = this.slots.get(slot);
    if (!table) {
      table = new Map();
      this.slots.set(slot, table);
    }
    const entry: SavedFrame = {
      frame: cloneRect(frame),
      savedAt: this.now(),
      ...(extra.result ? { result: cloneRect(extra.result) } : {}),
      ...(extra.tag !== undefined ? { tag: extra.tag } : {}),
      ...(extra.slots ? { slots: [...extra.slots] } : {})
    };
    table.set(id, entry);
    log.trace({ slot, id, frame }, 'Frame saved');
    return entry;
  }

  /** Saves only when the slot is empty (write-once until consumed). */
  saveOnce(slot: UndoSlot, id: WindowId, frame: Rect): SavedFrame {
    return this.get(slot, id) ?? this.save(slot, id, frame);
  }

  /** Records what the operation produced on an existing entry. */
  markResult(slot: UndoSlot, id: WindowId, result: Rect): void {
    const entry = this.get(slot, id);
    if (entry) entry.result = cloneRect(result);
  }

  /** Returns and removes the entry. */
  take(slot: UndoSlot, id: WindowId): SavedFrame | undefined {
    const entry = this.get(slot, id);
    if (entry) this.clear(slot, id);
    return entry;
  }

  clear(slot: UndoSlot, id: WindowId): void {
    this.slots.get(slot)?.delete(id);
  }

  size(slot?: UndoSlot): number {
    if (slot) return this.slots.get(slot)?.size ?? 0;
    let total = 0;
    for (const table of this.slots.values()) total += table.size;
    return total;
  }

  /** Drops every entry whose window the platform no longer knows. */
  prune(platform: WindowPlatform): number {
    let dropped = 0;
    for (const [slot, table] of this.slots) {
      for (const id of [...table.keys()]) {
        if (!platform.windowById(id)) {
          table.delete(id);
          dropped++;
          log.debug({ slot, id }, 'Pruned stale undo entry');
        }
      }
    }
    return dropped;
  }
}
