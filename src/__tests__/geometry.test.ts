import {
  atBottomEdge,
  atLeftEdge,
  atRightEdge,
  atTopEdge,
  center,
  clampInto,
  containsPoint,
  intervalsOverlap,
  near,
  rectsNear
} from '../geometry/rect';
import { edgeOf, isBackward, isDirection, isSide } from '../geometry/direction';
import { neighbourScreen, screenForFrame } from '../platform/screens';
import { VirtualDesktop } from '../platform/virtual_desktop';

describe('rect', () => {
  it('treats near as a strict tolerance', () => {
    expect(near(100, 104.9, 5)).toBe(true);
    expect(near(100, 105, 5)).toBe(false);
    expect(rectsNear({ x: 0, y: 0, w: 10, h: 10 }, { x: 0.5, y: 0, w: 10, h: 10.5 }, 1)).toBe(true);
  });

  it('contains points half-open', () => {
    const r = { x: 0, y: 0, w: 100, h: 50 };
    expect(containsPoint(r, { x: 0, y: 0 })).toBe(true);
    expect(containsPoint(r, { x: 100, y: 10 })).toBe(false);
    expect(containsPoint(r, { x: 10, y: 50 })).toBe(false);
    expect(center(r)).toEqual({ x: 50, y: 25 });
  });

  it('overlaps open intervals only', () => {
    expect(intervalsOverlap(0, 100, 100, 50)).toBe(false);
    expect(intervalsOverlap(0, 100, 99, 50)).toBe(true);
  });

  it('detects edges within tolerance', () => {
    const s = { x: 0, y: 0, w: 1000, h: 800 };
    expect(atLeftEdge({ x: 4, y: 100, w: 200, h: 200 }, s, 5)).toBe(true);
    expect(atRightEdge({ x: 796, y: 100, w: 200, h: 200 }, s, 5)).toBe(true);
    expect(atTopEdge({ x: 100, y: 6, w: 200, h: 200 }, s, 5)).toBe(false);
    expect(atBottomEdge({ x: 100, y: 600, w: 200, h: 200 }, s, 5)).toBe(true);
  });

  it('clamps into bounds keeping the size where it fits', () => {
    const bounds = { x: 0, y: 0, w: 1000, h: 800 };
    expect(clampInto({ x: 900, y: -50, w: 300, h: 200 }, bounds)).toEqual({ x: 700, y: 0, w: 300, h: 200 });
    expect(clampInto({ x: 100, y: 100, w: 1200, h: 900 }, bounds)).toEqual({ x: 0, y: 0, w: 1000, h: 800 });
  });
});

describe('direction', () => {
  it('maps directions onto edges and list order', () => {
    expect(edgeOf('up')).toBe('top');
    expect(edgeOf('right')).toBe('right');
    expect(isBackward('left')).toBe(true);
    expect(isBackward('down')).toBe(false);
  });

  it('narrows unknown values', () => {
    expect(isDirection('down')).toBe(true);
    expect(isDirection('west')).toBe(false);
    expect(isSide('up')).toBe(false);
  });
});

describe('screen lookup', () => {
  const desktop = new VirtualDesktop({
    screens: [
      { id: 1, name: 'Main', frame: { x: 0, y: 0, w: 1920, h: 1080 }, primary: true },
      { id: 2, name: 'East', frame: { x: 1920, y: 0, w: 1280, h: 1024 } },
      { id: 3, name: 'Above', frame: { x: 320, y: -800, w: 1280, h: 800 } }
    ],
    windows: []
  });
  const screens = desktop.allScreens();

  it('picks the screen holding the centre', () => {
    expect(screenForFrame({ x: 1800, y: 100, w: 400, h: 300 }, screens)?.name()).toBe('East');
  });

  it('falls back to the largest overlap when the centre is off every screen', () => {
    expect(screenForFrame({ x: -300, y: 100, w: 400, h: 300 }, screens)?.name()).toBe('Main');
  });

  it('finds neighbours that lie wholly beyond a side', () => {
    const main = screens[0];
    expect(neighbourScreen(main, screens, 'east')?.name()).toBe('East');
    expect(neighbourScreen(main, screens, 'north')?.name()).toBe('Above');
    expect(neighbourScreen(main, screens, 'west')).toBeUndefined();
    expect(main.toSouth()).toBeUndefined();
  });
});
