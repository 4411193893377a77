import { CompactPlacer } from '../engine/compact';
import { makeRig } from './helpers';

function setup(settings: { compactMaxRows?: number } = {}) {
  const rig = makeRig(
    {
      screens: [{ id: 1, name: 'Built-in Display', frame: { x: 0, y: 0, w: 1200, h: 900 }, primary: true }],
      windows: [1, 2, 3, 4, 5].map(id => ({
        id,
        app: `App${id}`,
        frame: { x: 100 + id * 20, y: 100 + id * 20, w: 600, h: 500 }
      }))
    },
    { compactW: 400, compactH: 300, ...settings }
  );
  return { ...rig, placer: new CompactPlacer(rig.ctx) };
}

describe('CompactPlacer', () => {
  it('fills the bottom row left to right, then wraps upward', () => {
    const { desktop, placer } = setup();

    expect(placer.toggle(desktop.window(1))).toEqual({ action: 'docked', row: 0, frame: { x: 0, y: 600, w: 400, h: 300 } });
    expect(placer.toggle(desktop.window(2))).toEqual({ action: 'docked', row: 0, frame: { x: 400, y: 600, w: 400, h: 300 } });
    expect(placer.toggle(desktop.window(3))).toEqual({ action: 'docked', row: 0, frame: { x: 800, y: 600, w: 400, h: 300 } });
    expect(placer.toggle(desktop.window(4))).toEqual({ action: 'docked', row: 1, frame: { x: 0, y: 300, w: 400, h: 300 } });
    expect(placer.docked().size).toBe(4);
  });

  it('restores a docked window to where it was', () => {
    const { desktop, placer } = setup();
    const win = desktop.window(2);

    placer.toggle(win);
    expect(placer.toggle(win)).toEqual({ action: 'restored', frame: { x: 140, y: 140, w: 600, h: 500 } });
    expect(placer.docked().get(2)).toBeUndefined();
  });

  it('places after the rightmost tile rather than into a gap', () => {
    const { desktop, placer } = setup();
    for (const id of [1, 2, 3, 4]) placer.toggle(desktop.window(id));
    placer.toggle(desktop.window(1));

    expect(placer.toggle(desktop.window(5))).toEqual({ action: 'docked', row: 1, frame: { x: 400, y: 300, w: 400, h: 300 } });
  });

  it('drops slots of windows that have closed', () => {
    const { desktop, placer } = setup();
    placer.toggle(desktop.window(1));
    desktop.close(1);

    expect(placer.toggle(desktop.window(2))).toEqual({ action: 'docked', row: 0, frame: { x: 0, y: 600, w: 400, h: 300 } });
    expect(placer.docked().size).toBe(1);
  });

  it('reports no room once every row is full', () => {
    const { desktop, placer } = setup({ compactMaxRows: 0 });
    for (const id of [1, 2, 3]) placer.toggle(desktop.window(id));

    expect(placer.toggle(desktop.window(4))).toEqual({ action: 'no-room' });
    expect(desktop.window(4).frame()).toEqual({ x: 180, y: 180, w: 600, h: 500 });
  });

  it('uses per-app tile sizes', () => {
    const { desktop, placer, ctx } = setup();
    ctx.settings.appOverrides = { app1: { compactW: 300, compactH: 200 } };

    expect(placer.toggle(desktop.window(1))).toEqual({ action: 'docked', row: 0, frame: { x: 0, y: 700, w: 300, h: 200 } });
  });
});
