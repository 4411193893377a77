import { CrossScreenMover } from '../engine/cross_screen';
import { makeRig } from './helpers';

function setup() {
  const rig = makeRig({
    screens: [
      { id: 1, name: 'Built-in Retina Display', frame: { x: 0, y: 0, w: 1920, h: 1080 }, primary: true },
      { id: 2, name: 'DELL U2720Q', frame: { x: 320, y: -800, w: 1280, h: 800 } }
    ],
    windows: [
      { id: 1, app: 'Editor', frame: { x: 100, y: 100, w: 1600, h: 900 } },
      { id: 2, app: 'Notes', frame: { x: 200, y: 200, w: 400, h: 300 } }
    ],
    focusedId: 1
  });
  return { ...rig, mover: new CrossScreenMover(rig.ctx) };
}

describe('CrossScreenMover', () => {
  it('clamps onto a smaller screen and restores size and offset on the way back', () => {
    const { desktop, mover, clock } = setup();
    const win = desktop.window(1);

    expect(mover.moveTo(win, 'center')).toEqual({
      action: 'moved',
      screen: 'DELL U2720Q',
      frame: { x: 320, y: -800, w: 1280, h: 800 }
    });

    clock.now += 5000;
    expect(mover.moveTo(win, 'bottom')).toEqual({
      action: 'moved',
      screen: 'Built-in Retina Display',
      frame: { x: 100, y: 100, w: 1600, h: 900 }
    });
  });

  it('maps the position proportionally when the window fits', () => {
    const { desktop, mover } = setup();
    const outcome = mover.moveTo(desktop.window(2), 'top');
    expect(outcome).toEqual({
      action: 'moved',
      screen: 'DELL U2720Q',
      frame: { x: 320 + (200 / 1920) * 1280, y: -800 + (200 / 1080) * 800, w: 400, h: 300 }
    });
  });

  it('keeps a right-edge window on the right edge', () => {
    const { desktop, mover } = setup();
    const win = desktop.window(2);
    win.setFrame({ x: 1520, y: 200, w: 400, h: 300 });

    const outcome = mover.moveTo(win, 'center');
    expect(outcome.action === 'moved' && outcome.frame.x).toBe(1200);
  });

  it('undoes a move when the same role is repeated promptly', () => {
    const { desktop, mover, clock } = setup();
    const win = desktop.window(1);

    mover.moveTo(win, 'center');
    clock.now += 1000;
    expect(mover.moveTo(win, 'center')).toEqual({ action: 'undone', frame: { x: 100, y: 100, w: 1600, h: 900 } });
  });

  it('forgets the natural size and offset an undone move recorded', () => {
    const { desktop, mover, clock, ctx } = setup();
    const win = desktop.window(1);

    mover.moveTo(win, 'center');
    expect(ctx.memory.has('naturalSize', 1)).toBe(true);
    clock.now += 500;
    expect(mover.moveTo(win, 'center').action).toBe('undone');
    expect(ctx.memory.has('naturalSize', 1)).toBe(false);
    expect(ctx.memory.has('naturalPosition', 1)).toBe(false);

    win.setFrame({ x: 100, y: 100, w: 400, h: 300 });
    mover.moveTo(win, 'center');
    clock.now += 5000;
    const back = mover.moveTo(win, 'bottom');

    expect(back.action).toBe('moved');
    if (back.action !== 'moved') return;
    expect(back.frame.x).toBeCloseTo(100);
    expect(back.frame.y).toBeCloseTo(100);
    expect(back.frame.w).toBe(400);
    expect(back.frame.h).toBe(300);
  });

  it('keeps natural memory the undone move did not create', () => {
    const { desktop, mover, clock, ctx } = setup();
    const win = desktop.window(1);

    ctx.memory.save('naturalSize', 1, { x: 0, y: 0, w: 1700, h: 1000 });
    mover.moveTo(win, 'center');
    clock.now += 500;
    mover.moveTo(win, 'center');

    expect(ctx.memory.get('naturalSize', 1)?.frame.w).toBe(1700);
  });

  it('treats a late repeat as a move to the screen the window is already on', () => {
    const { desktop, mover, clock } = setup();
    const win = desktop.window(1);

    mover.moveTo(win, 'center');
    clock.now += 2000;
    expect(mover.moveTo(win, 'center')).toEqual({ action: 'same-screen' });
  });

  it('does not undo once the window has been moved since', () => {
    const { desktop, mover } = setup();
    const win = desktop.window(1);

    mover.moveTo(win, 'center');
    win.setFrame({ x: 330, y: -790, w: 1200, h: 700 });
    expect(mover.moveTo(win, 'center')).toEqual({ action: 'same-screen' });
  });

  it('reports a role no screen holds', () => {
    const { desktop, mover } = setup();
    expect(mover.moveTo(desktop.window(1), 'left')).toEqual({ action: 'no-target' });
  });
});
