import { CycleEngine, HalfThirdStep } from '../engine/cycle';
import { SINGLE_SCREEN, makeRig } from './helpers';

function setup() {
  const rig = makeRig({
    screens: SINGLE_SCREEN,
    windows: [{ id: 1, app: 'Editor', frame: { x: 100, y: 100, w: 600, h: 400 } }],
    focusedId: 1
  });
  return { ...rig, cycle: new CycleEngine(rig.ctx), win: rig.desktop.window(1) };
}

describe('CycleEngine.toggleCenter', () => {
  it('centres vertically, then horizontally, then restores', () => {
    const { cycle, win } = setup();

    expect(cycle.toggleCenter(win)).toEqual({ step: 'center-vertical', frame: { x: 100, y: 250, w: 600, h: 400 } });
    expect(cycle.toggleCenter(win)).toEqual({ step: 'center-horizontal', frame: { x: 450, y: 250, w: 600, h: 400 } });
    expect(cycle.toggleCenter(win)).toEqual({ step: 'restore', frame: { x: 100, y: 100, w: 600, h: 400 } });
    expect(cycle.toggleCenter(win).step).toBe('center-vertical');
  });

  it('does nothing for a centred window with no saved frame', () => {
    const { cycle, win } = setup();
    win.setFrame({ x: 450, y: 250, w: 600, h: 400 });
    expect(cycle.toggleCenter(win)).toEqual({ step: 'none', frame: { x: 450, y: 250, w: 600, h: 400 } });
  });
});

describe('CycleEngine.toggleMaximize', () => {
  it('maximizes height, then fully, then restores', () => {
    const { cycle, win } = setup();

    expect(cycle.toggleMaximize(win)).toEqual({ step: 'max-height', frame: { x: 100, y: 0, w: 600, h: 900 } });
    expect(cycle.toggleMaximize(win)).toEqual({ step: 'max-full', frame: { x: 0, y: 0, w: 1500, h: 900 } });
    expect(cycle.toggleMaximize(win)).toEqual({ step: 'restore', frame: { x: 100, y: 100, w: 600, h: 400 } });
  });

  it('keeps the centre undo when maximizing in between', () => {
    const { cycle, win, ctx } = setup();

    cycle.toggleCenter(win);
    cycle.toggleMaximize(win);
    expect(ctx.memory.get('center', 1)?.frame).toEqual({ x: 100, y: 100, w: 600, h: 400 });
    expect(ctx.memory.get('maximize', 1)?.frame).toEqual({ x: 100, y: 250, w: 600, h: 400 });
  });
});

describe('CycleEngine.cycleHalfThird', () => {
  it('walks the left cycle in order and back to the original frame', () => {
    const { cycle, win } = setup();
    const steps: HalfThirdStep[] = [];
    const frames = [];
    for (let i = 0; i < 5; i++) {
      const outcome = cycle.cycleHalfThird(win, 'left');
      steps.push(outcome.step);
      frames.push(outcome.frame);
    }

    expect(steps).toEqual(['half', 'third', 'mid-third', 'two-thirds', 'restore']);
    expect(frames).toEqual([
      { x: 0, y: 0, w: 750, h: 900 },
      { x: 0, y: 0, w: 500, h: 900 },
      { x: 500, y: 0, w: 500, h: 900 },
      { x: 0, y: 0, w: 1000, h: 900 },
      { x: 100, y: 100, w: 600, h: 400 }
    ]);
  });

  it('anchors the right cycle to the right edge', () => {
    const { cycle, win } = setup();
    expect(cycle.cycleHalfThird(win, 'right').frame).toEqual({ x: 750, y: 0, w: 750, h: 900 });
    expect(cycle.cycleHalfThird(win, 'right').frame).toEqual({ x: 1000, y: 0, w: 500, h: 900 });
  });

  it('keeps the pre-cycle frame when switching sides mid-cycle', () => {
    const { cycle, win } = setup();

    cycle.cycleHalfThird(win, 'left');
    expect(cycle.cycleHalfThird(win, 'right')).toEqual({ step: 'half', frame: { x: 750, y: 0, w: 750, h: 900 } });
    cycle.cycleHalfThird(win, 'right');
    cycle.cycleHalfThird(win, 'right');
    cycle.cycleHalfThird(win, 'right');
    expect(cycle.cycleHalfThird(win, 'right')).toEqual({ step: 'restore', frame: { x: 100, y: 100, w: 600, h: 400 } });
  });

  it('re-enters the cycle after the window is moved by hand', () => {
    const { cycle, win } = setup();

    cycle.cycleHalfThird(win, 'left');
    win.setFrame({ x: 200, y: 150, w: 700, h: 500 });
    expect(cycle.cycleHalfThird(win, 'left').step).toBe('half');
    cycle.cycleHalfThird(win, 'left');
    cycle.cycleHalfThird(win, 'left');
    cycle.cycleHalfThird(win, 'left');
    expect(cycle.cycleHalfThird(win, 'left').frame).toEqual({ x: 200, y: 150, w: 700, h: 500 });
  });
});
