import { buildScreenMap, describeScreenMap, screenNameMatches } from '../engine/screen_map';
import { ScreenSpec, VirtualDesktop } from '../platform/virtual_desktop';

const builtIn: ScreenSpec = { id: 1, name: 'Built-in Retina Display', frame: { x: 0, y: 0, w: 1920, h: 1080 } };
const above: ScreenSpec = { id: 2, name: 'DELL U2720Q', frame: { x: 320, y: -800, w: 1280, h: 800 } };
const higher: ScreenSpec = { id: 3, name: 'LG UltraFine', frame: { x: 320, y: -1700, w: 1280, h: 900 } };
const west: ScreenSpec = { id: 4, name: 'Side Left', frame: { x: -1600, y: 0, w: 1600, h: 900 } };
const east: ScreenSpec = { id: 5, name: 'Side Right', frame: { x: 1920, y: 0, w: 1600, h: 900 } };

function desktopOf(...screens: ScreenSpec[]): VirtualDesktop {
  return new VirtualDesktop({ screens, windows: [] });
}

describe('buildScreenMap', () => {
  it('anchors on the built-in display even when it is not primary', () => {
    const desktop = desktopOf({ ...above, primary: true }, builtIn);
    expect(describeScreenMap(buildScreenMap(desktop))).toEqual({
      bottom: 'Built-in Retina Display',
      center: 'DELL U2720Q',
      top: 'DELL U2720Q'
    });
  });

  it('stacks the column nearest first and splits the sides', () => {
    const desktop = desktopOf(higher, east, builtIn, west, above);
    expect(describeScreenMap(buildScreenMap(desktop))).toEqual({
      bottom: 'Built-in Retina Display',
      center: 'DELL U2720Q',
      top: 'LG UltraFine',
      left: 'Side Left',
      right: 'Side Right'
    });
  });

  it('falls back to the primary screen without a built-in one', () => {
    const desktop = desktopOf(
      { id: 1, name: 'Office A', frame: { x: 0, y: 0, w: 1920, h: 1080 }, primary: true },
      { id: 2, name: 'Office B', frame: { x: 1920, y: 0, w: 1920, h: 1080 } }
    );
    expect(describeScreenMap(buildScreenMap(desktop))).toEqual({ bottom: 'Office A', left: 'Office B' });
  });

  it('applies name overrides before the positional rules', () => {
    const desktop = desktopOf(builtIn, above, higher);
    const map = buildScreenMap(desktop, { center: 'ultrafine', nonsense: 'DELL' });
    expect(describeScreenMap(map)).toEqual({
      bottom: 'Built-in Retina Display',
      center: 'LG UltraFine',
      top: 'DELL U2720Q'
    });
  });
});

describe('screenNameMatches', () => {
  it('matches regular expressions case-insensitively', () => {
    expect(screenNameMatches('DELL U2720Q', '^dell')).toBe(true);
    expect(screenNameMatches('DELL U2720Q', 'lg')).toBe(false);
  });

  it('treats an invalid expression as a substring', () => {
    expect(screenNameMatches('Monitor 2', '(2')).toBe(false);
    expect(screenNameMatches('Monitor (2', '(2')).toBe(true);
  });
});
