import { Highlight, TransientHighlighter } from '../platform/highlight';

describe('TransientHighlighter', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('shows a highlight with its emphasised edges and removes it after the duration', () => {
    const seen: (Highlight | null)[] = [];
    const highlighter = new TransientHighlighter(300, h => seen.push(h));

    highlighter.flash({ x: 0, y: 0, w: 100, h: 100 }, 'up');
    expect(highlighter.current()).toEqual({ frame: { x: 0, y: 0, w: 100, h: 100 }, edges: ['top'] });

    jest.advanceTimersByTime(299);
    expect(highlighter.current()).not.toBeNull();
    jest.advanceTimersByTime(1);
    expect(highlighter.current()).toBeNull();
    expect(seen[seen.length - 1]).toBeNull();
  });

  it('replaces a highlight that is still showing', () => {
    const highlighter = new TransientHighlighter(300);
    highlighter.flash({ x: 0, y: 0, w: 100, h: 100 });
    jest.advanceTimersByTime(200);
    highlighter.flash({ x: 50, y: 50, w: 100, h: 100 }, ['left', 'bottom']);
    jest.advanceTimersByTime(200);

    expect(highlighter.current()).toEqual({ frame: { x: 50, y: 50, w: 100, h: 100 }, edges: ['left', 'bottom'] });
  });
});
