/**
 * engine/index.ts
 *
 * One instance of every engine, sharing a context. The command modules
 * and the pointer controller are built on top of this.
 */

import { EngineContext } from './context';
import { StepEngine } from './step';
import { EdgeResizeEngine } from './edge_resize';
import { CycleEngine } from './cycle';
import { ShrinkToggle } from './shrink';
import { CompactPlacer } from './compact';
import { CrossScreenMover } from './cross_screen';
import { FocusNavigator } from './focus';

export interface Engines {
  ctx: EngineContext;
  step: StepEngine;
  edgeResize: EdgeResizeEngine;
  cycle: CycleEngine;
  shrink: ShrinkToggle;
  compact: CompactPlacer;
  crossScreen: CrossScreenMover;
  focus: FocusNavigator;
}

export function createEngines(ctx: EngineContext): Engines {
  const step = new StepEngine(ctx);
  return {
    ctx,
    step,
    edgeResize: new EdgeResizeEngine(ctx, step),
    cycle: new CycleEngine(ctx),
    shrink: new ShrinkToggle(ctx, step),
    compact: new CompactPlacer(ctx),
    crossScreen: new CrossScreenMover(ctx),
    focus: new FocusNavigator(ctx)
  };
}
