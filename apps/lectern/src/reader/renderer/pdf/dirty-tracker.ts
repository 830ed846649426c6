/**
 * Dirty tracking for the render loop.
 *
 * The tracker holds the state the last produced frame was built from and
 * diffs the current state against it. Anything that differs, or any reason
 * raised explicitly through `markDirty`, makes the frame dirty until the next
 * `commit`.
 */

import type { TextDisplayMode } from '../../../config/viewer-config';
import type { DisplayMode } from './render-session';
import type { CellSize } from './viewport-controller';
import type { ViewportState } from './viewport-state';

export type DirtyReason =
  | 'initial'
  | 'page'
  | 'zoom'
  | 'pan'
  | 'frame'
  | 'mode'
  | 'text-mode'
  | 'scroll'
  | 'generation'
  | 'cell-size'
  | 'reset';

export interface FrameState {
  pageIndex: number;
  mode: DisplayMode;
  textMode: TextDisplayMode;
  viewport: ViewportState;
  textScroll: number;
  generation: number;
  cell: CellSize;
}

export interface DirtyFlag {
  dirty: boolean;
  reasons: DirtyReason[];
}

export function diffFrameState(previous: FrameState | null, current: FrameState): DirtyReason[] {
  if (!previous) return ['initial'];

  const reasons: DirtyReason[] = [];
  if (previous.pageIndex !== current.pageIndex) reasons.push('page');
  if (previous.viewport.zoomPercent !== current.viewport.zoomPercent) reasons.push('zoom');
  if (previous.viewport.panX !== current.viewport.panX || previous.viewport.panY !== current.viewport.panY) {
    reasons.push('pan');
  }
  if (
    previous.viewport.frameWidthCells !== current.viewport.frameWidthCells ||
    previous.viewport.frameHeightCells !== current.viewport.frameHeightCells
  ) {
    reasons.push('frame');
  }
  if (previous.mode !== current.mode) reasons.push('mode');
  if (previous.textMode !== current.textMode) reasons.push('text-mode');
  if (previous.textScroll !== current.textScroll) reasons.push('scroll');
  if (previous.generation !== current.generation) reasons.push('generation');
  if (previous.cell.widthPx !== current.cell.widthPx || previous.cell.heightPx !== current.cell.heightPx) {
    reasons.push('cell-size');
  }
  return reasons;
}

export class DirtyTracker {
  private committed: FrameState | null = null;
  private forced = new Set<DirtyReason>();

  markDirty(reason: DirtyReason): void {
    this.forced.add(reason);
  }

  check(current: FrameState): DirtyFlag {
    const reasons = diffFrameState(this.committed, current);
    for (const reason of this.forced) {
      if (!reasons.includes(reason)) reasons.push(reason);
    }
    return { dirty: reasons.length > 0, reasons };
  }

  isDirty(current: FrameState): boolean {
    return this.check(current).dirty;
  }

  /**
   * Record that a frame reflecting `state` has been produced. Explicit
   * reasons are cleared only if listed in `handled`, or all when omitted.
   */
  commit(state: FrameState, handled?: readonly DirtyReason[]): void {
    this.committed = {
      ...state,
      viewport: { ...state.viewport },
      cell: { ...state.cell },
    };
    if (handled) {
      for (const reason of handled) this.forced.delete(reason);
    } else {
      this.forced.clear();
    }
  }

  reset(): void {
    this.committed = null;
    this.forced.clear();
  }
}
