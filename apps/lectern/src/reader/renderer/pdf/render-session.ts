/**
 * Render Session Manager
 *
 * Each frame request opens a session that snapshots the state it was built
 * from. Work that completes after a newer session was opened is stale: its
 * result is dropped instead of being shown or committed.
 *
 * Session ids are monotonic for the lifetime of the manager; nothing is
 * cancelled mid-call.
 */

import type { DirtyReason, FrameState } from './dirty-tracker';

export type DisplayMode = 'image' | 'text';

export interface RenderSession {
  readonly sessionId: number;
  readonly snapshot: FrameState;
  /** Why the frame was requested */
  readonly reasons: readonly DirtyReason[];
}

export class RenderSessionManager {
  private sessionCounter = 0;
  private currentSession: RenderSession | null = null;

  createSession(snapshot: FrameState, reasons: readonly DirtyReason[]): RenderSession {
    this.sessionCounter++;
    this.currentSession = {
      sessionId: this.sessionCounter,
      snapshot: { ...snapshot, viewport: { ...snapshot.viewport }, cell: { ...snapshot.cell } },
      reasons: [...reasons],
    };
    return this.currentSession;
  }

  /**
   * True while no newer session has been opened.
   */
  isCurrent(session: RenderSession): boolean {
    return this.currentSession?.sessionId === session.sessionId;
  }

  /**
   * Forget the current session so any in-flight work becomes stale.
   * Ids keep counting up.
   */
  invalidate(): void {
    this.currentSession = null;
  }
}
