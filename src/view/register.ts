/**
 * @module view/register
 *
 * Single-slot register of the most recently reported map viewport.
 *
 * Writers never modify the stored value; they build a new frozen
 * {@link ViewState} and swap the reference. A reader therefore holds either
 * the previous or the next state as a whole. There is no history and no
 * change notification: consumers poll.
 */

import type { ViewBounds, ViewState } from '../types.js';

export class ViewStateRegister {
  private state: ViewState | null = null;
  private readonly now: () => number;

  /** @param now - Clock for `updatedAt`. */
  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Replace the current view. The last write wins. */
  setView(bounds: ViewBounds, zoom: number | null): ViewState {
    const next: ViewState = Object.freeze({
      bounds: Object.freeze({
        north: bounds.north,
        south: bounds.south,
        east: bounds.east,
        west: bounds.west,
      }),
      zoom,
      updatedAt: this.now(),
    });
    this.state = next;
    return next;
  }

  /** The current view, or `null` before the first write. */
  getView(): ViewState | null {
    return this.state;
  }
}
