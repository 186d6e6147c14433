import { GestureStroke, Point, Rect } from './types';

export const TAP_DURATION_MS = 50;
export const DOUBLE_TAP_GAP_MS = 100;
export const LONG_PRESS_DURATION_MS = 1000;
export const SWIPE_DURATION_MS = 300;
export const MIN_SWIPE_DURATION_MS = 10;
export const MAX_SWIPE_DURATION_MS = 5000;
export const DRAG_DURATION_MS = 500;

export type ScrollDirection = 'up' | 'down' | 'left' | 'right';

export function clampSwipeDuration(durationMs: number): number {
  return Math.min(MAX_SWIPE_DURATION_MS, Math.max(MIN_SWIPE_DURATION_MS, durationMs));
}

export function tapGesture(x: number, y: number): GestureStroke[] {
  return [{ points: [{ x, y }], startTime: 0, duration: TAP_DURATION_MS }];
}

// Both taps go out as one gesture so nothing can interleave between them.
export function doubleTapGesture(x: number, y: number): GestureStroke[] {
  return [
    { points: [{ x, y }], startTime: 0, duration: TAP_DURATION_MS },
    {
      points: [{ x, y }],
      startTime: TAP_DURATION_MS + DOUBLE_TAP_GAP_MS,
      duration: TAP_DURATION_MS,
    },
  ];
}

export function longPressGesture(
  x: number,
  y: number,
  durationMs: number = LONG_PRESS_DURATION_MS
): GestureStroke[] {
  return [{ points: [{ x, y }], startTime: 0, duration: Math.max(1, durationMs) }];
}

export function swipeGesture(
  start: Point,
  end: Point,
  durationMs: number = SWIPE_DURATION_MS
): GestureStroke[] {
  return [{ points: [start, end], startTime: 0, duration: clampSwipeDuration(durationMs) }];
}

export function centerOf(bounds: Rect): Point {
  return {
    x: Math.round((bounds.left + bounds.right) / 2),
    y: Math.round((bounds.top + bounds.bottom) / 2),
  };
}

/**
 * Start and end points for a scroll inside `bounds`. Scrolling "down" reveals content
 * below, so the finger moves up.
 */
export function scrollPath(bounds: Rect, direction: ScrollDirection): { start: Point; end: Point } {
  const width = bounds.right - bounds.left;
  const height = bounds.bottom - bounds.top;
  const center = centerOf(bounds);
  const near = (origin: number, size: number) => Math.round(origin + size * 0.3);
  const far = (origin: number, size: number) => Math.round(origin + size * 0.7);

  switch (direction) {
    case 'down':
      return {
        start: { x: center.x, y: far(bounds.top, height) },
        end: { x: center.x, y: near(bounds.top, height) },
      };
    case 'up':
      return {
        start: { x: center.x, y: near(bounds.top, height) },
        end: { x: center.x, y: far(bounds.top, height) },
      };
    case 'right':
      return {
        start: { x: far(bounds.left, width), y: center.y },
        end: { x: near(bounds.left, width), y: center.y },
      };
    case 'left':
      return {
        start: { x: near(bounds.left, width), y: center.y },
        end: { x: far(bounds.left, width), y: center.y },
      };
  }
}
