import { z } from 'zod';
import {
  CompactElement,
  ErrorCodes,
  PhoneState,
  RawNode,
  Rect,
} from '../types';

export const MAX_ELEMENTS = 100;
export const MAX_TEXT_LENGTH = 80;
export const MIN_VISIBLE_FRACTION = 0.01;

const ELLIPSIS = '…';

const CONTAINER_CLASS_NAMES = new Set([
  'FrameLayout',
  'View',
  'LinearLayout',
  'ViewPager',
  'RecyclerView',
  'ViewGroup',
]);

const DECORATION_CHARS = /^[|\-_=~]{1,2}$/;

export interface CompactOptions {
  screenBounds?: Rect;
  maxElements?: number;
}

function area(rect: Rect): number {
  const width = rect.right - rect.left;
  const height = rect.bottom - rect.top;
  return width > 0 && height > 0 ? width * height : 0;
}

export function visibleFraction(bounds: Rect, screen: Rect): number {
  const nodeArea = area(bounds);
  if (nodeArea === 0) {
    return 0;
  }

  const overlap = area({
    left: Math.max(bounds.left, screen.left),
    top: Math.max(bounds.top, screen.top),
    right: Math.min(bounds.right, screen.right),
    bottom: Math.min(bounds.bottom, screen.bottom),
  });

  return overlap / nodeArea;
}

function isMeaningfulText(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) {
    return false;
  }
  if (CONTAINER_CLASS_NAMES.has(trimmed)) {
    return false;
  }
  return !DECORATION_CHARS.test(trimmed);
}

function isKeepable(node: RawNode): boolean {
  return (
    isMeaningfulText(node.text) ||
    node.contentDescription.length > 0 ||
    node.resourceId.length > 0 ||
    node.clickable ||
    node.focusable ||
    node.checkable ||
    node.editable
  );
}

export function truncateText(text: string): string {
  return text.length > MAX_TEXT_LENGTH ? `${text.slice(0, MAX_TEXT_LENGTH)}${ELLIPSIS}` : text;
}

export function shortClassName(className: string): string {
  const index = className.lastIndexOf('.');
  return index >= 0 ? className.slice(index + 1) : className;
}

export function flagString(node: RawNode): string {
  let flags = '';
  if (node.clickable) flags += 'c';
  if (node.longClickable) flags += 'l';
  if (node.editable) flags += 'e';
  if (node.focused) flags += 'f';
  if (node.selected) flags += 's';
  if (node.checked) flags += 'k';
  return flags;
}

function toCompactElement(node: RawNode, index: number): CompactElement {
  const label = node.text.trim() ? node.text : node.contentDescription;
  return {
    index,
    displayText: truncateText(label),
    bounds: {
      x: node.bounds.left,
      y: node.bounds.top,
      w: node.bounds.right - node.bounds.left,
      h: node.bounds.bottom - node.bounds.top,
    },
    resourceId: node.resourceId,
    shortClassName: shortClassName(node.className),
    flags: flagString(node),
  };
}

/**
 * Marks which nodes survive the visibility filter. A node that is itself off screen
 * still survives when one of its descendants is emitted, so the output keeps the
 * enclosing context of anything visible.
 *
 * The value stored for a node is how many elements must be emitted, starting with
 * it, before the walk reaches a visible one. It is 1 for a visible node. The return
 * value is the same count for the first surviving node of the subtree, or 0 when
 * nothing in it survives.
 */
function markVisible(node: RawNode, screen: Rect, emitted: Map<RawNode, number>): number {
  let firstChain = 0;
  for (const child of node.children) {
    const chain = markVisible(child, screen, emitted);
    if (firstChain === 0) {
      firstChain = chain;
    }
  }

  if (!isKeepable(node)) {
    return firstChain;
  }
  if (visibleFraction(node.bounds, screen) >= MIN_VISIBLE_FRACTION) {
    emitted.set(node, 1);
    return 1;
  }
  if (firstChain > 0) {
    emitted.set(node, firstChain + 1);
    return firstChain + 1;
  }
  return 0;
}

/**
 * Flattens a tree into at most `maxElements` elements, parents before children.
 * A parent kept only for its descendants is skipped when the cap would cut off
 * every visible element below it. The input is never modified.
 */
export function compact(root: RawNode, options: CompactOptions = {}): CompactElement[] {
  const maxElements = options.maxElements ?? MAX_ELEMENTS;
  const visible = options.screenBounds ? new Map<RawNode, number>() : null;
  if (visible && options.screenBounds) {
    markVisible(root, options.screenBounds, visible);
  }

  const elements: CompactElement[] = [];
  const stack: RawNode[] = [root];

  while (stack.length > 0 && elements.length < maxElements) {
    const node = stack.pop();
    if (!node) break;

    const needed = visible ? visible.get(node) ?? 0 : isKeepable(node) ? 1 : 0;
    if (needed > 0 && needed <= maxElements - elements.length) {
      elements.push(toCompactElement(node, elements.length + 1));
    }

    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }

  return elements;
}

// Prunes a full tree for serialization; children are decided before their parent.
export function filterVisibleTree(node: RawNode, screen: Rect): RawNode | null {
  const children: RawNode[] = [];
  for (const child of node.children) {
    const kept = filterVisibleTree(child, screen);
    if (kept) children.push(kept);
  }

  if (visibleFraction(node.bounds, screen) < MIN_VISIBLE_FRACTION && children.length === 0) {
    return null;
  }

  return { ...node, children };
}

export function formatBounds(element: CompactElement): string {
  const { x, y, w, h } = element.bounds;
  return `${x},${y},${w},${h}`;
}

export function formatCompactElement(element: CompactElement): string {
  let line = `${element.index}. [${element.shortClassName}]`;
  if (element.displayText) line += ` ${element.displayText.replace(/\s*\n\s*/g, ' ')}`;
  line += ` @${formatBounds(element)}`;
  if (element.resourceId) line += ` #${element.resourceId}`;
  if (element.flags) line += ` ${element.flags}`;
  return line;
}

export interface FormatOptions {
  phoneState?: PhoneState;
  screen?: Rect;
}

export function formatCompactTree(elements: CompactElement[], options: FormatOptions = {}): string {
  const lines: string[] = [];
  const { phoneState, screen } = options;

  if (phoneState) {
    lines.push(`App: ${phoneState.currentApp || '?'} (${phoneState.packageName || '?'})`);
    if (phoneState.activityName) {
      lines.push(`Activity: ${phoneState.activityName}`);
    }
    let keyboard = `Keyboard: ${phoneState.keyboardVisible ? 'visible' : 'hidden'}`;
    if (phoneState.focusedElement) {
      const focus = phoneState.focusedElement;
      keyboard += `, focus: [${shortClassName(focus.className)}] ${truncateText(focus.text)}`.trimEnd();
    }
    lines.push(keyboard);
  }

  if (screen) {
    lines.push(`Screen: ${screen.right - screen.left}x${screen.bottom - screen.top}`);
  }

  if (lines.length > 0) {
    lines.push('');
  }

  if (elements.length === 0) {
    lines.push('(no interactive elements)');
  } else {
    for (const element of elements) {
      lines.push(formatCompactElement(element));
    }
  }

  return lines.join('\n');
}

const RectSchema = z.object({
  left: z.number(),
  top: z.number(),
  right: z.number(),
  bottom: z.number(),
});

export const RawNodeSchema: z.ZodType<RawNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    text: z.string().default(''),
    contentDescription: z.string().default(''),
    resourceId: z.string().default(''),
    className: z.string().default(''),
    packageName: z.string().default(''),
    bounds: RectSchema,
    clickable: z.boolean().default(false),
    longClickable: z.boolean().default(false),
    editable: z.boolean().default(false),
    focused: z.boolean().default(false),
    selected: z.boolean().default(false),
    checked: z.boolean().default(false),
    checkable: z.boolean().default(false),
    scrollable: z.boolean().default(false),
    focusable: z.boolean().default(false),
    enabled: z.boolean().default(true),
    children: z.array(RawNodeSchema).default([]),
  })
);

const WireTreeSchema = z.union([RawNodeSchema, z.object({ a11y_tree: RawNodeSchema })]);

export type CompactJsonResult =
  | { ok: true; elements: CompactElement[] }
  | { ok: false; error: { code: typeof ErrorCodes.MALFORMED_INPUT; message: string } };

function malformed(message: string): CompactJsonResult {
  return { ok: false, error: { code: ErrorCodes.MALFORMED_INPUT, message } };
}

// Wire variant: takes a serialized tree and never throws.
export function compactTreeJson(json: string, options: CompactOptions = {}): CompactJsonResult {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    return malformed(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = WireTreeSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return malformed(`Invalid tree: ${where}${issue ? issue.message : 'unrecognized shape'}`);
  }

  const root = 'a11y_tree' in parsed.data ? parsed.data.a11y_tree : parsed.data;
  return { ok: true, elements: compact(root, options) };
}
