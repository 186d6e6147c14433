import { DRAG_DURATION_MS, ScrollDirection, centerOf, scrollPath } from '../gestures';
import { OperationFailedError } from '../types';
import { ElementMatch, describeSelector, findElement } from './elementFinder';
import {
  ElementDragInputSchema,
  ElementDragToolSchema,
  ElementInputSchema,
  ElementLongPressInputSchema,
  ElementLongPressToolSchema,
  ElementScrollInputSchema,
  ElementScrollToolSchema,
  ElementSetTextInputSchema,
  ElementSetTextToolSchema,
  ElementToggleInputSchema,
  ElementToggleToolSchema,
  ElementToolSchema,
  SelectorInput,
} from './schemas';
import {
  RegisteredTool,
  ToolContext,
  ToolOutcome,
  captureScreenText,
  defineTool,
  expectSuccess,
  jsonOutcome,
  settle,
} from './registry';

const FOCUS_DELAY_MS = 100;

async function locate(context: ToolContext, selector: SelectorInput): Promise<ElementMatch> {
  const root = await context.dispatcher.withDevice(device => device.snapshotTree());
  if (!root) {
    throw new OperationFailedError('No active window');
  }
  const match = findElement(root, selector);
  if (!match) {
    throw new OperationFailedError(`Element not found: ${describeSelector(selector)}`, {
      selector,
    });
  }
  return match;
}

function describeElement(match: ElementMatch): Record<string, unknown> {
  const { node } = match;
  const center = centerOf(node.bounds);
  return {
    resource_id: node.resourceId,
    text: node.text,
    content_description: node.contentDescription,
    class_name: node.className,
    bounds: { ...node.bounds, centerX: center.x, centerY: center.y },
    clickable: node.clickable,
    scrollable: node.scrollable,
    checkable: node.checkable,
    checked: node.checked,
    enabled: node.enabled,
    focusable: node.focusable,
    focused: node.focused,
    matched_by: match.matchedBy,
  };
}

// Runs an action, waits for the UI to settle and attaches the resulting screen.
async function actAndDescribe(
  context: ToolContext,
  message: string,
  action: () => Promise<void>
): Promise<ToolOutcome> {
  await action();
  await settle(context);

  const body: Record<string, unknown> = { success: true, message };
  try {
    body.screen_state = await captureScreenText(context.dispatcher);
  } catch (error) {
    body.screen_state_error = error instanceof Error ? error.message : String(error);
  }
  return jsonOutcome(body);
}

async function dispatchOrThrow(
  context: ToolContext,
  action: string,
  params: Record<string, unknown>
): Promise<void> {
  expectSuccess(await context.dispatcher.dispatch(action, params));
}

function requireEnabled(match: ElementMatch): void {
  if (!match.node.enabled) {
    throw new OperationFailedError('Element is not enabled', describeElement(match));
  }
}

function toScrollDirection(direction: string): ScrollDirection {
  switch (direction) {
    case 'backward':
    case 'up':
      return 'up';
    case 'left':
      return 'left';
    case 'right':
      return 'right';
    default:
      return 'down';
  }
}

export const elementTools: RegisteredTool[] = [
  defineTool({
    name: 'element.find',
    description: 'Find an element by resource_id, text, content_description or class_name',
    inputSchema: ElementToolSchema,
    input: ElementInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      return jsonOutcome({ success: true, element: describeElement(match) });
    },
  }),
  defineTool({
    name: 'element.click',
    description: 'Find an element and tap its center',
    inputSchema: ElementToolSchema,
    input: ElementInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      requireEnabled(match);
      return actAndDescribe(context, 'Element clicked successfully', () =>
        dispatchOrThrow(context, 'tap', { ...centerOf(match.node.bounds) })
      );
    },
  }),
  defineTool({
    name: 'element.double_tap',
    description: 'Find an element and double-tap its center',
    inputSchema: ElementToolSchema,
    input: ElementInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      requireEnabled(match);
      return actAndDescribe(context, 'Element double tapped successfully', () =>
        dispatchOrThrow(context, 'double_tap', { ...centerOf(match.node.bounds) })
      );
    },
  }),
  defineTool({
    name: 'element.long_press',
    description: 'Find an element and press and hold its center',
    inputSchema: ElementLongPressToolSchema,
    input: ElementLongPressInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      requireEnabled(match);
      const params: Record<string, unknown> = { ...centerOf(match.node.bounds) };
      if (args.duration !== undefined) params.duration = args.duration;
      return actAndDescribe(context, 'Element long pressed successfully', () =>
        dispatchOrThrow(context, 'long_press', params)
      );
    },
  }),
  defineTool({
    name: 'element.scroll',
    description: 'Scroll inside a scrollable element',
    inputSchema: ElementScrollToolSchema,
    input: ElementScrollInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      if (!match.node.scrollable) {
        throw new OperationFailedError('Element is not scrollable', describeElement(match));
      }
      const { start, end } = scrollPath(match.node.bounds, toScrollDirection(args.direction));
      return actAndDescribe(context, `Element scrolled ${args.direction} successfully`, () =>
        dispatchOrThrow(context, 'swipe', {
          startX: start.x,
          startY: start.y,
          endX: end.x,
          endY: end.y,
        })
      );
    },
  }),
  defineTool({
    name: 'element.set_text',
    description: 'Focus an input element and enter text into it',
    inputSchema: ElementSetTextToolSchema,
    input: ElementSetTextInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      requireEnabled(match);
      return actAndDescribe(context, 'Text set successfully', async () => {
        if (!match.node.focused) {
          await dispatchOrThrow(context, 'tap', { ...centerOf(match.node.bounds) });
          await new Promise(resolve => setTimeout(resolve, Math.min(FOCUS_DELAY_MS, context.settleMs)));
        }
        await dispatchOrThrow(context, 'input', {
          base64_text: Buffer.from(args.new_text, 'utf8').toString('base64'),
          clear: args.clear,
        });
      });
    },
  }),
  defineTool({
    name: 'element.drag',
    description: 'Drag an element from its center to a target point',
    inputSchema: ElementDragToolSchema,
    input: ElementDragInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      const start = centerOf(match.node.bounds);
      return actAndDescribe(
        context,
        `Element dragged successfully from (${start.x},${start.y}) to (${args.target_x},${args.target_y})`,
        () =>
          dispatchOrThrow(context, 'swipe', {
            startX: start.x,
            startY: start.y,
            endX: args.target_x,
            endY: args.target_y,
            duration: DRAG_DURATION_MS,
          })
      );
    },
  }),
  defineTool({
    name: 'element.toggle_checkbox',
    description: 'Toggle a checkable element, or set it to a given state',
    inputSchema: ElementToggleToolSchema,
    input: ElementToggleInputSchema,
    run: async (args, context) => {
      const match = await locate(context, args);
      if (!match.node.checkable) {
        throw new OperationFailedError('Element is not checkable', describeElement(match));
      }
      requireEnabled(match);
      if (args.checked !== undefined && args.checked === match.node.checked) {
        return jsonOutcome({
          success: true,
          message: `Element already ${args.checked ? 'checked' : 'unchecked'}`,
          checked: match.node.checked,
        });
      }
      return actAndDescribe(
        context,
        `Element ${match.node.checked ? 'unchecked' : 'checked'} successfully`,
        () => dispatchOrThrow(context, 'tap', { ...centerOf(match.node.bounds) })
      );
    },
  }),
];
