import {
  EmptyInputSchema,
  EmptyToolSchema,
  GlobalActionInputSchema,
  GlobalActionToolSchema,
  InputTextInputSchema,
  InputTextToolSchema,
  KeyInputSchema,
  KeyToolSchema,
  LaunchAppInputSchema,
  LaunchAppToolSchema,
  LongPressInputSchema,
  LongPressToolSchema,
  PackagesInputSchema,
  PackagesToolSchema,
  ScreenDumpInputSchema,
  ScreenDumpToolSchema,
  ScreenshotInputSchema,
  ScreenshotToolSchema,
  SwipeInputSchema,
  SwipeToolSchema,
  TapInputSchema,
  TapToolSchema,
  WaitForInputSchema,
  WaitForToolSchema,
} from './schemas';
import {
  RegisteredTool,
  captureScreenText,
  defineTool,
  dispatchTool,
  jsonOutcome,
} from './registry';
import { waitForCondition } from './wait';

export const deviceTools: RegisteredTool[] = [
  defineTool({
    name: 'tap',
    description: 'Tap the screen at pixel coordinates',
    inputSchema: TapToolSchema,
    input: TapInputSchema,
    run: (args, context) => dispatchTool(context, 'tap', args),
  }),
  defineTool({
    name: 'double_tap',
    description: 'Double-tap the screen at pixel coordinates',
    inputSchema: TapToolSchema,
    input: TapInputSchema,
    run: (args, context) => dispatchTool(context, 'double_tap', args),
  }),
  defineTool({
    name: 'long_press',
    description: 'Press and hold at pixel coordinates (default 1000ms)',
    inputSchema: LongPressToolSchema,
    input: LongPressInputSchema,
    run: (args, context) => dispatchTool(context, 'long_press', args),
  }),
  defineTool({
    name: 'swipe',
    description: 'Swipe from one point to another (default 300ms)',
    inputSchema: SwipeToolSchema,
    input: SwipeInputSchema,
    run: (args, context) => dispatchTool(context, 'swipe', args),
  }),
  defineTool({
    name: 'text.input',
    aliases: ['input'],
    description: 'Type text into the focused input field',
    inputSchema: InputTextToolSchema,
    input: InputTextInputSchema,
    run: (args, context) =>
      dispatchTool(context, 'input', {
        base64_text: Buffer.from(args.text, 'utf8').toString('base64'),
        clear: args.clear,
      }),
  }),
  defineTool({
    name: 'input.clear',
    aliases: ['clear'],
    description: 'Clear the focused input field',
    inputSchema: EmptyToolSchema,
    input: EmptyInputSchema,
    run: (_args, context) => dispatchTool(context, 'clear', {}),
  }),
  defineTool({
    name: 'key.send',
    aliases: ['key'],
    description: 'Send an Android key event',
    inputSchema: KeyToolSchema,
    input: KeyInputSchema,
    run: (args, context) => dispatchTool(context, 'key', args),
  }),
  defineTool({
    name: 'launch_app',
    description: 'Launch an app by package name, optionally a specific activity',
    inputSchema: LaunchAppToolSchema,
    input: LaunchAppInputSchema,
    run: (args, context) => dispatchTool(context, 'app', args),
  }),
  defineTool({
    name: 'global_action',
    description: 'Perform a system action such as back, home or recents',
    inputSchema: GlobalActionToolSchema,
    input: GlobalActionInputSchema,
    run: (args, context) => dispatchTool(context, 'global', args),
  }),
  defineTool({
    name: 'screenshot',
    description: 'Capture a PNG screenshot of the device screen',
    inputSchema: ScreenshotToolSchema,
    input: ScreenshotInputSchema,
    run: (args, context) => dispatchTool(context, 'screenshot', args),
  }),
  defineTool({
    name: 'screen.dump',
    description:
      'Read the current screen as a compact list of elements: [Class] text @x,y,w,h #resource-id flags',
    inputSchema: ScreenDumpToolSchema,
    input: ScreenDumpInputSchema,
    run: async (args, context) => ({
      text: await captureScreenText(context.dispatcher, { filter: args.filter }),
      isError: false,
    }),
  }),
  defineTool({
    name: 'packages.list',
    description: 'List installed packages',
    inputSchema: PackagesToolSchema,
    input: PackagesInputSchema,
    run: (args, context) => dispatchTool(context, 'packages', args),
  }),
  defineTool({
    name: 'wait_for',
    description: 'Wait until an element appears (or disappears) on screen',
    inputSchema: WaitForToolSchema,
    input: WaitForInputSchema,
    run: async (args, context) => {
      const outcome = await waitForCondition(
        () => context.dispatcher.withDevice(device => device.snapshotTree()),
        {
          selector: {
            text: args.text,
            resource_id: args.resource_id,
            content_description: args.content_description,
          },
          gone: args.gone,
        },
        {
          intervalMs: args.interval_ms ?? context.config.get('waitIntervalMs'),
          timeoutMs: args.timeout_ms ?? context.config.get('waitTimeoutMs'),
          signal: context.signal,
        }
      );
      return jsonOutcome({
        success: true,
        message: args.gone ? 'Element is gone' : 'Element found',
        elapsed_ms: outcome.elapsedMs,
        polls: outcome.polls,
      });
    },
  }),
];
