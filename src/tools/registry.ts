import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ConfigStore } from '../config';
import { CommandDispatcher, DispatchResult, JsonBody, Params, toJsonBody } from '../dispatcher';
import { compact, formatCompactTree } from '../tree/compactor';
import { OperationFailedError, RelayError } from '../types';
import { binaryToBase64, getPNGDimensions, isPNG } from '../utils/screenshot';

export interface ToolContext {
  dispatcher: CommandDispatcher;
  config: ConfigStore;
  // Pause after a UI action before reading back the screen.
  settleMs: number;
  signal?: AbortSignal;
}

export interface ToolOutcome {
  text: string;
  isError: boolean;
  image?: { data: string; mimeType: string };
}

export interface RegisteredTool {
  name: string;
  aliases: string[];
  description: string;
  inputSchema: Tool['inputSchema'];
  call(args: unknown, context: ToolContext): Promise<ToolOutcome>;
}

export function defineTool<S extends z.ZodTypeAny>(definition: {
  name: string;
  aliases?: string[];
  description: string;
  inputSchema: Tool['inputSchema'];
  input: S;
  run: (args: z.output<S>, context: ToolContext) => Promise<ToolOutcome>;
}): RegisteredTool {
  return {
    name: definition.name,
    aliases: definition.aliases ?? [],
    description: definition.description,
    inputSchema: definition.inputSchema,
    call: (args, context) => definition.run(definition.input.parse(args ?? {}), context),
  };
}

export function jsonOutcome(body: JsonBody): ToolOutcome {
  return { text: JSON.stringify(body), isError: body.success === false };
}

export function fromDispatch(result: DispatchResult): ToolOutcome {
  if (result.kind === 'binary') {
    const summary: JsonBody = { success: true, mimeType: result.mimeType, size: result.data.length };
    if (result.data.length >= 24 && isPNG(result.data)) {
      Object.assign(summary, getPNGDimensions(result.data));
    }
    return {
      text: JSON.stringify(summary),
      isError: false,
      image: { data: binaryToBase64(result.data), mimeType: result.mimeType },
    };
  }
  return jsonOutcome(toJsonBody(result));
}

export async function dispatchTool(
  context: ToolContext,
  action: string,
  params: Params
): Promise<ToolOutcome> {
  return fromDispatch(await context.dispatcher.dispatch(action, params));
}

// Unwraps a dispatch result, turning an error result back into a thrown error.
export function expectSuccess(result: DispatchResult): Extract<DispatchResult, { kind: 'success' }> {
  if (result.kind === 'error') {
    throw new RelayError(result.code, result.message);
  }
  if (result.kind !== 'success') {
    throw new OperationFailedError(`Unexpected ${result.kind} result`);
  }
  return result;
}

export async function settle(context: ToolContext): Promise<void> {
  if (context.settleMs > 0) {
    await new Promise(resolve => setTimeout(resolve, context.settleMs));
  }
}

/**
 * Compacted text view of the current screen: phone state header, then one line per
 * element.
 */
export async function captureScreenText(
  dispatcher: CommandDispatcher,
  options: { filter?: boolean } = {}
): Promise<string> {
  return dispatcher.withDevice(async device => {
    const root = await device.snapshotTree();
    if (!root) {
      throw new OperationFailedError('No active window');
    }
    const screen = await device.getScreenBounds();
    const phoneState = await device.getPhoneState();
    const elements = compact(root, {
      screenBounds: options.filter === false ? undefined : screen,
    });
    return formatCompactTree(elements, { phoneState, screen });
  });
}
