import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
  CallToolRequest,
  CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { ConfigStore } from './config';
import { CommandDispatcher } from './dispatcher';
import { allTools, findTool, isToolEnabled, RegisteredTool, ToolOutcome } from './tools';
import { RelayError, ErrorCodes } from './types';
import { errorBody, formatErrorForResponse } from './utils/error';
import { SERVER_NAME, SERVER_VERSION } from './version';

export const DEFAULT_SETTLE_MS = 400;

export interface ToolServerOptions {
  dispatcher: CommandDispatcher;
  config: ConfigStore;
  tools?: RegisteredTool[];
  settleMs?: number;
}

export function toCallToolResult(outcome: ToolOutcome): CallToolResult {
  const content: CallToolResult['content'] = [{ type: 'text', text: outcome.text }];
  if (outcome.image) {
    content.push({ type: 'image', data: outcome.image.data, mimeType: outcome.image.mimeType });
  }
  return outcome.isError ? { content, isError: true } : { content };
}

/**
 * JSON-RPC server role: answers initialize, tools/list and tools/call. One instance
 * serves one session; connect it to a transport per peer.
 */
export class ToolServer {
  readonly server: Server;
  private readonly tools: RegisteredTool[];
  private readonly settleMs: number;

  constructor(private readonly options: ToolServerOptions) {
    this.tools = options.tools ?? allTools;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
  }

  private enabledSet(): string[] | null {
    return this.options.config.get('mcpToolsEnabled');
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const enabled = this.enabledSet();
      const tools: Tool[] = this.tools
        .filter(tool => isToolEnabled(tool, enabled))
        .map(tool => ({
          name: tool.name,
          description: tool.description,
          inputSchema: tool.inputSchema,
        }));

      return { tools };
    });

    this.server.setRequestHandler(
      CallToolRequestSchema,
      async (request: CallToolRequest, extra): Promise<CallToolResult> => {
        const { name, arguments: args } = request.params;

        try {
          const tool = findTool(name, this.tools);
          if (!tool) {
            throw new RelayError(ErrorCodes.UNKNOWN_ACTION, `Unknown tool: ${name}`, { name });
          }
          if (!isToolEnabled(tool, this.enabledSet())) {
            throw new RelayError(ErrorCodes.UNKNOWN_ACTION, `Tool not enabled: ${name}`, { name });
          }

          const outcome = await tool.call(args, {
            dispatcher: this.options.dispatcher,
            config: this.options.config,
            settleMs: this.settleMs,
            signal: extra.signal,
          });
          return toCallToolResult(outcome);
        } catch (error) {
          if (!(error instanceof RelayError)) {
            console.error(`[rpc] tool ${name} failed:`, formatErrorForResponse(error));
          }
          return toCallToolResult({ text: JSON.stringify(errorBody(error)), isError: true });
        }
      }
    );
  }
}

export function createToolServer(options: ToolServerOptions): Server {
  return new ToolServer(options).server;
}
