import { deviceTools } from './deviceTools';
import { elementTools } from './elementTools';
import { RegisteredTool } from './registry';

export const allTools: RegisteredTool[] = [...deviceTools, ...elementTools];

// Older controllers namespace every tool, e.g. `android.tap`.
export const TOOL_NAME_PREFIX = 'android.';

function unprefixed(name: string): string {
  return name.startsWith(TOOL_NAME_PREFIX) ? name.slice(TOOL_NAME_PREFIX.length) : name;
}

export function findTool(name: string, tools: RegisteredTool[] = allTools): RegisteredTool | undefined {
  const bare = unprefixed(name);
  return tools.find(tool => tool.name === bare || tool.aliases.includes(bare));
}

// A null enabled-set means every tool is on. Aliases and prefixed names follow their tool.
export function isToolEnabled(tool: RegisteredTool, enabled: readonly string[] | null): boolean {
  if (enabled === null) {
    return true;
  }
  const names = enabled.map(unprefixed);
  return names.includes(tool.name) || tool.aliases.some(alias => names.includes(alias));
}

export type { RegisteredTool, ToolContext, ToolOutcome } from './registry';
