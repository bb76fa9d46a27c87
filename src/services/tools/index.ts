// Tool System Initialization
// Registers all available tools on startup, then freezes the registry

import type { Env } from '../../env.js';
import { ToolRegistry } from './registry.js';
import { createToolSpec, type ToolSpecOptions } from './spec.js';
import { graphSearchTool } from './graph-search-tool.js';
import { docsSearchTool } from './docs-search-tool.js';
import { inventorySqlTool } from './inventory-sql-tool.js';
import { blueprintVisionTool } from './blueprint-vision-tool.js';
import { normControlTool } from './norm-control-tool.js';
import { createWebSearchTool } from './web-search-tool.js';

export { ToolRegistry } from './registry.js';
export { ToolDispatcher, describeOutcome, outcomeResult, type ResidencyLease } from './dispatcher.js';
export { HttpToolTransport, type ToolTransport } from './transport.js';
export { createToolSpec } from './spec.js';
export type {
  ToolDefinition,
  ToolInvocation,
  ToolName,
  ToolOutcome,
  ToolParameter,
  ToolPayload,
  ToolSpec,
} from './types.js';
export { TOOL_NAMES, isToolName } from './types.js';

type ToolConfig = Pick<
  Env,
  'SKILLS_BASE_URL' | 'TOOL_TIMEOUT_MS' | 'TOOL_TIMEOUT_OVERRIDES' | 'WEB_SEARCH_API_KEY' | 'WEB_SEARCH_URL'
>;

export function initializeTools(config: ToolConfig, registry: ToolRegistry = new ToolRegistry()): ToolRegistry {
  console.log('Initializing tool system...');

  const options: ToolSpecOptions = {
    skillsBaseUrl: config.SKILLS_BASE_URL,
    defaultTimeoutMs: config.TOOL_TIMEOUT_MS,
    timeoutOverrides: config.TOOL_TIMEOUT_OVERRIDES,
  };

  registry.register(createToolSpec(graphSearchTool, options));
  registry.register(createToolSpec(docsSearchTool, options));
  registry.register(createToolSpec(inventorySqlTool, options));
  registry.register(createToolSpec(blueprintVisionTool, options));
  registry.register(createToolSpec(normControlTool, options));
  console.log('✓ Plant skills registered (graph, docs, inventory, blueprint, norm control)');

  if (config.WEB_SEARCH_API_KEY) {
    registry.register(createToolSpec(createWebSearchTool(config.WEB_SEARCH_URL, config.WEB_SEARCH_API_KEY), options));
    console.log('✓ Web search tool registered');
  }

  for (const name of Object.keys(config.TOOL_TIMEOUT_OVERRIDES)) {
    if (!registry.has(name)) {
      console.warn(`⚠️  Timeout override for unknown tool "${name}" ignored`);
    }
  }

  registry.freeze();
  console.log(`Tool system initialized with ${registry.size} tools`);
  return registry;
}
