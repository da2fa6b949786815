#!/usr/bin/env node

// Redirect console output to stderr before anything logs.
// Only MCP protocol messages may go to stdout.
console.log = (...args: unknown[]) => {
  process.stderr.write('[LOG] ' + args.join(' ') + '\n');
};
console.warn = (...args: unknown[]) => {
  process.stderr.write('[WARN] ' + args.join(' ') + '\n');
};

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { ConfigError } from './errors.js';
import { SDK_VERSION } from './http/transport.js';
import { Memphora } from './memphora.js';
import { getSetupErrorMessage } from './setup-message.js';
import { TOOL_DEFINITIONS } from './tool-schemas.js';
import { ToolHandlers, dispatchTool } from './tools.js';

const WORKFLOW_GUIDANCE = `# Memphora Memory Workflow

**At the start of a task:**
- \`get_context(query="...")\` → what the user said before that bears on this request

**While working:**
- \`store_memory(content="...")\` → one durable fact, preference or decision per call
- \`search_memory(query="...")\` → ranked matches with IDs and scores
- \`list_memories()\` → everything stored for this user

**Maintenance:**
- \`update_memory(id="...", content="...")\` → correct a memory; the old text is kept as a version
- \`memory_versions(id="...")\` → see earlier versions
- \`delete_memory(id="...")\` → remove a memory that is wrong or stale

**Graph:**
- \`link_memories(id="...", targetId="...", relationship="supports")\`
- \`find_path(sourceId="...", targetId="...")\``;

async function main() {
  let handlers: ToolHandlers | null = null;
  let setupError: string | null = null;
  let unexpectedFailure = false;

  try {
    const memory = new Memphora();
    handlers = new ToolHandlers(memory);
    console.log(`Using Memphora API at ${memory.config.apiUrl} for user ${memory.userId}`);
  } catch (err) {
    setupError = err instanceof Error ? err.message : String(err);
    unexpectedFailure = !(err instanceof ConfigError);
    console.warn(`Memphora initialization failed: ${setupError}`);
    console.warn('Server will start in setup-required mode. All tool calls will return setup instructions.');
  }

  const server = new Server(
    { name: 'memphora', version: SDK_VERSION },
    { capabilities: { tools: {} }, instructions: WORKFLOW_GUIDANCE },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [...TOOL_DEFINITIONS],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (!handlers) {
      return {
        content: [{
          type: 'text' as const,
          text: getSetupErrorMessage(setupError ?? 'Unknown error', unexpectedFailure ? 'unknown' : undefined),
        }],
        isError: true,
      };
    }

    return dispatchTool(handlers, name, args ?? {});
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.log('Memphora MCP server started on stdio.');
}

process.on('SIGINT', () => {
  console.error('Received SIGINT, shutting down...');
  process.exit(0);
});
process.on('SIGTERM', () => {
  console.error('Received SIGTERM, shutting down...');
  process.exit(0);
});

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
