import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { EditPipeline } from './EditPipeline';
import { getPrompt, listPrompts } from './prompts';
import { listResources, listResourceTemplates, readResource } from './resources';
import { handleToolCall, listTools } from './tools';

export const SERVER_NAME = 'hwpx-edit-mcp';
export const SERVER_VERSION = '0.1.0';

/** An MCP server bound to `pipeline`. Several servers may share one pipeline. */
export function createServer(pipeline: EditPipeline): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async (request) => listTools(request.params?.cursor));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(pipeline, name, args, extra.signal);
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => listResources(pipeline));
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => listResourceTemplates());
  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) =>
    readResource(pipeline, request.params.uri, extra.signal),
  );

  server.setRequestHandler(ListPromptsRequestSchema, async () => listPrompts());
  server.setRequestHandler(GetPromptRequestSchema, async (request) =>
    getPrompt(request.params.name, request.params.arguments),
  );

  return server;
}
