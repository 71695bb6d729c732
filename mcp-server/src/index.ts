#!/usr/bin/env node
import * as http from 'http';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { Command } from 'commander';
import { type CliOptions, type ServerConfig, describeRemote, loadConfig } from './config';
import { EditPipeline } from './EditPipeline';
import { errorMessage } from './errors';
import { createLogger, setLogLevel } from './logger';
import { SERVER_NAME, SERVER_VERSION, createServer } from './server';

const log = createLogger('main');

const MCP_PATH = '/mcp';

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function jsonRpcError(res: http.ServerResponse, status: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ jsonrpc: '2.0', error: { code: -32000, message }, id: null }));
}

/** Stateless Streamable HTTP: every POST gets its own server and transport over the shared pipeline. */
async function handleHttpRequest(pipeline: EditPipeline, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const url = new URL(req.url ?? '/', 'http://localhost');
  if (url.pathname !== MCP_PATH) {
    jsonRpcError(res, 404, `Not found: ${url.pathname}`);
    return;
  }
  if (req.method !== 'POST') {
    jsonRpcError(res, 405, 'Method not allowed.');
    return;
  }

  const server = createServer(pipeline);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on('close', () => {
    transport.close().catch((err: unknown) => log.warn('transport close failed', { err }));
    server.close().catch((err: unknown) => log.warn('server close failed', { err }));
  });
  await server.connect(transport);
  await transport.handleRequest(req, res);
}

async function serveHttp(pipeline: EditPipeline, config: ServerConfig): Promise<http.Server> {
  const httpServer = http.createServer((req, res) => {
    handleHttpRequest(pipeline, req, res).catch((err: unknown) => {
      log.error('http request failed', { err });
      if (!res.headersSent) jsonRpcError(res, 500, 'Internal server error');
    });
  });
  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.port, config.host, () => resolve());
  });
  log.info('listening', { url: `http://${config.host}:${config.port}${MCP_PATH}` });
  return httpServer;
}

async function main(options: CliOptions): Promise<void> {
  const config = loadConfig(options);
  setLogLevel(config.logLevel);
  log.info('server starting', {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    transport: config.transport,
    root: config.root,
    autoRegisterHandles: config.autoRegisterHandles,
    safetyThreshold: config.safetyThreshold,
    remote: describeRemote(config.remote),
  });

  const pipeline = new EditPipeline(config);
  let httpServer: http.Server | undefined;

  const shutdown = (signal: string) => {
    log.info('shutting down', { signal });
    pipeline.shutdown();
    if (httpServer) httpServer.close();
    process.exit(0);
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  if (config.transport === 'streamable-http') {
    httpServer = await serveHttp(pipeline, config);
    return;
  }
  const server = createServer(pipeline);
  await server.connect(new StdioServerTransport());
}

const program = new Command();

program
  .name(SERVER_NAME)
  .description('MCP server for planned, previewed and confirmed edits of HWPX documents')
  .version(SERVER_VERSION)
  .option('--root <dir>', 'workspace root that path locators resolve inside (env HWPX_MCP_ROOT)')
  .option('--transport <kind>', 'stdio or streamable-http (env HWPX_MCP_TRANSPORT)')
  .option('--host <host>', 'bind address for streamable-http (env HWPX_MCP_HOST)')
  .option('--port <port>', 'port for streamable-http (env HWPX_MCP_PORT)')
  .option('--remote-origin <origin>', 'allow uri locators on this origin; repeatable (env HWPX_MCP_REMOTE_ORIGINS)', collect)
  .option('--http-timeout <seconds>', 'timeout of remote document requests (env HWPX_MCP_HTTP_TIMEOUT)')
  .option('--http-header <key=value>', 'header sent with remote document requests; repeatable (env HWPX_MCP_HTTP_HEADERS)', collect)
  .option('--http-auth-token <token>', 'bearer token for remote document requests (env HWPX_MCP_HTTP_AUTH_TOKEN)')
  .action((options: CliOptions) => main(options));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[${SERVER_NAME}] ${errorMessage(err)}`);
  process.exit(1);
});
