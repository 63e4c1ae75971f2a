import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { InMemoryConversionHistoryStore } from './ConversionHistoryStore';
import type { ConversionHistoryStore } from './ConversionHistoryStore';
import { DocumentConverter } from './DocumentConverter';
import { DocumentLock } from './DocumentLock';
import { LibreOfficeRunner } from './LibreOfficeRunner';
import type { OfficeConverter } from './LibreOfficeRunner';
import { PathResolver } from './PathResolver';
import { toToolResult } from './ResponseEnvelope';
import { ToolDispatcher } from './ToolDispatcher';
import type { ServerConfig } from './config';

export const SERVER_NAME = 'docx-mcp-server';
export const SERVER_VERSION = '0.1.0';

export interface ServerDependencies {
  config: Pick<ServerConfig, 'wordFilesPath' | 'sofficePath' | 'conversionTimeoutMs'>;
  history?: ConversionHistoryStore;
  office?: OfficeConverter;
}

/** Wires the tool registry to its collaborators. */
export function createDispatcher(deps: ServerDependencies): ToolDispatcher {
  const office = deps.office ?? new LibreOfficeRunner(deps.config.sofficePath, deps.config.conversionTimeoutMs);
  return new ToolDispatcher({
    paths: new PathResolver(deps.config.wordFilesPath),
    locks: new DocumentLock(),
    history: deps.history ?? new InMemoryConversionHistoryStore(),
    converter: new DocumentConverter(office),
  });
}

export function createServer(deps: ServerDependencies): Server {
  const dispatcher = createDispatcher(deps);
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: dispatcher.list() }));

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;
    return toToolResult(await dispatcher.dispatch(name, args ?? {}));
  });

  return server;
}
