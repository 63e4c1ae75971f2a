#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config';
import { createLogger, setLogLevel } from './logger';
import { SERVER_VERSION, createServer } from './server';

const log = createLogger('main');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info(`Server starting - v${SERVER_VERSION} - documents in ${config.wordFilesPath}`);

  const server = createServer({ config });
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch(err => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
