#!/usr/bin/env node
/**
 * Chat Gateway CLI
 *
 * Usage:
 *   chat-gateway [command] [options]
 *
 * Commands:
 *   (default)              Start the gateway
 *   init                   Write the default config file and exit
 *
 * Options:
 *   --port <number>    Port to listen on (default: from config, 8100)
 *   --host <string>    Host to bind to (default: from config, 0.0.0.0)
 *   --config <path>    Config file (default: ~/.chat-gateway/config.json)
 *   -v, --verbose      Enable verbose logging
 *   -h, --help         Show this help message
 *   --version          Show version
 *
 * Environment Variables:
 *   PORT, HOST             Listener overrides
 *   UPSTREAM_ENDPOINTS     Comma-separated upstream base URLs
 *   UPSTREAM_API_KEY       Credential sent to upstreams
 *   CHAT_GATEWAY_CONFIG    Config file path
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { getConfigPath, loadConfig, writeDefaultConfig } from './config.js';
import { createLogger } from './logger.js';
import { GatewayServer } from './server.js';

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  // Source runs one level below the package root, the build two
  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const parsed = PackageSchema.safeParse(JSON.parse(readFileSync(new URL(candidate, import.meta.url), 'utf8')));
      if (parsed.success) return parsed.data.version;
    } catch {
      // try the next location
    }
  }
  return '0.0.0';
}

function printHelp(): void {
  console.log(`
Chat Gateway - chat-completion forwarding with fallback, caching and rate limits

Usage:
  chat-gateway [command] [options]

Commands:
  (default)              Start the gateway
  init                   Write the default config file and exit

Options:
  --port <number>    Port to listen on (default: from config, 8100)
  --host <string>    Host to bind to (default: from config, 0.0.0.0)
  --config <path>    Config file (default: ~/.chat-gateway/config.json)
  -v, --verbose      Enable verbose logging
  -h, --help         Show this help message
  --version          Show version

Environment Variables:
  PORT, HOST             Listener overrides
  UPSTREAM_ENDPOINTS     Comma-separated upstream base URLs
  UPSTREAM_API_KEY       Credential sent to upstreams
  CHAT_GATEWAY_CONFIG    Config file path

Endpoints:
  POST /api/v1/chat/completions   Blocking or SSE chat completion
  WS   /ws/v1/chat/completions    Streaming relay ({"api_key": ...} first)
  GET  /health, GET /stats
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('-h') || args.includes('--help')) {
    printHelp();
    process.exit(0);
  }

  if (args.includes('--version')) {
    console.log(`chat-gateway v${readVersion()}`);
    process.exit(0);
  }

  let port: number | undefined;
  let host: string | undefined;
  let configPath = getConfigPath();
  let verbose = false;

  const command = args[0] === 'init' || args[0] === 'start' ? args.shift() : undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === '--port' && value) {
      port = parseInt(value, 10);
      if (isNaN(port) || port < 1 || port > 65535) {
        console.error('Error: Invalid port number');
        process.exit(1);
      }
      i++;
    } else if (arg === '--host' && value) {
      host = value;
      i++;
    } else if (arg === '--config' && value) {
      configPath = value;
      i++;
    } else if (arg === '-v' || arg === '--verbose') {
      verbose = true;
    } else {
      console.error(`Error: Unknown argument ${arg ?? ''}`);
      printHelp();
      process.exit(1);
    }
  }

  const logger = createLogger({ verbose });

  if (command === 'init') {
    writeDefaultConfig(configPath, logger);
    console.log('');
    console.log('✅ Chat gateway initialized');
    console.log(`   Config: ${configPath}`);
    console.log('');
    console.log('Next steps:');
    console.log('  1. Set your upstream endpoints and tier keys in the config file');
    console.log('  2. Start the gateway:');
    console.log('     chat-gateway');
    console.log('');
    process.exit(0);
  }

  const config = loadConfig(configPath, logger);
  const server = new GatewayServer({ config, port, host, watchPath: configPath, logger });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`Shutdown failed: ${String(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
