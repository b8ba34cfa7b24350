/**
 * vsx-gallery serve
 */
import type { AddressInfo } from 'node:net';
import type { Server } from 'node:http';
import { Command, InvalidArgumentError } from 'commander';
import { createGalleryNodeServer } from '@vsx-gallery/gallery';
import { openGallery } from '../services/gallery.js';
import type { ExitCode } from '../types.js';
import type { CommandContext } from './context.js';

export interface ServeOptions {
  port?: number;
  host?: string;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Expected a port number between 0 and 65535.');
  }
  return port;
}

export async function handleServe(context: CommandContext, command: Command, options: ServeOptions): Promise<ExitCode> {
  const config = await context.loadConfig(command, {
    server: { port: options.port, host: options.host },
  });
  const { logger } = context;

  const gallery = await openGallery(config, logger, context.deps.fetchImpl);
  const server = createGalleryNodeServer(gallery.options);

  await listen(server, config.server.port, config.server.host);
  const address = server.address();
  const port = isAddressInfo(address) ? address.port : config.server.port;

  logger.success(`Gallery listening on http://${config.server.host}:${port}`, {
    documents: gallery.documents,
    catalogRoot: config.catalog.root,
    storageRoot: config.storage.root,
  });
  if (config.upstream.url !== undefined) {
    logger.info(`Falling back to ${config.upstream.url}`);
  }

  await context.deps.waitForShutdown(server);

  logger.info('Shutting down');
  await close(server);
  return 0;
}

export function createServeCommand(context: CommandContext): Command {
  return new Command('serve')
    .description('Start the gallery HTTP server')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('--host <host>', 'Interface to bind')
    .action(async (options: ServeOptions, command: Command) => {
      context.state.exitCode = await handleServe(context, command, options);
    });
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error === undefined) {
        resolve();
        return;
      }

      reject(error);
    });
  });
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return value !== null && typeof value === 'object';
}

/** Resolves on the first SIGINT or SIGTERM. */
export function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const stop = (): void => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      resolve();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });
}
