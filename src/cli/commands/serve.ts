/**
 * Příkaz serve pro CLI.
 * Spustí HTTP službu nad bází znalostí a drží proces běžící.
 */

import type { GlobalOptions } from '../types.js';
import type { InferenceEngineConfig } from '../../types/index.js';
import { isConflictStrategy, CONFLICT_STRATEGIES } from '../../core/strategies.js';
import { InferenceServer } from '../../api/server.js';
import { loadKnowledgeBase } from '../utils/file-loader.js';
import { InvalidArgumentsError } from '../utils/errors.js';
import { printData, print, colorize, success, info } from '../utils/output.js';

/** Options pro příkaz serve */
export interface ServeOptions extends GlobalOptions {
  port: number;
  host: string;
  noLogger: boolean;
  strategy: string | undefined;
}

/**
 * Akce příkazu serve.
 */
export async function serveCommand(rulesFile: string, options: ServeOptions): Promise<void> {
  const { port, host, noLogger, format, strategy } = options;

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentsError(`Invalid port: ${port}`);
  }
  if (strategy !== undefined && !isConflictStrategy(strategy)) {
    throw new InvalidArgumentsError(
      `Unknown strategy "${strategy}". Expected one of: ${CONFLICT_STRATEGIES.join(', ')}`
    );
  }

  const { data: knowledge, path } = await loadKnowledgeBase(rulesFile);
  const engineConfig: InferenceEngineConfig = strategy !== undefined ? { strategy } : {};

  print(info(`Starting server on ${host}:${port} with ${knowledge.size} rules...`));

  const server = await InferenceServer.start({
    server: { port, host, logger: !noLogger },
    knowledge,
    engineConfig
  });

  const address = server.address;

  if (format === 'json') {
    printData({
      type: 'message',
      data: {
        status: 'started',
        address,
        port: server.port,
        rules: knowledge.size,
        knowledgeBase: path
      }
    });
  } else {
    print('');
    print(success(`Server running at ${colorize(`${address}${server.apiPrefix}`, 'cyan')}`));
    print('');
    print(colorize('Press Ctrl+C to stop', 'dim'));
  }

  const shutdown = async (signal: string): Promise<void> => {
    if (format !== 'json') {
      print('');
      print(info(`Received ${signal}, shutting down...`));
    }

    await server.stop();

    if (format === 'json') {
      printData({ type: 'message', data: { status: 'stopped', signal } });
    } else {
      print(success('Server stopped'));
    }

    process.exit(0);
  };

  process.once('SIGINT', () => {
    shutdown('SIGINT').catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
  });
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
  });
}
