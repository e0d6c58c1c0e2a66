import pino from 'pino';
import { dirname, join } from 'path';
import {
  loadConfig,
  loadConfigFromEnv,
  loadFilterListFile,
  loadFilterListsFromDirectory,
  mergeConfig,
  type FilterListSource,
} from './config/index.js';
import { ContentFilterEngine, FilterListError } from './filters/index.js';
import { createServer } from './server/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/adfence.yaml';

async function main() {
  // Load configuration from file, then override with environment variables
  const config = mergeConfig(loadConfig(CONFIG_PATH), loadConfigFromEnv());

  // Initialize logger
  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info('Starting adfence...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  const engine = new ContentFilterEngine(
    {
      enabled: config.engine.enabled,
      cacheCapacity: config.engine.cache_capacity,
      maxRulesPerList: config.engine.max_rules_per_list,
    },
    logger
  );

  if (config.engine.load_default_list) {
    engine.loadDefaultFilterList();
  }

  // Lists from the lists directory, then explicitly configured files
  const configDir = (() => {
    const dir = dirname(CONFIG_PATH);
    return !dir || dir === '.' ? process.cwd() : dir;
  })();
  const listsDir = config.lists.directory ?? join(configDir, 'lists.d');
  const { lists: dirLists, errors: listErrors } = loadFilterListsFromDirectory(listsDir);

  for (const { file, error } of listErrors) {
    logger.warn({ file, error }, 'Failed to read filter list file');
  }

  const sources: FilterListSource[] = [...dirLists];
  for (const { name, path } of config.lists.files) {
    try {
      sources.push(loadFilterListFile(name, path));
    } catch (err) {
      logger.warn({ list: name, path, err }, 'Failed to read filter list file');
    }
  }

  for (const { name, content } of sources) {
    try {
      engine.loadFilterList(name, content);
    } catch (err) {
      if (!(err instanceof FilterListError)) {
        throw err;
      }
      logger.warn({ list: name, error: err.message }, 'Filter list rejected');
    }
  }

  logger.info(
    {
      enabled: engine.isFilteringEnabled(),
      listsDir,
      lists: engine.getFilterLists().map((l) => ({ name: l.name, network: l.networkCount })),
      ...engine.getFilterCounts(),
    },
    'Content filter engine initialized'
  );

  const server = await createServer({ config, engine, logger });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');

    await server.close();
    logger.info('HTTP server closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Start server
  const { listen_port: port, host } = config.server;
  await server.listen({ port, host });

  logger.info({ port, host }, 'Filter service started');
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
