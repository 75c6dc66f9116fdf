import * as path from 'node:path';
import { Server } from 'node:http';
import { applyArgs, loadConfig } from './config.js';
import { loadControlFiles } from './loader.js';
import { createApp } from './server.js';

const SHUTDOWN_TIMEOUT_MS = 10000;

/**
 * Close the server on SIGTERM or SIGINT. A second signal while closing is
 * ignored; connections still open after the timeout force an exit.
 */
function stopOnSignal(server: Server): void {
  let stopping = false;

  const stop = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`${signal}: closing control file API`);

    const timer = setTimeout(() => {
      console.error(`Connections still open after ${SHUTDOWN_TIMEOUT_MS}ms, exiting`);
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    server.close(err => {
      if (err) {
        console.error('Error while closing server', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGTERM', stop);
  process.once('SIGINT', stop);
}

async function bootstrap() {
  const args = process.argv.slice(2);
  const configArg = args.find(a => a.startsWith('--config='));
  const configPath = configArg ? configArg.slice('--config='.length) : path.resolve('config.json');

  const config = applyArgs(await loadConfig(configPath), args);

  console.log(`Loading control files from: ${config.contentDir}`);
  const data = loadControlFiles({
    contentDir: config.contentDir,
    includeHidden: config.includeHidden
  });

  console.log(`Loaded ${data.documents.size} control files`);

  if (data.errors.length > 0) {
    console.warn('Warnings:', data.errors);
  }

  const server = createApp(data).listen(config.port, () => {
    console.log(`Control file API listening on http://localhost:${config.port}`);
  });

  stopOnSignal(server);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start server', error);
  process.exit(1);
});
