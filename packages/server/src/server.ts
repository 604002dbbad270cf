import { createServer, type Server } from 'http';
import { AccountService, openUserStore, type UserStore } from './accounts';
import { IdentityVerifier } from './auth';
import type { ServerConfig } from './config';
import { createApp } from './http';
import { createLogger, type Logger } from './logger';
import { TaskService, openTaskStore, type TaskStore } from './tasks';

export interface StartServerOptions {
  logger?: Logger;
  /** Use this store instead of opening the one named by the config */
  store?: TaskStore;
  /** Use this account store instead of opening the one named by the config */
  users?: UserStore;
}

export interface RunningServer {
  httpServer: Server;
  /** Resolves with the bound port once the server listens */
  ready: Promise<number>;
  stop: () => Promise<void>;
}

export function startServer(config: ServerConfig, options: StartServerOptions = {}): RunningServer {
  const logger = options.logger ?? createLogger('server', { level: config.logLevel });

  // Opened once for the process lifetime, closed by stop()
  const store = options.store ?? openTaskStore(config.database);
  const users = options.users ?? openUserStore(config.database);
  const verifier = new IdentityVerifier({ secret: config.authSecret });
  const service = new TaskService({ store, logger: logger.child('tasks') });
  const accounts = new AccountService({
    users,
    secret: config.authSecret,
    hashRounds: config.passwordHashRounds,
    logger: logger.child('accounts'),
  });

  const app = createApp({
    verifier,
    service,
    accounts,
    logger,
    corsOrigin: config.corsOrigin,
    info: { appName: config.appName, appVersion: config.appVersion },
  });

  const httpServer = createServer(app);

  const ready = new Promise<number>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off('error', reject);
      const address = httpServer.address();
      const port = typeof address === 'object' && address !== null ? address.port : config.port;
      logger.info(`Server listening on http://${config.host}:${port}`);
      resolve(port);
    });
  });

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (!stopping) {
      stopping = new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
        httpServer.closeAllConnections();
      })
        .catch((err: unknown) => {
          // Closing a server that never started listening is not a failure here
          if (err instanceof Error && 'code' in err && err.code === 'ERR_SERVER_NOT_RUNNING') {
            return;
          }
          throw err;
        })
        .finally(() => Promise.all([store.close(), users.close()]))
        .then(() => logger.info('Server stopped'));
    }
    return stopping;
  };

  return { httpServer, ready, stop };
}
