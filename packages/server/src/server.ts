/**
 * @fileoverview QueryTrail Server
 *
 * Owns the lifecycle of the version store, the analytical engine and the
 * HTTP transport.
 */
import {
  ClickHouseEngine,
  createLogger,
  createMethodRegistry,
  createRpcContext,
  createSqliteVersionStore,
  maskSecret,
  pingEngine,
  resolveDataPath,
  VersionGraph,
  type AnalyticalEngine,
  type QueryTrailSettings,
  type VersionStore,
} from '@querytrail/core';
import { RpcHttpServer } from './http-server.js';

const logger = createLogger('server');

export interface QueryTrailServerOptions {
  settings: QueryTrailSettings;
  /** Pre-built store; the server opens SQLite at settings.storage.dbPath otherwise */
  store?: VersionStore;
  /** Pre-built engine; the server connects to settings.clickhouse otherwise */
  engine?: AnalyticalEngine;
  /** Clock for auto-branch names */
  now?: () => Date;
}

export class QueryTrailServer {
  private store: VersionStore | null = null;
  private engine: AnalyticalEngine | null = null;
  private http: RpcHttpServer | null = null;
  private isRunning = false;

  constructor(private readonly options: QueryTrailServerOptions) {}

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Server is already running');
      return;
    }

    const { settings } = this.options;
    const startupTimer = logger.startTimer('Server startup');

    this.store = this.options.store ?? (await createSqliteVersionStore(resolveDataPath(settings.storage.dbPath)));
    const main = await new VersionGraph(this.store).ensureMainBranch();
    logger.info('Version store ready', { mainBranchId: main.id });

    this.engine = this.options.engine ?? new ClickHouseEngine(settings.clickhouse);
    logger.info('Analytical engine configured', {
      url: settings.clickhouse.url,
      username: settings.clickhouse.username,
      password: maskSecret(settings.clickhouse.password),
      database: settings.clickhouse.database,
    });
    const status = await pingEngine(this.engine);
    if (!status.connected) {
      logger.warn('Analytical engine unreachable; diagnostics will record errors until it is up', {
        error: status.error,
      });
    }

    const context = createRpcContext({
      store: this.store,
      engine: this.engine,
      settings,
      now: this.options.now,
    });
    this.http = new RpcHttpServer(
      { port: settings.server.port, host: settings.server.host },
      createMethodRegistry(),
      context
    );
    await this.http.start();

    this.isRunning = true;
    startupTimer();
    logger.info('QueryTrail server started', {
      host: settings.server.host,
      port: this.http.getPort(),
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    logger.info('Stopping QueryTrail server...');

    if (this.http) {
      await this.http.stop();
      this.http = null;
    }
    if (this.engine) {
      await this.engine.close();
      this.engine = null;
    }
    if (this.store) {
      await this.store.close();
      this.store = null;
    }

    this.isRunning = false;
    logger.info('QueryTrail server stopped');
  }

  getPort(): number | null {
    return this.http?.getPort() ?? null;
  }

  get running(): boolean {
    return this.isRunning;
  }
}
