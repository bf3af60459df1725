import {
  ChatServiceFactory,
  LevelDbChatStoreFactory,
  type IChatService,
  type ILevelDbChatStore,
} from "@chatseq/chatstore";
import {
  LevelDbCounterStoreFactory,
  RedisCounterStoreFactory,
  createMemoryCounterStore,
  type ICounterStore,
  type IRedisClient,
} from "@chatseq/counterstore";
import {
  BufferLoggerFactory,
  SequencerFactory,
  type DriftSupervisor,
  type IConsistencyMonitor,
  type IConsistencyReport,
  type ILogDriver,
  type ILogger,
  type ReconcileOutcome,
  type Scope,
} from "@chatseq/sequencer";
import { join } from "node:path";
import type { RuntimeConfig } from "./config";

export interface RuntimeOptions {
  logDriver?: ILogDriver;
  /** Used instead of connecting to `redisUrl` when the counter store is redis. */
  redisClient?: IRedisClient;
}

/** Transport-free operational surface. */
export interface IOperations {
  status(): Promise<IConsistencyReport>;
  recover(scopes?: Scope[]): Promise<ReconcileOutcome[]>;
}

export class Runtime {
  readonly ops: IOperations;
  private closed = false;

  constructor(
    readonly chat: IChatService,
    private supervisor: DriftSupervisor,
    monitor: IConsistencyMonitor,
    private counters: ICounterStore,
    private store: ILevelDbChatStore,
    private loggerFactory: BufferLoggerFactory,
    private logger: ILogger
  ) {
    this.ops = {
      status: () => monitor.check(),
      recover: (scopes) => this.supervisor.recover(scopes),
    };
  }

  /** Startup reconciliation, then the periodic drift checks. */
  async start() {
    this.logger.log("Runtime is starting");
    await this.supervisor.start();
    this.logger.log("Runtime is started");
  }

  async close() {
    if (this.closed) return;
    this.closed = true;

    await this.supervisor.stop();
    await this.chat.flush();
    await this.counters.close();
    await this.store.close();

    this.logger.log("Runtime is closed");
    this.loggerFactory.flushAll();
    this.loggerFactory.destroyAll();
  }
}

export async function createRuntime(
  config: RuntimeConfig,
  options: RuntimeOptions = {}
): Promise<Runtime> {
  const loggerFactory = new BufferLoggerFactory(options.logDriver, config.logChunkSize);
  const logger = loggerFactory.create("runtime");

  const chatStoreFactory = new LevelDbChatStoreFactory();
  const chatStoreOptions = { logger: loggerFactory.create("chatstore") };
  const store = config.dataDir
    ? await chatStoreFactory.open(join(config.dataDir, "durable"), chatStoreOptions)
    : chatStoreFactory.createInMemory(chatStoreOptions);

  const counters = await openCounterStore(config, options, loggerFactory);

  const sequencer = new SequencerFactory().create(
    counters,
    store.durable,
    {
      maxAttempts: config.maxAttempts,
      storeTimeoutMs: config.storeTimeoutMs,
      reconcileBatchSize: config.reconcileBatchSize,
      monitorSampleSize: config.monitorSampleSize,
      monitorIntervalMs: config.monitorIntervalMs,
      driftThreshold: config.driftThreshold,
      startupDelayMs: config.startupDelayMs,
    },
    { loggerFactory }
  );

  const chat = new ChatServiceFactory().create(sequencer.allocator, store, {
    logger: loggerFactory.create("chat"),
  });

  logger.log("Runtime is wired", {
    durable: config.dataDir ?? "memory",
    counters: config.counterStore,
  });

  return new Runtime(
    chat,
    sequencer.supervisor,
    sequencer.monitor,
    counters,
    store,
    loggerFactory,
    logger
  );
}

function openCounterStore(
  config: RuntimeConfig,
  options: RuntimeOptions,
  loggerFactory: BufferLoggerFactory
): Promise<ICounterStore> {
  const logger = loggerFactory.create("counterstore");

  if (config.counterStore === "redis") {
    const factory = new RedisCounterStoreFactory();
    const store = options.redisClient
      ? factory.create(options.redisClient, { logger })
      : factory.open(config.redisUrl, { logger });
    return Promise.resolve(store);
  }

  const storeOptions = { persistThresholdMs: config.counterPersistMs, logger };
  return config.dataDir
    ? new LevelDbCounterStoreFactory().open(join(config.dataDir, "counters"), storeOptions)
    : createMemoryCounterStore(storeOptions);
}
