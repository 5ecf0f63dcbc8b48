/**
 * Worker Entry Point
 *
 * Connects to the hub, consumes tasks and publishes their results.
 * Can be run directly with: tsx src/worker.ts
 */

import { AgentTasksConfig, loadConfig } from "./config";
import { closeDatabase, getDatabase } from "./db/connection";
import { TaskBroker } from "./broker";
import { AgentExecutor, Dispatcher } from "./queue";
import { SqliteResultStore } from "./store";
import { WebSocketTransport } from "./transport";
import { ECHO_AGENT_TYPE, createEchoExecutor } from "./executors";

export interface WorkerOptions {
  /** Executors by agent type, registered before consuming starts */
  executors?: Record<string, AgentExecutor>;
}

export interface RunningWorker {
  dispatcher: Dispatcher;
  transport: WebSocketTransport;
  /** Stop consuming, wait up to the shutdown timeout, then disconnect */
  stop(): Promise<void>;
}

/**
 * Start a worker process against the configured hub and result store.
 *
 * @throws TransportError if the hub cannot be reached
 */
export async function startWorker(config: AgentTasksConfig, options: WorkerOptions = {}): Promise<RunningWorker> {
  const transport = new WebSocketTransport({
    url: config.transport.url,
    reconnectBaseDelayMs: config.transport.reconnectBaseDelayMs,
    reconnectMaxDelayMs: config.transport.reconnectMaxDelayMs,
    requestTimeoutMs: config.transport.requestTimeoutMs,
  });
  const store = new SqliteResultStore(getDatabase(config.store.dbPath));
  const broker = new TaskBroker(transport, store, config.broker);

  const dispatcher = new Dispatcher(broker, {
    maxConcurrent: config.worker.maxConcurrent,
    taskTimeoutMs: config.worker.taskTimeoutMs,
  });

  for (const [agentType, executor] of Object.entries(options.executors ?? {})) {
    dispatcher.registerExecutor(agentType, executor);
  }
  if (config.testMode) {
    dispatcher.registerExecutor(ECHO_AGENT_TYPE, createEchoExecutor({ intervalMs: 200 }));
  }
  if (dispatcher.getRegisteredAgentTypes().length === 0) {
    console.warn("[Worker] No executors registered; every task will fail with an unknown agent type");
  }

  await transport.connect();
  await dispatcher.start();

  return {
    dispatcher,
    transport,
    stop: async () => {
      await dispatcher.stop(config.worker.shutdownTimeoutMs);
      await transport.close();
    },
  };
}

if (require.main === module) {
  const config = loadConfig();
  let isShuttingDown = false;

  startWorker(config)
    .then((worker) => {
      console.log(`Worker connected to ${config.transport.url}`);

      const gracefulShutdown = async (signal: string): Promise<void> => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        console.log(`\n${signal} received, initiating graceful shutdown...`);

        try {
          await worker.stop();
          closeDatabase();
          console.log("Shutdown complete");
          process.exit(0);
        } catch (err) {
          console.error("Error during shutdown:", err);
          process.exit(1);
        }
      };

      process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
      process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
    })
    .catch((err: unknown) => {
      console.error("Failed to start worker:", err);
      process.exit(1);
    });
}
