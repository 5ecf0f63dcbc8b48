/**
 * Server Entry Point
 *
 * Starts the transport hub and the submitter API in one process. In test
 * mode an in-process dispatcher with the echo executor serves tasks too, so
 * the server works without a separate worker.
 * Can be run directly with: tsx src/serve.ts
 */

import { startServer } from "./api";
import { loadConfig } from "./config";
import { closeDatabase, getDatabase } from "./db/connection";
import { TaskBroker } from "./broker";
import { Dispatcher } from "./queue";
import { AgentTaskService } from "./services/AgentTaskService";
import { SqliteResultStore } from "./store";
import { InMemoryTransport, TransportHub } from "./transport";
import { ECHO_AGENT_TYPE, createEchoExecutor } from "./executors";

const PURGE_INTERVAL_MS = 60 * 60 * 1000;

const config = loadConfig();

// Every socket on /ws/transport shares this fabric with the in-process participants
const fabric = new InMemoryTransport();
const hub = new TransportHub(fabric);

const store = new SqliteResultStore(getDatabase(config.store.dbPath));
const broker = new TaskBroker(fabric, store, config.broker);
const taskService = new AgentTaskService(broker);

const dispatcher = config.testMode
  ? new Dispatcher(broker, {
      maxConcurrent: config.worker.maxConcurrent,
      taskTimeoutMs: config.worker.taskTimeoutMs,
    }).registerExecutor(ECHO_AGENT_TYPE, createEchoExecutor({ intervalMs: 200 }))
  : undefined;

// Expired overflow payloads are never returned, but the rows stay until purged
const purgeIntervalId = setInterval(() => {
  store
    .purgeExpired()
    .then((purged) => {
      if (purged > 0) {
        console.log(`Purged ${purged} expired result payload(s)`);
      }
    })
    .catch((err: unknown) => {
      console.error("Failed to purge expired result payloads:", err);
    });
}, PURGE_INTERVAL_MS);
purgeIntervalId.unref();

let server: Awaited<ReturnType<typeof startServer>> | undefined;

// Graceful shutdown handler
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`\n${signal} received, initiating graceful shutdown...`);

  try {
    clearInterval(purgeIntervalId);
    await dispatcher?.stop(config.worker.shutdownTimeoutMs);
    await taskService.dispose();
    await server?.close();
    await fabric.close();
    closeDatabase();

    console.log("Shutdown complete");
    process.exit(0);
  } catch (err) {
    console.error("Error during shutdown:", err);
    process.exit(1);
  }
}

// Register signal handlers
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

startServer({ port: config.server.port, host: config.server.host, hub, taskService })
  .then(async (started) => {
    server = started;

    if (dispatcher) {
      await dispatcher.start();
      console.log(`Test mode: in-process dispatcher serving "${ECHO_AGENT_TYPE}" tasks`);
    }

    const { host, port } = config.server;
    console.log(`Server started on http://${host}:${port}`);
    console.log(`Health check: http://${host}:${port}/health`);
    console.log(`TRPC endpoint: http://${host}:${port}/trpc`);
    console.log(`Transport hub: ws://${host}:${port}/ws/transport`);
  })
  .catch((err: unknown) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
