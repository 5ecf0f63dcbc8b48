/**
 * Fastify Server with TRPC Integration and WebSocket Support
 *
 * HTTP server providing:
 * - /health endpoint for health checks
 * - /trpc/* endpoints for the submitter API
 * - /ws/transport WebSocket endpoint bridging remote participants into the hub
 * - CORS support for cross-origin requests
 */

import Fastify, { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { fastifyTRPCPlugin, FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { appRouter, createContext, AppRouter } from "./trpc";
import { TransportHub } from "../transport";
import { AgentTaskService } from "../services/AgentTaskService";

export interface ServerOptions {
  /** Port to listen on (default: 3000) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Enable request logging (default: true) */
  logger?: boolean;
  /** Hub serving /ws/transport; the endpoint is not registered without it */
  hub?: TransportHub;
  /** Service behind the task procedures (optional) */
  taskService?: AgentTaskService;
}

/**
 * Create and configure a Fastify server with TRPC
 */
export async function createServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const { logger = true, hub, taskService } = options;

  const server = Fastify({ logger });

  // Register CORS
  await server.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    credentials: true,
  });

  // Register WebSocket plugin
  await server.register(websocket);

  // Health check endpoint
  server.get("/health", async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      transportClients: hub?.getClientCount() ?? 0,
      pendingTasks: taskService?.pendingTaskCount ?? 0,
    };
  });

  // WebSocket endpoint for the task transport
  if (hub) {
    server.get("/ws/transport", { websocket: true }, (socket) => {
      hub.addClient(socket);
    });

    server.addHook("onClose", async () => {
      hub.dispose();
    });
  }

  // Register TRPC plugin
  await server.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: appRouter,
      createContext: () => createContext(taskService),
      onError: ({ path, error }) => {
        console.error(`TRPC Error on ${path}:`, error);
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>["trpcOptions"],
  });

  return server;
}

/**
 * Start the server and listen on the specified port
 */
export async function startServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const { port = 3000, host = "0.0.0.0" } = options;

  const server = await createServer(options);

  try {
    const address = await server.listen({ port, host });
    console.log(`Server listening at ${address}`);
    return server;
  } catch (err) {
    server.log.error(err);
    throw err;
  }
}
