/**
 * API Module Exports
 *
 * Barrel exports for the Fastify/TRPC API layer.
 */

// Server exports
export { createServer, startServer } from "./server";
export type { ServerOptions } from "./server";

// TRPC exports
export { appRouter, tasksRouter, router, publicProcedure, createContext, MAX_WAIT_TIMEOUT_MS } from "./trpc";
export type { AppRouter, Context } from "./trpc";
