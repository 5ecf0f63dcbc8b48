/**
 * TRPC Router Configuration
 *
 * Submitter-facing procedures over an AgentTaskService. Results travel as
 * plain JSON: dates become ISO strings.
 */

import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";
import { TransportError } from "../errors";
import { AgentTaskService } from "../services/AgentTaskService";

/** Longest a single `wait` call may hold the request open */
export const MAX_WAIT_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Context passed to all TRPC procedures
 */
export interface Context {
  taskService?: AgentTaskService;
}

/**
 * Create the request context
 * @param taskService - Optional AgentTaskService; task procedures fail without it
 */
export function createContext(taskService?: AgentTaskService): Context {
  return { taskService };
}

const t = initTRPC.context<Context>().create();

export const router = t.router;
export const publicProcedure = t.procedure;

function requireTaskService(ctx: Context): AgentTaskService {
  if (!ctx.taskService) {
    throw new TRPCError({
      code: "INTERNAL_SERVER_ERROR",
      message: "Task submission is not configured",
    });
  }
  return ctx.taskService;
}

const taskIdInput = z.object({ taskId: z.string().min(1) });

/**
 * Tasks router - submit work and collect results
 */
export const tasksRouter = router({
  /**
   * Submit a task to the worker pool
   */
  submit: publicProcedure
    .input(
      z.object({
        agentType: z.string().trim().min(1),
        prompt: z.string(),
        outputPath: z.string().min(1).optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const taskService = requireTaskService(ctx);
      try {
        const taskId = await taskService.submitTask(input.agentType, input.prompt, input.outputPath);
        return { taskId };
      } catch (error) {
        if (error instanceof TransportError) {
          throw new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: error.message, cause: error });
        }
        throw error;
      }
    }),

  /**
   * Wait up to timeoutMs for a task's result; null when the wait gives up
   */
  wait: publicProcedure
    .input(
      taskIdInput.extend({
        timeoutMs: z.number().int().min(0).max(MAX_WAIT_TIMEOUT_MS).default(30000),
      })
    )
    .query(({ ctx, input }) => requireTaskService(ctx).waitForResult(input.taskId, input.timeoutMs)),

  /**
   * Completed result delivered to this process, or null
   */
  get: publicProcedure
    .input(taskIdInput)
    .query(({ ctx, input }) => requireTaskService(ctx).getResult(input.taskId)),

  /**
   * Completed result, falling back to the result store for overflowed payloads
   */
  fetch: publicProcedure
    .input(taskIdInput)
    .query(({ ctx, input }) => requireTaskService(ctx).fetchResult(input.taskId)),

  /**
   * Tasks submitted here that are still waiting for a result
   */
  pending: publicProcedure.query(({ ctx }) => requireTaskService(ctx).getPendingTasks()),

  /**
   * Results delivered to this process
   */
  completed: publicProcedure.query(({ ctx }) => requireTaskService(ctx).getCompletedTasks()),
});

export const appRouter = router({
  tasks: tasksRouter,
});

export type AppRouter = typeof appRouter;
