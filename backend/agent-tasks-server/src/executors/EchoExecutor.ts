/**
 * EchoExecutor
 *
 * Executor used in test mode: reports a progress line per step and echoes
 * the prompt back as its result.
 */

import { AgentExecutor } from "../queue";

export const ECHO_AGENT_TYPE = "echo";

export interface EchoExecutorOptions {
  /** Progress lines to report; `{prompt}` is replaced with the prompt */
  steps?: string[];
  /** Delay between steps in milliseconds (default: 0) */
  intervalMs?: number;
  /** Delay before the first step in milliseconds (default: 0) */
  initialDelayMs?: number;
}

const DEFAULT_STEPS = ["running: {prompt}", "completed: {prompt}"];

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(signal.reason);
    };
    const timeoutId = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function createEchoExecutor(options: EchoExecutorOptions = {}): AgentExecutor {
  const steps = options.steps ?? DEFAULT_STEPS;
  const intervalMs = options.intervalMs ?? 0;
  const initialDelayMs = options.initialDelayMs ?? 0;

  return async (prompt, context) => {
    if (initialDelayMs > 0) {
      await sleep(initialDelayMs, context.signal);
    }

    for (let i = 0; i < steps.length; i += 1) {
      context.reportProgress(steps[i].split("{prompt}").join(prompt), { agentName: ECHO_AGENT_TYPE });

      if (intervalMs > 0 && i < steps.length - 1) {
        await sleep(intervalMs, context.signal);
      }
    }

    return {
      text: prompt,
      agentType: context.agentType,
      timestamp: new Date().toISOString(),
    };
  };
}
