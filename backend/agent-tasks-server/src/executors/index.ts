export { createEchoExecutor, ECHO_AGENT_TYPE } from "./EchoExecutor";
export type { EchoExecutorOptions } from "./EchoExecutor";
