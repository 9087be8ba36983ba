import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation fields attached to every log entry emitted while serving a call. */
export interface RequestContext {
  readonly requestId: string | number | null;
  readonly tool: string | null;
  readonly transport: "stdio" | "http" | "memory" | null;
}

/**
 * AsyncLocalStorage exposing the routing context of the tool call currently
 * being served, so nested helpers (runner, handlers) log with the same
 * correlation identifiers without threading them through every signature.
 */
const storage = new AsyncLocalStorage<RequestContext>();

/** Executes {@link callback} with {@link context} visible to downstream helpers. */
export function runWithRequestContext<T>(context: RequestContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the context associated with the current async execution. */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
