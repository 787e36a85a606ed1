import { Agent, fetch as undiciFetch } from "undici";
import type { RequestInit, Response } from "undici";

export interface DispatcherTimeouts {
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

const agents = new Map<string, Agent>();

/**
 * Shared keep-alive agents, one per timeout/TLS combination. The read timeout
 * bounds both the wait for response headers and any idle gap in the body.
 */
export function getFetchDispatcher(ignoreHttpsErrors: boolean, timeouts: DispatcherTimeouts): Agent {
  const key = `${ignoreHttpsErrors}:${timeouts.connectTimeoutMs}:${timeouts.readTimeoutMs}`;
  let agent = agents.get(key);
  if (!agent) {
    agent = new Agent({
      connect: {
        timeout: timeouts.connectTimeoutMs,
        rejectUnauthorized: !ignoreHttpsErrors,
      },
      headersTimeout: timeouts.readTimeoutMs,
      bodyTimeout: timeouts.readTimeoutMs,
    });
    agents.set(key, agent);
  }
  return agent;
}

export async function closeFetchDispatchers(): Promise<void> {
  const open = [...agents.values()];
  agents.clear();
  await Promise.all(open.map((agent) => agent.close()));
}

export const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);
