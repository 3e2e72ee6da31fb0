// ============================================================================
// IDEATREE CLIENT
// ============================================================================
// Typed access to a running ideatree server. Queries and mutations go over
// batched HTTP; the tree.changes subscription needs a WebSocket connection.

import { createTRPCProxyClient, createWSClient, httpBatchLink, splitLink, wsLink, type CreateTRPCProxyClient } from "@trpc/client";
import { WebSocket } from "ws";

import type { AppRouter } from "../server/router.js";
import type { ChangeSet } from "../types/index.js";

export type { AppRouter } from "../server/router.js";
export type * from "../types/index.js";

export const DEFAULT_SERVER_URL = "http://localhost:3847";

export type IdeaTreeWSClient = ReturnType<typeof createWSClient>;

export interface IdeaTreeClientOptions {
  /** Server URL (default: http://localhost:3847) */
  url?: string;
  /** Open a WebSocket for subscriptions (default: false) */
  enableWebSocket?: boolean;
  /** Reuse an existing WebSocket client instead of opening one */
  wsClient?: IdeaTreeWSClient;
  headers?: Record<string, string>;
}

// ---- WebSocket ----

export function toWebSocketUrl(url: string): string {
  return url.replace(/^http/, "ws");
}

/**
 * Open a WebSocket client for the server at `url`. The caller closes it.
 */
export function createIdeaTreeWSClient(url = DEFAULT_SERVER_URL): IdeaTreeWSClient {
  // Node 20 has no global WebSocket, which is where the tRPC client looks
  if (!("WebSocket" in globalThis)) {
    Object.assign(globalThis, { WebSocket });
  }
  return createWSClient({ url: toWebSocketUrl(url) });
}

// ---- Client ----

/**
 * Create a typed tRPC client for the ideatree server.
 *
 * @example
 * ```typescript
 * const client = createIdeaTreeClient({ url: "http://localhost:3847" });
 *
 * const { changes } = await client.note.submit.mutate({ text: "comprar pan en el super" });
 * const tree = await client.tree.get.query();
 * ```
 */
export function createIdeaTreeClient(options: IdeaTreeClientOptions = {}): CreateTRPCProxyClient<AppRouter> {
  const url = options.url || DEFAULT_SERVER_URL;
  const http = httpBatchLink({ url, headers: options.headers });

  if (!options.enableWebSocket && !options.wsClient) {
    return createTRPCProxyClient<AppRouter>({ links: [http] });
  }

  const wsClient = options.wsClient ?? createIdeaTreeWSClient(url);
  return createTRPCProxyClient<AppRouter>({
    links: [
      splitLink({
        condition: (op) => op.type === "subscription",
        true: wsLink({ client: wsClient }),
        false: http,
      }),
    ],
  });
}

export type IdeaTreeClient = ReturnType<typeof createIdeaTreeClient>;

// ---- Change Feed ----

export interface TreeWatch {
  /** Resolves once the server has registered the subscription */
  ready: Promise<void>;
  close(): void;
}

/**
 * Call `onChange` with every batch the server applies until closed.
 */
export function watchTreeChanges(
  onChange: (changes: ChangeSet) => void,
  options: { url?: string; onError?: (error: { message: string }) => void } = {}
): TreeWatch {
  const wsClient = createIdeaTreeWSClient(options.url || DEFAULT_SERVER_URL);
  const client = createIdeaTreeClient({ url: options.url, wsClient });

  let markReady: () => void = () => undefined;
  let markFailed: (error: Error) => void = () => undefined;
  const ready = new Promise<void>((resolve, reject) => {
    markReady = resolve;
    markFailed = reject;
  });

  const subscription = client.tree.changes.subscribe(undefined, {
    onStarted: () => markReady(),
    onData: onChange,
    onError: (error) => {
      markFailed(new Error(error.message));
      options.onError?.(error);
    },
  });

  return {
    ready,
    close() {
      subscription.unsubscribe();
      wsClient.close();
    },
  };
}

// ---- Convenience ----

export async function checkServerHealth(url = DEFAULT_SERVER_URL): Promise<boolean> {
  try {
    const health = await createIdeaTreeClient({ url }).system.health.query();
    return health.status === "ok";
  } catch (error) {
    console.error(`\x1b[90mHealth check failed: ${error instanceof Error ? error.message : String(error)}\x1b[0m`);
    return false;
  }
}

export async function getServerInfo(url = DEFAULT_SERVER_URL) {
  return createIdeaTreeClient({ url }).system.info.query();
}
