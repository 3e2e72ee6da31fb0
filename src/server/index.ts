// ============================================================================
// SERVER ENTRY POINT
// ============================================================================
// HTTP server exposing the tRPC API, plus the reminder poller.

import { createHTTPServer } from "@trpc/server/adapters/standalone";
import { applyWSSHandler } from "@trpc/server/adapters/ws";
import { WebSocketServer } from "ws";

import { appRouter } from "./router.js";
import type { TRPCContext } from "./trpc.js";
import { loadConfig } from "../config/index.js";
import { IdeaTreeEngine } from "../engine/index.js";
import { LangChainOracle, type ClassificationOracle } from "../oracle/index.js";
import { ReminderScheduler, type ReminderNotifier } from "../reminders/scheduler.js";
import { createStorage, type IStorage } from "../storage/index.js";
import { OracleSummarizer, type TreeSummarizer } from "../summary/index.js";
import type { IdeaTreeConfig } from "../types/index.js";

export { appRouter, type AppRouter } from "./router.js";
export type { TRPCContext } from "./trpc.js";

// ============================================================================
// SERVER OPTIONS
// ============================================================================

export interface ServerOptions {
  port?: number;
  host?: string;
  enableWebSocket?: boolean;
  config?: IdeaTreeConfig;
  oracle?: ClassificationOracle;
  /** Defaults to the configured model unless a custom oracle is given */
  summarizer?: TreeSummarizer;
  notifier?: ReminderNotifier;
}

export const DEFAULT_PORT = 3847;
const DEFAULT_HOST = "0.0.0.0";

// ============================================================================
// CREATE SERVER
// ============================================================================

export interface IdeaTreeServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number;
  getStorage(): IStorage;
}

export async function createServer(options: ServerOptions = {}): Promise<IdeaTreeServer> {
  const config = options.config ?? loadConfig();
  const port = options.port ?? DEFAULT_PORT;
  const host = options.host ?? DEFAULT_HOST;
  const enableWebSocket = options.enableWebSocket ?? true;

  // Create storage
  const storage = createStorage(config.storage);
  await storage.initialize();

  let oracle: ClassificationOracle;
  let summarizer = options.summarizer;
  if (options.oracle) {
    oracle = options.oracle;
  } else {
    const model = LangChainOracle.fromConfig(config.llm);
    oracle = model;
    summarizer = summarizer ?? new OracleSummarizer(model);
  }

  const engine = new IdeaTreeEngine({ storage, oracle, summarizer, locale: config.engine.locale });
  const scheduler = new ReminderScheduler(storage, options.notifier);

  // Create context
  const createContext = (): TRPCContext => ({
    engine,
    storage,
    scheduler,
    config,
  });

  // Create HTTP server
  const httpServer = createHTTPServer({
    router: appRouter,
    createContext,
    responseMeta() {
      return {
        headers: {
          "Access-Control-Allow-Origin": "*",
          "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
          "Access-Control-Allow-Headers": "Content-Type, Authorization",
        },
      };
    },
  });

  // WebSocket server for tree.changes subscriptions
  let wss: WebSocketServer | null = null;
  let wssHandler: ReturnType<typeof applyWSSHandler> | null = null;

  if (enableWebSocket) {
    wss = new WebSocketServer({ server: httpServer.server });
    wssHandler = applyWSSHandler({
      wss,
      router: appRouter,
      createContext,
    });
  }

  return {
    async start() {
      await new Promise<void>((resolve, reject) => {
        httpServer.server.once("error", reject);
        httpServer.server.listen(port, host, () => {
          httpServer.server.off("error", reject);
          resolve();
        });
      });

      scheduler.start(config.engine.reminderPollIntervalMs);

      console.log(`\x1b[32m✓ ideatree server running at http://${host}:${port}\x1b[0m`);
      if (enableWebSocket) {
        console.log(`\x1b[32m✓ WebSocket enabled at ws://${host}:${port}\x1b[0m`);
      }
      console.log(`\x1b[90m  Storage: ${config.storage.type}\x1b[0m`);
      console.log(`\x1b[90m  LLM: ${config.llm.provider}\x1b[0m`);
      console.log(`\x1b[90m  Reminder poll: every ${config.engine.reminderPollIntervalMs}ms\x1b[0m`);
    },

    async stop() {
      await scheduler.stop();
      if (wssHandler) {
        wssHandler.broadcastReconnectNotification();
      }
      if (wss) {
        for (const socket of wss.clients) socket.terminate();
        wss.close();
      }
      await new Promise<void>((resolve, reject) => {
        httpServer.server.close((error) => (error ? reject(error) : resolve()));
      });
      await storage.close();
      console.log(`\x1b[33mServer stopped\x1b[0m`);
    },

    // The bound port, which differs from the requested one when that was 0
    getPort() {
      const address = httpServer.server.address();
      return address !== null && typeof address === "object" ? address.port : port;
    },

    getStorage() {
      return storage;
    },
  };
}

// ============================================================================
// CLI ENTRY POINT
// ============================================================================

export async function startServerCLI(port?: number): Promise<void> {
  const server = await createServer({ port });

  const shutdown = (exitCode: number) => {
    server.stop().then(
      () => process.exit(exitCode),
      (error: unknown) => {
        console.error(`\x1b[31mShutdown failed: ${error instanceof Error ? error.message : String(error)}\x1b[0m`);
        process.exit(1);
      }
    );
  };

  // Handle graceful shutdown
  process.on("SIGINT", () => {
    console.log("\n\x1b[33mShutting down...\x1b[0m");
    shutdown(0);
  });

  process.on("SIGTERM", () => shutdown(0));

  await server.start();
}
