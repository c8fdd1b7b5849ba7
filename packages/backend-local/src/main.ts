import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { WebSocketBus, sessionChannel } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import {
  InMemoryCacheStore,
  InMemoryProgressionLedger,
  InMemorySessionGateway,
  InMemoryWordSource,
  SessionCache,
  createGameConfig,
  dispatchCommand,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { loadWordList } from "./wordList.js";

const DEFAULT_PORT = Number(process.env["PORT"] ?? 8787);
const WORD_LIST_URL = new URL("../data/words.json", import.meta.url);

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("backend-local");
  const config = createGameConfig();
  const words = await loadWordList(WORD_LIST_URL);

  const sessionGateway = new InMemorySessionGateway();
  const progressionLedger = new InMemoryProgressionLedger();
  const wordSource = new InMemoryWordSource(words);
  const sessionCache = new SessionCache(new InMemoryCacheStore(), config.cache, logger);
  const bus = new WebSocketBus(logger);

  logger.info("Word list loaded", {
    easy: words.easy.length,
    medium: words.medium.length,
    hard: words.hard.length,
  });

  const createContext = (): CommandContext => ({
    sessionGateway,
    progressionLedger,
    wordSource,
    sessionCache,
    bus,
    config,
    logger,
  });

  const app = createBackendApp({
    port: DEFAULT_PORT,
    logger,
    createContext,
    dispatch: dispatchCommand,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/:sessionId",
    upgradeWebSocket((c: Context) => {
      const sessionId = c.req.param("sessionId") ?? "";
      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { sessionId });
            return;
          }
          bus.subscribe(sessionChannel(sessionId), rawSocket);
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: DEFAULT_PORT }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);
}

void startServer().catch((error: unknown) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
