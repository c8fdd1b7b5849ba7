import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  CancelSession,
  CreateSession,
  ExpiredError,
  GetActiveSession,
  GetHistory,
  GetLeaderboard,
  GetOutcomes,
  GetPlayerProgress,
  GetSession,
  GuessLetter,
  GuessWord,
  InsufficientResourceError,
  JoinSession,
  ListSessions,
  NotFoundError,
  RevealLetter,
  StateConflictError,
  ValidationError,
  isDifficulty,
  isSessionStatus,
} from "./core.js";
import type {
  Command,
  CommandContext,
  Logger,
  PlayerId,
  SessionId,
  TimePoint,
} from "./core.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  readonly now?: () => TimePoint;
}

export const PLAYER_HEADER = "x-player-id";

type ErrorStatus = 400 | 401 | 402 | 404 | 409 | 410 | 500;

export interface ErrorBody {
  readonly error: string;
  readonly code: string;
  readonly issues?: readonly string[];
}

export function toHttpStatus(error: unknown): ErrorStatus {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof StateConflictError) return 409;
  if (error instanceof InsufficientResourceError) return 402;
  if (error instanceof ExpiredError) return 410;
  return 500;
}

export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof ValidationError) {
    return { error: error.message, code: "validation", issues: error.issues };
  }
  if (error instanceof NotFoundError) {
    return { error: error.message, code: "not-found" };
  }
  if (error instanceof StateConflictError) {
    return { error: error.message, code: error.reason };
  }
  if (error instanceof InsufficientResourceError) {
    return { error: error.message, code: "insufficient-coins" };
  }
  if (error instanceof ExpiredError) {
    return { error: error.message, code: "expired" };
  }
  return { error: "Internal server error", code: "internal" };
}

export function createBackendApp({
  port,
  logger,
  createContext,
  dispatch,
  now = Date.now,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  app.use("*", async (c: Context, next: Next): Promise<void> => {
    const started = Date.now();
    await next();
    logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Date.now() - started,
    });
  });

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", `Content-Type, ${PLAYER_HEADER}`);
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  const fail = (c: Context, error: unknown): Response => {
    const status = toHttpStatus(error);
    if (status === 500) {
      logger.error("Request failed", { path: c.req.path, error });
    } else {
      logger.warn("Request rejected", { path: c.req.path, error });
    }
    return c.json(toErrorBody(error), status);
  };

  const run = async <TResult extends object>(
    c: Context,
    build: () => Command<TResult>,
  ): Promise<Response> => {
    try {
      const result = await dispatch(build(), createContext());
      return c.json(result);
    } catch (error) {
      return fail(c, error);
    }
  };

  const identify = (c: Context): PlayerId | undefined => {
    const playerId = c.req.header(PLAYER_HEADER)?.trim();
    return playerId ? playerId : undefined;
  };

  const sessionIdOf = (c: Context): SessionId => c.req.param("id") ?? "";

  const unauthenticated = (c: Context): Response =>
    c.json(
      { error: `Missing ${PLAYER_HEADER} header`, code: "unauthenticated" } satisfies ErrorBody,
      401,
    );

  const readBody = (c: Context): Promise<Record<string, unknown> | null> =>
    c.req
      .json<unknown>()
      .then((body) =>
        typeof body === "object" && body !== null && !Array.isArray(body)
          ? Object.fromEntries(Object.entries(body))
          : null,
      )
      .catch(() => null);

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: now(), config: { port } }),
  );

  app.post("/api/sessions", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    const body = await readBody(c);
    const difficulty = body?.["difficulty"];
    if (!isDifficulty(difficulty)) {
      return fail(
        c,
        ValidationError.because(["difficulty must be one of easy, medium, hard"]),
      );
    }

    return run(c, () => new CreateSession(playerId, difficulty, now()));
  });

  app.get("/api/sessions", async (c: Context) => {
    const status = c.req.query("status");
    if (status !== undefined && !isSessionStatus(status)) {
      return fail(
        c,
        ValidationError.because(["status must be one of waiting, active, completed"]),
      );
    }

    return run(c, () => new ListSessions(now(), status));
  });

  // Registered before /:id so "active" is not read as a session id.
  app.get("/api/sessions/active", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    return run(c, () => new GetActiveSession(playerId, now()));
  });

  app.get("/api/sessions/:id", async (c: Context) =>
    run(c, () => new GetSession(sessionIdOf(c), now())),
  );

  app.post("/api/sessions/:id/join", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    return run(c, () => new JoinSession(sessionIdOf(c), playerId, now()));
  });

  app.post("/api/sessions/:id/cancel", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    return run(c, () => new CancelSession(sessionIdOf(c), playerId, now()));
  });

  app.get("/api/sessions/:id/history", async (c: Context) =>
    run(c, () => new GetHistory(sessionIdOf(c), now())),
  );

  app.get("/api/sessions/:id/outcomes", async (c: Context) =>
    run(c, () => new GetOutcomes(sessionIdOf(c), now())),
  );

  app.post("/api/guess", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    const body = await readBody(c);
    const letter = body?.["letter"];
    if (typeof letter !== "string") {
      return fail(c, ValidationError.because(["letter is required"]));
    }

    return run(c, () => new GuessLetter(playerId, letter, now()));
  });

  app.post("/api/guess-word", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    const body = await readBody(c);
    const word = body?.["word"];
    if (typeof word !== "string") {
      return fail(c, ValidationError.because(["word is required"]));
    }

    return run(c, () => new GuessWord(playerId, word, now()));
  });

  app.post("/api/reveal", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    return run(c, () => new RevealLetter(playerId, now()));
  });

  app.get("/api/leaderboard", async (c: Context) => {
    const raw = c.req.query("limit");
    const limit = raw === undefined ? undefined : Number(raw);

    return run(c, () => new GetLeaderboard(now(), limit));
  });

  app.get("/api/players/me/progress", async (c: Context) => {
    const playerId = identify(c);
    if (!playerId) return unauthenticated(c);

    return run(c, () => new GetPlayerProgress(playerId, now()));
  });

  return app;
}
