/* eslint-disable functional/immutable-data */
import type { WebSocket } from "ws";

import type { Logger, MessageBus, SessionId } from "../core.js";

/** Frame written to every socket subscribed to a channel */
export interface EventFrame<TEvent extends object = object> {
  readonly channel: string;
  readonly event: TEvent;
}

export function sessionChannel(sessionId: SessionId): string {
  return `session:${sessionId}`;
}

export class WebSocketBus implements MessageBus {
  readonly #subscribers = new Map<string, Set<WebSocket>>();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: object): Promise<void> {
    const sockets = this.#subscribers.get(channel);
    if (!sockets || sockets.size === 0) {
      this.#logger?.debug?.("Event published without subscribers", { channel });
      return;
    }

    const frame: EventFrame = { channel, event };
    const message = JSON.stringify(frame);
    let delivered = 0;
    for (const socket of sockets) {
      if (socket.readyState !== socket.OPEN) {
        continue;
      }
      try {
        socket.send(message);
        delivered += 1;
      } catch (error) {
        this.#logger?.warn("Failed to deliver event", { channel, error });
      }
    }

    this.#logger?.debug?.("Event published", { channel, delivered });
  }

  subscribe(channel: string, socket: WebSocket): void {
    let sockets = this.#subscribers.get(channel);
    if (!sockets) {
      sockets = new Set<WebSocket>();
      this.#subscribers.set(channel, sockets);
    }
    sockets.add(socket);

    this.#logger?.info("WebSocket subscriber added", { channel, size: sockets.size });

    socket.on("close", () => {
      this.#unsubscribe(channel, socket);
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("WebSocket subscriber error", { channel, error });
    });
  }

  subscriberCount(channel: string): number {
    return this.#subscribers.get(channel)?.size ?? 0;
  }

  #unsubscribe(channel: string, socket: WebSocket): void {
    const sockets = this.#subscribers.get(channel);
    if (!sockets) {
      return;
    }
    sockets.delete(socket);
    if (sockets.size === 0) {
      this.#subscribers.delete(channel);
    }
    this.#logger?.info("WebSocket subscriber removed", { channel, size: sockets.size });
  }
}
