import type { SessionCache } from "../cache/SessionCache.js";
import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { ProgressionLedger } from "../ports/ProgressionLedger.js";
import type { SessionGateway } from "../ports/SessionGateway.js";
import type { WordSource } from "../ports/WordSource.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly sessionGateway: SessionGateway;
  readonly progressionLedger: ProgressionLedger;
  readonly wordSource: WordSource;
  readonly sessionCache: SessionCache;
  readonly bus: MessageBus;
  readonly config: GameConfig;
  readonly logger?: Logger;
}

export abstract class Command<TResult = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<TResult>;
}
