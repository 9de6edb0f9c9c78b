// ---------------------------------------------------------------------------
// clanker-guard moderation
// Strike escalation for flagged messages: a first offense earns a warning,
// a repeat offense removes and bans the member
// ---------------------------------------------------------------------------

import { isObject } from "./credential-store";
import { CorruptStoreError } from "./errors";
import type { ModerationActions } from "./groupme";
import type { Logger } from "./logger";
import { Mutex } from "./mutex";
import type { StorageBackend } from "./storage";

export const MODERATION_STORE_KEY = "moderation";

/** Strikes a member may hold before the next offense removes them. */
const WARNINGS_ALLOWED = 1;

interface LedgerDocument {
  strikes: Record<string, number>;
  banned: string[];
}

/**
 * Persisted strike counts and the list of banned user ids. Every operation
 * reads and writes the whole document under one lock.
 */
export class StrikeLedger {
  private readonly lock = new Mutex();

  constructor(
    private readonly storage: StorageBackend,
    private readonly key: string = MODERATION_STORE_KEY
  ) {}

  /** Add a strike and return the new count. */
  async addStrike(userId: string): Promise<number> {
    return this.update((doc) => {
      const count = (doc.strikes[userId] ?? 0) + 1;
      doc.strikes[userId] = count;
      return count;
    });
  }

  async strikes(userId: string): Promise<number> {
    const doc = await this.read();
    return doc.strikes[userId] ?? 0;
  }

  /** Clear the user's strikes and record them as banned. */
  async ban(userId: string): Promise<void> {
    await this.update((doc) => {
      delete doc.strikes[userId];
      if (!doc.banned.includes(userId)) doc.banned.push(userId);
    });
  }

  async isBanned(userId: string): Promise<boolean> {
    const doc = await this.read();
    return doc.banned.includes(userId);
  }

  private async update<R>(fn: (doc: LedgerDocument) => R): Promise<R> {
    return this.lock.runExclusive(async () => {
      const doc = await this.read();
      const result = fn(doc);
      await this.storage.set(this.key, JSON.stringify(doc, null, 2));
      return result;
    });
  }

  private async read(): Promise<LedgerDocument> {
    const raw = await this.storage.get(this.key);
    if (raw === null) return { strikes: {}, banned: [] };

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new CorruptStoreError(`Moderation document "${this.key}" is not valid JSON`);
    }
    if (!isObject(parsed) || !isObject(parsed.strikes) || !Array.isArray(parsed.banned)) {
      throw new CorruptStoreError(`Moderation document "${this.key}" has the wrong shape`);
    }

    const strikes: Record<string, number> = {};
    for (const [userId, count] of Object.entries(parsed.strikes)) {
      if (typeof count === "number") strikes[userId] = count;
    }
    const banned = parsed.banned.filter((id): id is string => typeof id === "string");
    return { strikes, banned };
  }
}

export interface Offense {
  name: string;
  userId: string;
  messageId: string | null;
}

export type ModerationOutcome = "warned" | "removed" | "not_member";

export class Moderator {
  constructor(
    private readonly actions: ModerationActions,
    private readonly ledger: StrikeLedger,
    private readonly logger: Logger
  ) {}

  /** Like a message from a trusted member. Failures are logged. */
  async acknowledge(messageId: string | null): Promise<void> {
    if (!messageId) return;
    try {
      await this.actions.likeMessage(messageId);
    } catch (err) {
      this.logger.warn("Failed to like message", {
        message_id: messageId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async reckon(offense: Offense): Promise<ModerationOutcome> {
    const { name, userId } = offense;
    const strikes = await this.ledger.addStrike(userId);

    if (strikes <= WARNINGS_ALLOWED) {
      await this.actions.sendDm(
        userId,
        `@${name}, warning: your message was flagged as spam (strike ${strikes}). ` +
          "Another violation will remove you from the group."
      );
      this.logger.info("Strike issued", { user_id: userId, strikes, message_id: offense.messageId });
      return "warned";
    }

    const membershipId = await this.actions.findMembership(userId);
    if (!membershipId) {
      this.logger.warn("Repeat offender is not a member", { user_id: userId, strikes });
      return "not_member";
    }

    await this.actions.removeMember(membershipId);
    await this.ledger.ban(userId);
    await this.actions.postBotMessage(`@${name} has been removed for repeated spam.`);
    await this.actions.sendDm(userId, `@${name}, you have been removed from the group due to repeated spam violations.`);

    try {
      await this.actions.banMember(membershipId);
      await this.actions.postBotMessage(`@${name} has been banned from rejoining.`);
    } catch (err) {
      // The ledger still lists them as banned
      this.logger.warn("GroupMe ban failed", {
        user_id: userId,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    this.logger.warn("Member removed", { user_id: userId, strikes });
    return "removed";
  }
}
