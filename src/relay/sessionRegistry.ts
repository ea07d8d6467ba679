import { Logger } from "../core/logger.js";
import { Mutex } from "../core/mutex.js";
import { PersistenceError, errorMessage } from "../core/errors.js";
import type {
  AcceptResult,
  BanResult,
  CancelRequestResult,
  ConnectResult,
  EndSessionResult,
  RejectResult,
  RequestContactResult,
  SessionSnapshot,
  SessionStatus,
  SessionStore,
  UnbanResult,
  UserId
} from "../types.js";

/**
 * In-memory mirror of the pending/active/banned sets. Every mutation writes the
 * store first and only then touches memory, all under one mutex, so a failed
 * write leaves both sides as they were.
 */
export class SessionRegistry {
  private readonly logger = new Logger("session-registry");
  private readonly lock = new Mutex();
  private readonly pending = new Set<UserId>();
  private readonly active = new Set<UserId>();
  private readonly banned = new Set<UserId>();
  private readonly displayNames = new Map<UserId, string>();

  constructor(private readonly store: SessionStore) {}

  async load(): Promise<{ pending: number; active: number; banned: number }> {
    return await this.lock.runExclusive(async () => {
      const [pendingRows, activeRows, bannedIds] = await Promise.all([
        this.store.listPending(),
        this.store.listActive(),
        this.store.listBanned()
      ]);

      this.pending.clear();
      this.active.clear();
      this.banned.clear();
      this.displayNames.clear();

      for (const id of bannedIds) {
        this.banned.add(id);
      }
      for (const row of activeRows) {
        if (this.banned.has(row.userId)) {
          continue;
        }
        this.active.add(row.userId);
        this.rememberName(row.userId, row.displayName);
      }
      for (const row of pendingRows) {
        if (this.banned.has(row.userId) || this.active.has(row.userId)) {
          continue;
        }
        this.pending.add(row.userId);
        this.rememberName(row.userId, row.displayName);
      }

      const counts = { pending: this.pending.size, active: this.active.size, banned: this.banned.size };
      this.logger.info("session state loaded", counts);
      return counts;
    });
  }

  async requestContact(userId: UserId, displayName?: string): Promise<RequestContactResult> {
    return await this.lock.runExclusive(async () => {
      if (this.banned.has(userId)) {
        return "banned";
      }
      if (this.active.has(userId)) {
        return "already_active";
      }
      if (this.pending.has(userId)) {
        return "already_pending";
      }
      await this.persist("requestContact", userId, () => this.store.addPending(userId, displayName ?? null));
      this.pending.add(userId);
      this.rememberName(userId, displayName ?? null);
      return "accepted";
    });
  }

  async cancelRequest(userId: UserId): Promise<CancelRequestResult> {
    return await this.lock.runExclusive(async () => {
      if (!this.pending.has(userId)) {
        return "not_pending";
      }
      await this.persist("cancelRequest", userId, () => this.store.removePending(userId));
      this.pending.delete(userId);
      return "canceled";
    });
  }

  async accept(userId: UserId): Promise<AcceptResult> {
    return await this.lock.runExclusive(async () => {
      if (!this.pending.has(userId)) {
        return "not_pending";
      }
      await this.promote(userId, "accept");
      return "connected";
    });
  }

  async reject(userId: UserId): Promise<RejectResult> {
    return await this.lock.runExclusive(async () => {
      if (!this.pending.has(userId)) {
        return "not_pending";
      }
      await this.persist("reject", userId, () => this.store.removePending(userId));
      this.pending.delete(userId);
      return "rejected";
    });
  }

  async connect(userId: UserId): Promise<ConnectResult> {
    return (await this.connectTracked(userId)).result;
  }

  /** Like `connect`, also telling whether this call opened the session. */
  async connectTracked(userId: UserId): Promise<{ result: ConnectResult; opened: boolean }> {
    return await this.lock.runExclusive(async () => {
      if (this.banned.has(userId)) {
        return { result: "banned", opened: false };
      }
      if (this.active.has(userId)) {
        return { result: "connected", opened: false };
      }
      if (this.pending.has(userId)) {
        await this.promote(userId, "connect");
        return { result: "connected", opened: true };
      }
      await this.persist("connect", userId, () => this.store.addActive(userId, this.nameOf(userId)));
      this.active.add(userId);
      return { result: "connected", opened: true };
    });
  }

  async endSession(userId: UserId): Promise<EndSessionResult> {
    return await this.lock.runExclusive(async () => {
      if (!this.active.has(userId)) {
        return "not_active";
      }
      await this.persist("endSession", userId, () => this.store.removeActive(userId));
      this.active.delete(userId);
      return "ended";
    });
  }

  async ban(userId: UserId): Promise<BanResult> {
    return await this.lock.runExclusive(async (): Promise<BanResult> => {
      // each durable step is mirrored as soon as it lands; once the ban row exists
      // the user is effectively banned even if an eviction below fails
      await this.persist("ban", userId, () => this.store.ban(userId));
      this.banned.add(userId);
      if (this.pending.has(userId)) {
        await this.persist("ban", userId, () => this.store.removePending(userId));
        this.pending.delete(userId);
      }
      if (this.active.has(userId)) {
        await this.persist("ban", userId, () => this.store.removeActive(userId));
        this.active.delete(userId);
      }
      return "banned";
    });
  }

  async unban(userId: UserId): Promise<UnbanResult> {
    return await this.lock.runExclusive(async (): Promise<UnbanResult> => {
      await this.persist("unban", userId, () => this.store.unban(userId));
      this.banned.delete(userId);
      return "unbanned";
    });
  }

  isBanned(userId: UserId): boolean {
    return this.banned.has(userId);
  }

  /** Ban is orthogonal; callers check `isBanned` first. */
  status(userId: UserId): SessionStatus {
    if (this.active.has(userId)) {
      return "active";
    }
    if (this.pending.has(userId)) {
      return "pending";
    }
    return "unregistered";
  }

  activeUsers(): UserId[] {
    return [...this.active].sort((a, b) => a - b);
  }

  snapshot(): SessionSnapshot {
    return {
      pending: [...this.pending].sort((a, b) => a - b),
      active: [...this.active].sort((a, b) => a - b),
      banned: [...this.banned].sort((a, b) => a - b)
    };
  }

  nameOf(userId: UserId): string | null {
    return this.displayNames.get(userId) ?? null;
  }

  /** pending -> active; a failed removal rolls the new active row back. */
  private async promote(userId: UserId, operation: string): Promise<void> {
    const displayName = this.nameOf(userId);
    await this.persist(operation, userId, () => this.store.addActive(userId, displayName));
    try {
      await this.store.removePending(userId);
    } catch (err) {
      try {
        await this.store.removeActive(userId);
      } catch (rollbackErr) {
        this.logger.error("rollback of active row failed", {
          userId,
          operation,
          error: errorMessage(rollbackErr)
        });
      }
      this.logger.error("persistence failed", { userId, operation, error: errorMessage(err) });
      throw new PersistenceError(operation, userId, { cause: err });
    }
    this.pending.delete(userId);
    this.active.add(userId);
  }

  private async persist(operation: string, userId: UserId, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      this.logger.error("persistence failed", { userId, operation, error: errorMessage(err) });
      throw new PersistenceError(operation, userId, { cause: err });
    }
  }

  private rememberName(userId: UserId, displayName: string | null): void {
    if (displayName) {
      this.displayNames.set(userId, displayName);
    }
  }
}
