import type { DB } from './database';
import { ProxyBotError } from './errors';
import { parseStoredTime, toStoredTime } from './time';

type UserRow = {
  id: number;
  telegram_id: number;
  username: string | null;
  first_name: string | null;
  subscription_until: string | null;
  is_active: number;
  created_at: string;
  expiry_notified_at: string | null;
};

export interface UserRecord {
  readonly id: number;
  readonly telegramId: number;
  username: string | null;
  firstName: string | null;
  subscriptionUntil: Date | null;
  isActive: boolean;
  readonly createdAt: Date;
  expiryNotifiedAt: Date | null;
}

export interface UserProfile {
  telegramId: number;
  username?: string;
  firstName?: string;
}

const USER_COLUMNS =
  'id, telegram_id, username, first_name, subscription_until, is_active, created_at, expiry_notified_at';

function rowToRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    telegramId: row.telegram_id,
    username: row.username,
    firstName: row.first_name,
    subscriptionUntil: row.subscription_until === null ? null : parseStoredTime(row.subscription_until),
    isActive: row.is_active === 1,
    createdAt: parseStoredTime(row.created_at),
    expiryNotifiedAt: row.expiry_notified_at === null ? null : parseStoredTime(row.expiry_notified_at),
  };
}

// ─── Подготовленные запросы ───

function prepareQueries(db: DB) {
  return {
    upsert: db.prepare(`
      INSERT INTO users (telegram_id, username, first_name)
      VALUES (@telegram_id, @username, @first_name)
      ON CONFLICT(telegram_id) DO UPDATE SET
        username = COALESCE(excluded.username, users.username),
        first_name = COALESCE(excluded.first_name, users.first_name)
    `),
    getByTelegramId: db.prepare(`SELECT ${USER_COLUMNS} FROM users WHERE telegram_id = ?`),
    setSubscriptionUntil: db.prepare(`UPDATE users SET subscription_until = ? WHERE id = ?`),
    setActive: db.prepare(`UPDATE users SET is_active = ? WHERE id = ?`),
    listRecent: db.prepare(`SELECT ${USER_COLUMNS} FROM users ORDER BY id DESC LIMIT ?`),
    count: db.prepare(`SELECT COUNT(*) AS count FROM users`),
    countEntitled: db.prepare(`
      SELECT COUNT(*) AS count FROM users
      WHERE subscription_until IS NOT NULL
        AND julianday(subscription_until) > julianday(?)
    `),
    listNewlyExpired: db.prepare(`
      SELECT ${USER_COLUMNS} FROM users
      WHERE is_active = 1
        AND subscription_until IS NOT NULL
        AND julianday(subscription_until) <= julianday(?)
        AND (expiry_notified_at IS NULL
             OR julianday(expiry_notified_at) < julianday(subscription_until))
      ORDER BY id ASC
    `),
    markExpiryNotified: db.prepare(`UPDATE users SET expiry_notified_at = ? WHERE id = ?`),
  };
}

/**
 * Пользователи бота. Строка создаётся при первом обращении и никогда не удаляется —
 * только is_active = 0.
 */
export class UserStore {
  private readonly queries: ReturnType<typeof prepareQueries>;

  constructor(db: DB) {
    this.queries = prepareQueries(db);
  }

  /** get-or-create по telegram_id, заодно обновляет имя */
  touch(profile: UserProfile): UserRecord {
    this.queries.upsert.run({
      telegram_id: profile.telegramId,
      username: profile.username ?? null,
      first_name: profile.firstName ?? null,
    });
    return this.requireByTelegramId(profile.telegramId);
  }

  get(telegramId: number): UserRecord | null {
    const row = this.queries.getByTelegramId.get(telegramId) as UserRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  requireByTelegramId(telegramId: number): UserRecord {
    const user = this.get(telegramId);
    if (!user) {
      throw new ProxyBotError('NOT_FOUND', `User ${telegramId} not found`);
    }
    return user;
  }

  /** Пишет только SubscriptionLedger */
  setSubscriptionUntil(userId: number, until: Date): void {
    this.queries.setSubscriptionUntil.run(toStoredTime(until), userId);
  }

  setActive(telegramId: number, active: boolean): UserRecord {
    const user = this.requireByTelegramId(telegramId);
    this.queries.setActive.run(active ? 1 : 0, user.id);
    return { ...user, isActive: active };
  }

  listRecent(limit: number): UserRecord[] {
    const rows = this.queries.listRecent.all(limit) as UserRow[];
    return rows.map(rowToRecord);
  }

  count(): number {
    const row = this.queries.count.get() as { count: number };
    return row.count;
  }

  countEntitled(now: Date): number {
    const row = this.queries.countEntitled.get(toStoredTime(now)) as { count: number };
    return row.count;
  }

  /** Истёкшие подписки, о которых пользователь ещё не слышал */
  listNewlyExpired(now: Date): UserRecord[] {
    const rows = this.queries.listNewlyExpired.all(toStoredTime(now)) as UserRow[];
    return rows.map(rowToRecord);
  }

  markExpiryNotified(userId: number, at: Date): void {
    this.queries.markExpiryNotified.run(toStoredTime(at), userId);
  }
}
