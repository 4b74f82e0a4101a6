import type { DB } from './database';
import { ProxyBotError } from './errors';
import { newSecret, type SecretGenerator } from './secrets';
import type { ServerEndpoint } from './server-directory';
import type { SubscriptionLedger } from './subscription-ledger';
import { parseStoredTime, toStoredTime, type Clock } from './time';
import type { UserRecord, UserStore } from './user-store';

type ConfigRow = {
  id: number;
  user_id: number;
  proxy_secret: string;
  server_address: string;
  port: number;
  created_at: string;
};

export interface ProxyCredential {
  readonly id: number;
  readonly userId: number;
  readonly secret: string;
  readonly serverAddress: string;
  readonly port: number;
  readonly createdAt: Date;
}

function rowToCredential(row: ConfigRow): ProxyCredential {
  return {
    id: row.id,
    userId: row.user_id,
    secret: row.proxy_secret,
    serverAddress: row.server_address,
    port: row.port,
    createdAt: parseStoredTime(row.created_at),
  };
}

// ─── Подготовленные запросы ───

function prepareQueries(db: DB) {
  return {
    insert: db.prepare(`
      INSERT INTO proxy_configs (user_id, proxy_secret, server_address, port, created_at)
      VALUES (@user_id, @proxy_secret, @server_address, @port, @created_at)
    `),
    deleteForUser: db.prepare(`DELETE FROM proxy_configs WHERE user_id = ?`),
    listForUser: db.prepare(`
      SELECT id, user_id, proxy_secret, server_address, port, created_at
      FROM proxy_configs WHERE user_id = ? ORDER BY id ASC
    `),
  };
}

/**
 * Конфиги прокси пользователя: по одному {server, port, secret} на сервер.
 *
 * Выдача и ротация повторно проверяют подписку внутри транзакции:
 * между проверкой в боте и записью подписка могла истечь.
 * Ротация — delete + insert в одной транзакции, так что читатель видит
 * либо старый набор целиком, либо новый.
 */
export class ProxyConfigRegistry {
  private readonly db: DB;
  private readonly users: UserStore;
  private readonly ledger: SubscriptionLedger;
  private readonly clock: Clock;
  private readonly generateSecret: SecretGenerator;
  private readonly queries: ReturnType<typeof prepareQueries>;

  constructor(
    db: DB,
    users: UserStore,
    ledger: SubscriptionLedger,
    clock: Clock,
    generateSecret: SecretGenerator = newSecret,
  ) {
    this.db = db;
    this.users = users;
    this.ledger = ledger;
    this.clock = clock;
    this.generateSecret = generateSecret;
    this.queries = prepareQueries(db);
  }

  listConfigs(telegramId: number): ProxyCredential[] {
    const user = this.users.requireByTelegramId(telegramId);
    return this.listForUser(user.id);
  }

  /** Идемпотентно: если конфиги уже есть — возвращает их как есть */
  ensureConfigs(telegramId: number, servers: readonly ServerEndpoint[]): ProxyCredential[] {
    return this.db
      .transaction((): ProxyCredential[] => {
        const user = this.requireEntitled(telegramId);

        const existing = this.listForUser(user.id);
        if (existing.length > 0) return existing;

        this.insertSet(user, servers);
        return this.listForUser(user.id);
      })
      .immediate();
  }

  rotateConfigs(telegramId: number, servers: readonly ServerEndpoint[]): ProxyCredential[] {
    return this.db
      .transaction((): ProxyCredential[] => {
        const user = this.requireEntitled(telegramId);

        const removed = this.queries.deleteForUser.run(user.id);
        this.insertSet(user, servers);

        console.log(`[Registry] Ротация конфигов ${telegramId}: ${removed.changes} → ${servers.length}`);
        return this.listForUser(user.id);
      })
      .immediate();
  }

  private requireEntitled(telegramId: number): UserRecord {
    const user = this.users.requireByTelegramId(telegramId);
    if (!this.ledger.isEntitled(user)) {
      throw new ProxyBotError('NOT_ENTITLED', `User ${telegramId} has no active subscription`);
    }
    return user;
  }

  private insertSet(user: UserRecord, servers: readonly ServerEndpoint[]): void {
    if (servers.length === 0) {
      throw new ProxyBotError('NO_ACTIVE_SERVERS', 'No active proxy servers to issue configs for');
    }

    const createdAt = toStoredTime(this.clock.now());

    for (const server of servers) {
      this.queries.insert.run({
        user_id: user.id,
        proxy_secret: this.generateSecret(),
        server_address: server.address,
        port: server.port,
        created_at: createdAt,
      });
    }
  }

  private listForUser(userId: number): ProxyCredential[] {
    const rows = this.queries.listForUser.all(userId) as ConfigRow[];
    return rows.map(rowToCredential);
  }
}
