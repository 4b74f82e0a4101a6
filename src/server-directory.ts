import type { DB } from './database';
import { ProxyBotError, type Result } from './errors';
import { parseStoredTime, toStoredTime, type Clock } from './time';

export const DEFAULT_PROXY_PORT = 443;

type ServerRow = {
  id: number;
  address: string;
  port: number;
  description: string | null;
  location: string | null;
  max_users: number;
  is_active: number;
  created_at: string;
  updated_at: string;
};

export interface ProxyServer {
  readonly id: number;
  readonly address: string;
  port: number;
  description: string | null;
  location: string | null;
  maxUsers: number;
  isActive: boolean;
  readonly createdAt: Date;
  updatedAt: Date;
}

export interface ServerEndpoint {
  address: string;
  port: number;
}

const SERVER_COLUMNS =
  'id, address, port, description, location, max_users, is_active, created_at, updated_at';

function rowToServer(row: ServerRow): ProxyServer {
  return {
    id: row.id,
    address: row.address,
    port: row.port,
    description: row.description,
    location: row.location,
    maxUsers: row.max_users,
    isActive: row.is_active === 1,
    createdAt: parseStoredTime(row.created_at),
    updatedAt: parseStoredTime(row.updated_at),
  };
}

function endpointWithPort(address: string, rawPort: string): ServerEndpoint | null {
  const port = rawPort.trim() === '' ? Number.NaN : Number(rawPort.trim());
  if (!address || !isValidPort(port)) return null;
  return { address, port };
}

/**
 * `host`, `host:port`, `[ipv6]` или `[ipv6]:port`; порт по умолчанию 443.
 * IPv6 без скобок не принимается: не отличить адрес от порта.
 */
export function parseServerEndpoint(value: string): ServerEndpoint | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']');
    if (close < 2) return null;
    const address = trimmed.slice(0, close + 1);
    const rest = trimmed.slice(close + 1);
    if (rest === '') return { address, port: DEFAULT_PROXY_PORT };
    return rest.startsWith(':') ? endpointWithPort(address, rest.slice(1)) : null;
  }

  const sep = trimmed.lastIndexOf(':');
  if (sep === -1) {
    return { address: trimmed, port: DEFAULT_PROXY_PORT };
  }

  const address = trimmed.slice(0, sep).trim();
  if (address.includes(':')) return null;
  return endpointWithPort(address, trimmed.slice(sep + 1));
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

// ─── Подготовленные запросы ───

function prepareQueries(db: DB) {
  return {
    listActive: db.prepare(`SELECT ${SERVER_COLUMNS} FROM proxy_servers WHERE is_active = 1 ORDER BY id ASC`),
    listAll: db.prepare(`SELECT ${SERVER_COLUMNS} FROM proxy_servers ORDER BY id ASC`),
    get: db.prepare(`SELECT ${SERVER_COLUMNS} FROM proxy_servers WHERE id = ?`),
    getByAddress: db.prepare(`SELECT ${SERVER_COLUMNS} FROM proxy_servers WHERE address = ?`),
    count: db.prepare(`SELECT COUNT(*) AS count FROM proxy_servers`),
    countActive: db.prepare(`SELECT COUNT(*) AS count FROM proxy_servers WHERE is_active = 1`),
    insert: db.prepare(`
      INSERT INTO proxy_servers (address, port, description, created_at, updated_at)
      VALUES (@address, @port, @description, @now, @now)
    `),
    setActive: db.prepare(`UPDATE proxy_servers SET is_active = ?, updated_at = ? WHERE id = ?`),
  };
}

/**
 * Каталог прокси-серверов. Серверы не удаляются — только выключаются,
 * чтобы старые конфиги пользователей продолжали ссылаться на них.
 */
export class ServerDirectory {
  private readonly db: DB;
  private readonly clock: Clock;
  private readonly queries: ReturnType<typeof prepareQueries>;

  constructor(db: DB, clock: Clock) {
    this.db = db;
    this.clock = clock;
    this.queries = prepareQueries(db);
  }

  listActive(): ProxyServer[] {
    const rows = this.queries.listActive.all() as ServerRow[];
    return rows.map(rowToServer);
  }

  listAll(): ProxyServer[] {
    const rows = this.queries.listAll.all() as ServerRow[];
    return rows.map(rowToServer);
  }

  get(serverId: number): ProxyServer {
    const row = this.queries.get.get(serverId) as ServerRow | undefined;
    if (!row) {
      throw new ProxyBotError('NOT_FOUND', `Server ${serverId} not found`);
    }
    return rowToServer(row);
  }

  count(): number {
    const row = this.queries.count.get() as { count: number };
    return row.count;
  }

  countActive(): number {
    const row = this.queries.countActive.get() as { count: number };
    return row.count;
  }

  /**
   * Заполняет пустой каталог из PROXY_SERVERS.
   * Если в каталоге уже что-то есть — ничего не делает. Возвращает число добавленных.
   */
  seedFromConfig(defaults: readonly string[]): number {
    return this.db
      .transaction((): number => {
        if (this.count() > 0) return 0;

        let inserted = 0;
        for (const entry of defaults) {
          const endpoint = parseServerEndpoint(entry);
          if (!endpoint) {
            console.warn(`[Directory] Пропускаю некорректный адрес сервера: "${entry}"`);
            continue;
          }
          if (this.findByAddress(endpoint.address)) continue;
          this.insert(endpoint.address, endpoint.port, `Server ${endpoint.address}`);
          inserted++;
        }

        if (inserted > 0) {
          console.log(`[Directory] Каталог заполнен из конфига: ${inserted} серверов`);
        }
        return inserted;
      })
      .immediate();
  }

  add(address: string, port: number = DEFAULT_PROXY_PORT, description?: string): Result<ProxyServer, 'DUPLICATE_ADDRESS'> {
    return this.db
      .transaction((): Result<ProxyServer, 'DUPLICATE_ADDRESS'> => {
        if (this.findByAddress(address)) {
          return { ok: false, error: 'DUPLICATE_ADDRESS' };
        }
        const server = this.insert(address, port, description?.trim() || `Server ${address}`);
        return { ok: true, value: server };
      })
      .immediate();
  }

  /** Выданные на сервер конфиги не трогает — их заменит ротация */
  setActive(serverId: number, active: boolean): ProxyServer {
    const server = this.get(serverId);
    const now = this.clock.now();
    this.queries.setActive.run(active ? 1 : 0, toStoredTime(now), serverId);
    return { ...server, isActive: active, updatedAt: now };
  }

  private findByAddress(address: string): ProxyServer | null {
    const row = this.queries.getByAddress.get(address) as ServerRow | undefined;
    return row ? rowToServer(row) : null;
  }

  private insert(address: string, port: number, description: string): ProxyServer {
    const now = toStoredTime(this.clock.now());
    const result = this.queries.insert.run({ address, port, description, now });
    return this.get(Number(result.lastInsertRowid));
  }
}
