export interface BotConfig {
  readonly botToken: string;
  readonly adminIds: readonly number[];
  readonly paymentProviderToken: string;
  readonly databasePath: string;
  /** `host[:port]` — начальный список для пустого каталога серверов */
  readonly proxyServers: readonly string[];
  readonly subscriptionPrice: number;
  readonly subscriptionCurrency: string;
  readonly subscriptionDays: number;
  /** 0 — триал выключен */
  readonly trialDays: number;
  readonly metricsHost: string;
  readonly metricsPort: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseAdminIds(value: string | undefined): number[] {
  if (!value || value.trim() === '') return [];

  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id !== '')
    .map((id) => Number.parseInt(id, 10))
    .filter((id) => !Number.isNaN(id) && id > 0);
}

export function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} должен быть числом, получено "${raw}"`);
  }
  return value;
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} должен быть целым числом ≥ ${min}`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv): BotConfig {
  const botToken = env.BOT_TOKEN || '';
  const adminIds = parseAdminIds(env.ADMIN_IDS);

  if (!botToken || adminIds.length === 0) {
    throw new ConfigError('BOT_TOKEN и ADMIN_IDS обязательны в .env');
  }

  const subscriptionPrice = readNumber(env, 'SUBSCRIPTION_PRICE', 5);
  if (subscriptionPrice <= 0) {
    throw new ConfigError('SUBSCRIPTION_PRICE должен быть больше нуля');
  }

  return {
    botToken,
    adminIds,
    paymentProviderToken: env.PAYMENT_PROVIDER_TOKEN || '',
    databasePath: env.DATABASE_PATH || 'data/proxy.db',
    proxyServers: parseList(env.PROXY_SERVERS),
    subscriptionPrice,
    subscriptionCurrency: (env.SUBSCRIPTION_CURRENCY || 'USD').toUpperCase(),
    subscriptionDays: readInteger(env, 'SUBSCRIPTION_DURATION', 30, 1),
    trialDays: readInteger(env, 'TRIAL_DAYS', 1, 0),
    metricsHost: env.MTG_METRICS_HOST || 'mtg-proxy',
    metricsPort: readInteger(env, 'MTG_METRICS_PORT', 8080, 1),
  };
}
