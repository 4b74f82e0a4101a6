import type { ServerEndpoint } from './server-directory';
import { errorMessage } from './errors';

export type MetricsSnapshot = Record<string, number>;

export interface ProxyStatus {
  clientConnections: number;
  telegramConnections: number;
  domainFrontingConnections: number;
  replayAttacks: number;
  concurrencyLimited: number;
}

export interface ProxyMonitorOptions {
  host: string;
  port: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Разбирает текстовый формат Prometheus.
 * Метки отбрасываются, значения одной метрики с разными метками суммируются.
 */
export function parsePrometheusMetrics(text: string): MetricsSnapshot {
  const metrics: MetricsSnapshot = {};

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const name = parts[0].split('{')[0];
    const value = Number(parts[parts.length - 1]);
    if (!name || Number.isNaN(value)) continue;

    metrics[name] = (metrics[name] ?? 0) + value;
  }

  return metrics;
}

export function toProxyStatus(metrics: MetricsSnapshot): ProxyStatus {
  const read = (name: string) => Math.trunc(metrics[name] ?? 0);
  return {
    clientConnections: read('mtg_client_connections'),
    telegramConnections: read('mtg_telegram_connections'),
    domainFrontingConnections: read('mtg_domain_fronting_connections'),
    replayAttacks: read('mtg_replay_attacks'),
    concurrencyLimited: read('mtg_concurrency_limited'),
  };
}

/** tg:// ссылка для подключения */
export function buildLink(endpoint: ServerEndpoint, secret: string): string {
  return `tg://proxy?server=${endpoint.address}&port=${endpoint.port}&secret=${secret}`;
}

/** t.me ссылка — открывается и из браузера */
export function buildWebLink(endpoint: ServerEndpoint, secret: string): string {
  return `https://t.me/proxy?server=${endpoint.address}&port=${endpoint.port}&secret=${secret}`;
}

/**
 * Смотрит на mtg через его /metrics. Только чтение: прокси живёт своей жизнью,
 * бот лишь показывает админу состояние.
 */
export class ProxyMonitor {
  private readonly metricsUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ProxyMonitorOptions) {
    this.metricsUrl = `http://${options.host}:${options.port}/metrics`;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get url(): string {
    return this.metricsUrl;
  }

  /** null — если endpoint недоступен */
  async getMetrics(): Promise<MetricsSnapshot | null> {
    try {
      const response = await this.fetchImpl(this.metricsUrl, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        console.error(`[Monitor] ${this.metricsUrl} ответил ${response.status}`);
        return null;
      }
      return parsePrometheusMetrics(await response.text());
    } catch (err) {
      console.error('[Monitor] Не удалось получить метрики:', errorMessage(err));
      return null;
    }
  }

  async getStatus(): Promise<ProxyStatus | null> {
    const metrics = await this.getMetrics();
    return metrics ? toProxyStatus(metrics) : null;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(this.metricsUrl, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.status === 200;
    } catch {
      return false;
    }
  }
}
