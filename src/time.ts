export const DAY_MS = 86400000;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Читает метку времени из БД.
 * Старые записи бывают без зоны (`2025-01-01 12:00:00` от datetime('now')) —
 * такие считаем UTC. Смещение `+0300` приводится к `+03:00`.
 */
export function parseStoredTime(value: string): Date {
  const raw = value.trim();
  let normalized: string;
  if (DATE_ONLY.test(raw)) {
    normalized = raw;
  } else if (HAS_ZONE.test(raw)) {
    normalized = raw.replace(' ', 'T').replace(COMPACT_OFFSET, '$1:$2');
  } else {
    normalized = `${raw.replace(' ', 'T')}Z`;
  }

  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid stored timestamp: ${value}`);
  }
  return date;
}

export function toStoredTime(date: Date): string {
  return date.toISOString();
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function formatDate(date: Date): string {
  return date.toLocaleDateString('ru-RU', {
    day: 'numeric',
    month: 'long',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    timeZone: 'UTC',
  });
}

export function formatTimeLeft(until: Date, now: Date): string {
  const ms = until.getTime() - now.getTime();
  if (ms <= 0) return 'истекло';

  const sec = Math.floor(ms / 1000) % 60;
  const mins = Math.floor(ms / 60000) % 60;
  const hours = Math.floor(ms / 3600000) % 24;
  const days = Math.floor(ms / DAY_MS);

  if (days > 0) return `${days} дн. ${hours} ч. ${mins} мин.`;
  if (hours > 0) return `${hours} ч. ${mins} мин. ${sec} сек.`;
  if (mins > 0) return `${mins} мин. ${sec} сек.`;
  return `${Math.ceil(ms / 1000)} сек.`;
}
