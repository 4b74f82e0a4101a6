import { isValidPort } from './server-directory';

export type Parsed<T> = { ok: true; args: T } | { ok: false; message: string };

export interface ServerAddArgs {
  address: string;
  port: number;
  description?: string;
}

export interface GrantSubArgs {
  telegramId: number;
  days: number;
}

const UNSIGNED_INT = /^\d+$/;
const SIGNED_INT = /^-?\d+$/;

/** Аргументы после команды: `/server_add@bot a b` → ['a', 'b'] */
function commandArgs(text: string): string[] {
  return text.trim().split(/\s+/).slice(1);
}

// ─── server_add <адрес> <порт> [описание] ───
export function parseServerAdd(text: string): Parsed<ServerAddArgs> {
  const args = commandArgs(text);
  if (args.length < 2) {
    return { ok: false, message: '❌ Неверный формат. Использование: /server_add <адрес> <порт> [описание]' };
  }

  const [address, rawPort, ...rest] = args;
  const port = UNSIGNED_INT.test(rawPort) ? Number(rawPort) : Number.NaN;
  if (!isValidPort(port)) {
    return { ok: false, message: `❌ Неверный номер порта: ${rawPort}` };
  }

  const description = rest.join(' ');
  return { ok: true, args: description ? { address, port, description } : { address, port } };
}

// ─── grant_sub <telegram_id> <дней> ───
export function parseGrantSub(text: string): Parsed<GrantSubArgs> {
  const args = commandArgs(text);
  if (args.length !== 2) {
    return { ok: false, message: '❌ Неверный формат. Использование: /grant_sub <telegram_id> <дней>' };
  }

  const [rawId, rawDays] = args;
  if (!UNSIGNED_INT.test(rawId) || !SIGNED_INT.test(rawDays)) {
    return { ok: false, message: '❌ Неверный ID пользователя или количество дней' };
  }

  const days = Number(rawDays);
  if (days <= 0) {
    return { ok: false, message: '❌ Количество дней должно быть положительным' };
  }
  return { ok: true, args: { telegramId: Number(rawId), days } };
}

/** Первый аргумент как целое: `/block 123`, `/server_toggle 2` */
export function parseIdArgument(text: string): number | null {
  const [raw] = commandArgs(text);
  if (raw === undefined || !UNSIGNED_INT.test(raw)) return null;
  return Number(raw);
}
