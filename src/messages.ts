import type { BotConfig } from './config';
import type { PaymentRecord, PaymentStats } from './payment-store';
import { buildLink, buildWebLink, type ProxyStatus } from './proxy-monitor';
import type { ProxyCredential } from './proxy-registry';
import type { ProxyServer } from './server-directory';
import { formatDate, formatTimeLeft } from './time';
import type { UserRecord } from './user-store';

export interface Button {
  text: string;
  data: string;
}

export type Keyboard = Button[][];

/** Ответ оркестратора: транспорт сам решает, как его отправить */
export interface Reply {
  text: string;
  keyboard?: Keyboard;
  markdown?: boolean;
  /** Для callback — показать как alert, а не сообщением */
  alert?: boolean;
  /** Отдельное уведомление для админов */
  adminNote?: string;
}

export const CALLBACK = {
  subscribe: 'subscribe',
  freeTrial: 'free_trial',
  getConfig: 'get_config',
  refreshConfig: 'refresh_config',
  adminMain: 'admin_main',
  adminServers: 'admin_servers',
  adminStats: 'admin_stats',
  adminUsers: 'admin_users',
  adminPayments: 'admin_payments',
  adminProxy: 'admin_proxy',
} as const;

export function displayName(user: Pick<UserRecord, 'firstName' | 'username' | 'telegramId'>): string {
  return user.firstName || user.username || String(user.telegramId);
}

/** Экранирует спецсимволы parse_mode Markdown в тексте вне code-блоков */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, (ch) => `\\${ch}`);
}

export function formatPrice(amount: number, currency: string): string {
  return `${amount.toFixed(2)} ${currency}`;
}

// ═══════════════════════════════════════════════
// КЛАВИАТУРЫ
// ═══════════════════════════════════════════════

export function subscriptionKeyboard(config: BotConfig, trialAvailable: boolean): Keyboard {
  const rows: Keyboard = [
    [{ text: `💳 Подписка — ${formatPrice(config.subscriptionPrice, config.subscriptionCurrency)}`, data: CALLBACK.subscribe }],
  ];
  if (trialAvailable) {
    rows.push([{ text: `🎁 Бесплатный триал — ${config.trialDays} дн.`, data: CALLBACK.freeTrial }]);
  }
  return rows;
}

export const getConfigKeyboard: Keyboard = [[{ text: '🔗 Получить конфиг', data: CALLBACK.getConfig }]];

export const refreshConfigKeyboard: Keyboard = [[{ text: '🔄 Обновить конфиг', data: CALLBACK.refreshConfig }]];

export const adminKeyboard: Keyboard = [
  [
    { text: '🖥 Серверы', data: CALLBACK.adminServers },
    { text: '📊 Статистика', data: CALLBACK.adminStats },
  ],
  [
    { text: '👥 Пользователи', data: CALLBACK.adminUsers },
    { text: '💰 Платежи', data: CALLBACK.adminPayments },
  ],
  [{ text: '📡 Прокси', data: CALLBACK.adminProxy }],
];

export const adminBackKeyboard: Keyboard = [[{ text: '⬅️ Назад', data: CALLBACK.adminMain }]];

// ═══════════════════════════════════════════════
// ТЕКСТЫ
// ═══════════════════════════════════════════════

export function formatConfigText(credentials: readonly ProxyCredential[]): string {
  if (credentials.length === 0) {
    return 'Нет доступных конфигов прокси.';
  }

  const blocks = credentials.map((c, i) => {
    const endpoint = { address: c.serverAddress, port: c.port };
    return (
      `*Сервер ${i + 1}:*\n` +
      `Адрес: \`${c.serverAddress}\`\n` +
      `Порт: \`${c.port}\`\n` +
      `Секрет: \`${c.secret}\`\n` +
      `Ссылка: \`${buildLink(endpoint, c.secret)}\`\n` +
      `[Подключить](${buildWebLink(endpoint, c.secret)})`
    );
  });

  return (
    '🔗 Твои конфиги прокси:\n\n' +
    blocks.join('\n\n') +
    '\n\n⚠️ Не передавай ссылки — они привязаны к твоему аккаунту.'
  );
}

export function formatStatusText(user: UserRecord, entitled: boolean, now: Date): string {
  if (!user.subscriptionUntil) {
    return 'У тебя ещё не было подписки.\nОформи её или возьми бесплатный триал: /start';
  }
  if (!entitled) {
    return `Подписка истекла ${formatDate(user.subscriptionUntil)}.\nПродлить: /start`;
  }
  return (
    '📊 Твоя подписка:\n\n' +
    'Статус: ✅ Активна\n' +
    `Осталось: ${formatTimeLeft(user.subscriptionUntil, now)}\n` +
    `До: ${formatDate(user.subscriptionUntil)}\n\n` +
    'Конфиг: /config'
  );
}

export function formatHelpText(trialEnabled: boolean): string {
  return (
    '📖 Команды:\n\n' +
    '/start — начало и покупка\n' +
    '/config — получить конфиги прокси\n' +
    '/status — статус подписки\n' +
    (trialEnabled ? '/trial — бесплатный пробный период\n' : '') +
    '/help — эта справка'
  );
}

const SERVER_HELP = 'Добавить: `/server_add <адрес> <порт> [описание]`';

export function formatServerList(servers: readonly ProxyServer[]): string {
  if (servers.length === 0) {
    return `🖥 Серверов пока нет.\n\n${SERVER_HELP}`;
  }

  const lines = servers.map(
    (s) =>
      `${s.isActive ? '🟢' : '🔴'} #${s.id} \`${s.address}:${s.port}\`` +
      (s.description ? ` — ${escapeMarkdown(s.description)}` : '') +
      (s.location ? ` (${escapeMarkdown(s.location)})` : ''),
  );

  return (
    `🖥 Серверы (${servers.length}):\n\n${lines.join('\n')}\n\n` +
    `${SERVER_HELP}\n` +
    'Вкл/выкл: `/server_toggle <id>`'
  );
}

export interface BotStats {
  totalUsers: number;
  entitledUsers: number;
  activeServers: number;
  totalServers: number;
  payments: PaymentStats;
}

export function formatStatsText(stats: BotStats): string {
  const revenue = stats.payments.revenue.length
    ? stats.payments.revenue.map((r) => formatPrice(r.total, r.currency)).join(', ')
    : '0';

  return (
    '📊 Статистика:\n\n' +
    `👥 Пользователей: ${stats.totalUsers}\n` +
    `✅ С активной подпиской: ${stats.entitledUsers}\n` +
    `🖥 Серверов: ${stats.activeServers} активных / ${stats.totalServers} всего\n\n` +
    `💰 Платежей: ${stats.payments.completed} (сегодня: ${stats.payments.todayCompleted})\n` +
    `   Выручка: ${revenue}`
  );
}

export function formatUserList(users: readonly UserRecord[], isEntitled: (u: UserRecord) => boolean): string {
  if (users.length === 0) return 'Пользователей пока нет.';

  const lines = users.map((u, i) => {
    const name = u.username ? `@${u.username}` : displayName(u);
    const state = !u.isActive
      ? '⛔ заблокирован'
      : u.subscriptionUntil === null
        ? 'без подписки'
        : isEntitled(u)
          ? `до ${formatDate(u.subscriptionUntil)}`
          : 'истекла';
    return `${i + 1}. ${name} (${u.telegramId}) — ${state}`;
  });

  return `👥 Последние пользователи (${users.length}):\n\n${lines.join('\n')}`;
}

export function formatPaymentsText(stats: PaymentStats, recent: readonly PaymentRecord[]): string {
  const revenue = stats.revenue.length
    ? stats.revenue.map((r) => formatPrice(r.total, r.currency)).join(', ')
    : '0';

  const lines = recent.map(
    (p) => `#${p.id} — ${formatPrice(p.amount, p.currency)}, ${p.status}, ${formatDate(p.createdAt)}`,
  );

  return (
    '💰 Платежи:\n\n' +
    `Выручка: ${revenue}\n` +
    `Завершённых: ${stats.completed}\n` +
    (lines.length ? `\nПоследние:\n${lines.join('\n')}` : '')
  );
}

export function formatProxyStatus(status: ProxyStatus | null): string {
  if (!status) {
    return '❌ Прокси: метрики недоступны';
  }
  return (
    '📡 Статус MTG прокси:\n\n' +
    `🔌 Клиентских подключений: ${status.clientConnections}\n` +
    `📡 Подключений к Telegram: ${status.telegramConnections}\n` +
    `🌐 Domain fronting: ${status.domainFrontingConnections}\n` +
    `🛡 Отбито replay-атак: ${status.replayAttacks}\n` +
    `⚠️ Ограничено по конкуренции: ${status.concurrencyLimited}`
  );
}
