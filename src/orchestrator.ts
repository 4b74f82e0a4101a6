import { checkAdmin } from './access-control';
import { parseGrantSub, parseIdArgument, parseServerAdd } from './admin-commands';
import type { BotConfig } from './config';
import { errorMessage, isProxyBotError } from './errors';
import {
  adminBackKeyboard,
  adminKeyboard,
  displayName,
  escapeMarkdown,
  formatConfigText,
  formatHelpText,
  formatPaymentsText,
  formatPrice,
  formatProxyStatus,
  formatServerList,
  formatStatsText,
  formatStatusText,
  formatUserList,
  getConfigKeyboard,
  refreshConfigKeyboard,
  subscriptionKeyboard,
  type Reply,
} from './messages';
import type { PaymentStore } from './payment-store';
import type { ProxyMonitor } from './proxy-monitor';
import type { ProxyConfigRegistry } from './proxy-registry';
import type { ProxyServer, ServerDirectory } from './server-directory';
import type { SubscriptionLedger } from './subscription-ledger';
import { formatDate, type Clock } from './time';
import type { UserProfile, UserRecord, UserStore } from './user-store';

/** Уведомление платёжки: сумма в минимальных единицах (копейки, центы) */
export interface PaymentNotification {
  externalUserId: number;
  amountMinorUnits: number;
  currencyCode: string;
  providerReference: string;
}

export interface InvoiceRequest {
  title: string;
  description: string;
  payload: string;
  providerToken: string;
  currency: string;
  amountMinorUnits: number;
}

export interface PreCheckout {
  externalUserId: number;
  payload: string;
  currency: string;
  totalAmount: number;
}

export type PreCheckoutDecision = { ok: true } | { ok: false; message: string };

export interface ExpiryNotice {
  telegramId: number;
  reply: Reply;
}

export interface OrchestratorDeps {
  config: BotConfig;
  clock: Clock;
  users: UserStore;
  payments: PaymentStore;
  ledger: SubscriptionLedger;
  registry: ProxyConfigRegistry;
  directory: ServerDirectory;
  monitor: ProxyMonitor;
}

const RECENT_LIMIT = 10;
const INVOICE_PREFIX = 'subscription_';

export function invoicePayload(telegramId: number): string {
  return `${INVOICE_PREFIX}${telegramId}`;
}

export function toMinorUnits(amount: number): number {
  return Math.round(amount * 100);
}

/**
 * Связка между чатом и ядром: принимает события пользователя,
 * дёргает Ledger / Registry / Directory и возвращает Reply.
 * Telegraf здесь не нужен — транспорт живёт в bot.ts.
 */
export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private proxyHealthy: boolean | null = null;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  private get trialEnabled(): boolean {
    return this.deps.config.trialDays > 0;
  }

  // ═══════════════════════════════════════════════
  // ПОЛЬЗОВАТЕЛИ
  // ═══════════════════════════════════════════════

  start(profile: UserProfile): Reply {
    const { users, ledger, config } = this.deps;
    const user = users.touch(profile);
    const name = displayName(user);

    if (ledger.isEntitled(user) && user.subscriptionUntil) {
      return {
        text:
          `С возвращением, ${name}! 🎉\n\n` +
          `Подписка активна до ${formatDate(user.subscriptionUntil)}.\n` +
          'Конфиг прокси: /config',
        keyboard: getConfigKeyboard,
      };
    }

    return {
      text:
        `Добро пожаловать, ${name}! 🚀\n\n` +
        'Доступ к Telegram через наши MTProto-прокси.\n\n' +
        `💰 Подписка: ${formatPrice(config.subscriptionPrice, config.subscriptionCurrency)} за ${config.subscriptionDays} дн.\n` +
        '🔒 Протокол MTProto\n' +
        '🌍 Несколько серверов\n\n' +
        'Выбери вариант ниже:',
      keyboard: subscriptionKeyboard(config, this.trialEnabled && ledger.isTrialEligible(user)),
    };
  }

  help(): Reply {
    return { text: formatHelpText(this.trialEnabled) };
  }

  status(profile: UserProfile): Reply {
    const { users, ledger, clock } = this.deps;
    const user = users.touch(profile);
    return { text: formatStatusText(user, ledger.isEntitled(user), clock.now()) };
  }

  showConfig(profile: UserProfile): Reply {
    const user = this.deps.users.touch(profile);
    const denied = this.denyConfig(user);
    if (denied) return denied;

    try {
      const credentials = this.deps.registry.ensureConfigs(user.telegramId, this.activeServers());
      return { text: formatConfigText(credentials), keyboard: refreshConfigKeyboard, markdown: true };
    } catch (err) {
      return this.configFailure(err);
    }
  }

  refreshConfig(profile: UserProfile): Reply {
    const user = this.deps.users.touch(profile);
    const denied = this.denyConfig(user);
    if (denied) {
      return { text: user.isActive ? '❌ Подписка истекла!' : '⛔ Доступ заблокирован администратором.', alert: true };
    }

    try {
      const credentials = this.deps.registry.rotateConfigs(user.telegramId, this.activeServers());
      return { text: formatConfigText(credentials), keyboard: refreshConfigKeyboard, markdown: true };
    } catch (err) {
      return { ...this.configFailure(err), alert: true };
    }
  }

  startTrial(profile: UserProfile): Reply {
    const { users, ledger, config } = this.deps;

    if (!this.trialEnabled) {
      return { text: '🎁 Бесплатный триал сейчас отключён.', alert: true };
    }

    const user = users.touch(profile);
    if (!user.isActive) {
      return { text: '⛔ Доступ заблокирован администратором.', alert: true };
    }
    if (ledger.isEntitled(user)) {
      return { text: 'У тебя уже есть активная подписка!', alert: true };
    }

    const result = ledger.grantTrial(user.telegramId, config.trialDays);
    if (!result.ok) {
      return result.error === 'ALREADY_ENTITLED'
        ? { text: 'У тебя уже есть активная подписка!', alert: true }
        : { text: '🎁 Ты уже использовал бесплатный триал. Оформи подписку: /start', alert: true };
    }

    const until = result.value.expiresAt;
    return {
      text:
        '🎉 Триал активирован!\n\n' +
        `Срок: ${config.trialDays} дн.` +
        (until ? `\nДействует до: ${formatDate(until)}` : '') +
        '\n\nКонфиг прокси: /config',
      keyboard: getConfigKeyboard,
      adminNote: `🎁 Выдан триал\nПользователь: @${user.username || user.telegramId}\nСрок: ${config.trialDays} дн.`,
    };
  }

  // ═══════════════════════════════════════════════
  // ОПЛАТА
  // ═══════════════════════════════════════════════

  invoice(profile: UserProfile): InvoiceRequest {
    const { config } = this.deps;
    this.deps.users.touch(profile);
    return {
      title: 'Подписка на Telegram Proxy',
      description: `Доступ к прокси-серверам на ${config.subscriptionDays} дн.`,
      payload: invoicePayload(profile.telegramId),
      providerToken: config.paymentProviderToken,
      currency: config.subscriptionCurrency,
      amountMinorUnits: toMinorUnits(config.subscriptionPrice),
    };
  }

  validatePreCheckout(query: PreCheckout): PreCheckoutDecision {
    const { config, users } = this.deps;

    // Инвойс должен быть оплачен тем же пользователем, для которого создан
    if (query.payload !== invoicePayload(query.externalUserId)) {
      return { ok: false, message: 'Инвойс недействителен для этого пользователя' };
    }
    if (query.currency !== config.subscriptionCurrency) {
      return { ok: false, message: 'Неверная валюта платежа' };
    }
    if (query.totalAmount !== toMinorUnits(config.subscriptionPrice)) {
      return { ok: false, message: 'Цена изменилась, запроси новый счёт' };
    }

    const user = users.get(query.externalUserId);
    if (user && !user.isActive) {
      return { ok: false, message: 'Доступ заблокирован администратором' };
    }
    return { ok: true };
  }

  handlePayment(profile: UserProfile, notification: PaymentNotification): Reply {
    const { users, ledger } = this.deps;
    const user = users.touch(profile);
    const amount = notification.amountMinorUnits / 100;

    const entitlement = ledger.applyPayment(
      notification.externalUserId,
      amount,
      notification.currencyCode,
      notification.providerReference,
    );

    return {
      text:
        '✅ Оплата принята! Спасибо!\n\n' +
        (entitlement.expiresAt ? `Подписка активна до ${formatDate(entitlement.expiresAt)} (UTC)\n\n` : '') +
        'Конфиг прокси: /config',
      keyboard: getConfigKeyboard,
      adminNote:
        '💰 Оплата!\n' +
        `От: @${user.username || user.telegramId}\n` +
        `Сумма: ${formatPrice(amount, notification.currencyCode)}\n` +
        `Charge ID: ${notification.providerReference}`,
    };
  }

  // ═══════════════════════════════════════════════
  // АДМИНКА
  // ═══════════════════════════════════════════════

  adminPanel(callerId: number | undefined): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    return {
      text:
        '👑 Админ-панель:\n\n' +
        '/server_add <адрес> <порт> [описание] — добавить сервер\n' +
        '/server_toggle <id> — вкл/выкл сервер\n' +
        '/grant_sub <telegram_id> <дней> — выдать подписку\n' +
        '/block <telegram_id> — заблокировать\n' +
        '/unblock <telegram_id> — разблокировать',
      keyboard: adminKeyboard,
    };
  }

  adminServers(callerId: number | undefined): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const { directory, config } = this.deps;
    directory.seedFromConfig(config.proxyServers);
    return { text: formatServerList(directory.listAll()), keyboard: adminBackKeyboard, markdown: true };
  }

  adminStats(callerId: number | undefined): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const { users, directory, payments, clock } = this.deps;
    const now = clock.now();
    return {
      text: formatStatsText({
        totalUsers: users.count(),
        entitledUsers: users.countEntitled(now),
        activeServers: directory.countActive(),
        totalServers: directory.count(),
        payments: payments.stats(now),
      }),
      keyboard: adminBackKeyboard,
    };
  }

  adminUsers(callerId: number | undefined): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const { users, ledger } = this.deps;
    return {
      text: formatUserList(users.listRecent(RECENT_LIMIT), (u) => ledger.isEntitled(u)),
      keyboard: adminBackKeyboard,
    };
  }

  adminPayments(callerId: number | undefined): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const { payments, clock } = this.deps;
    return {
      text: formatPaymentsText(payments.stats(clock.now()), payments.listRecent(RECENT_LIMIT)),
      keyboard: adminBackKeyboard,
    };
  }

  async adminProxy(callerId: number | undefined): Promise<Reply> {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const status = await this.deps.monitor.getStatus();
    return { text: formatProxyStatus(status), keyboard: adminBackKeyboard };
  }

  serverAdd(callerId: number | undefined, text: string): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const parsed = parseServerAdd(text);
    if (!parsed.ok) return { text: parsed.message };

    const { address, port, description } = parsed.args;
    const result = this.deps.directory.add(address, port, description);
    if (!result.ok) {
      return { text: `❌ Сервер \`${address}\` уже есть в каталоге`, markdown: true };
    }

    const server = result.value;
    return {
      text:
        '✅ Сервер добавлен\n\n' +
        `ID: ${server.id}\n` +
        `Адрес: \`${server.address}:${server.port}\`\n` +
        `Описание: ${server.description ? escapeMarkdown(server.description) : '—'}`,
      markdown: true,
    };
  }

  serverToggle(callerId: number | undefined, text: string): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const serverId = parseIdArgument(text);
    if (serverId === null) return { text: 'Использование: /server_toggle <id>' };

    try {
      const current = this.deps.directory.get(serverId);
      const server = this.deps.directory.setActive(serverId, !current.isActive);
      return {
        text: `${server.isActive ? '🟢' : '🔴'} Сервер #${server.id} ${server.address} ${server.isActive ? 'включён' : 'выключен'}.`,
      };
    } catch (err) {
      if (isProxyBotError(err, 'NOT_FOUND')) return { text: `❌ Сервер #${serverId} не найден` };
      throw err;
    }
  }

  grantSub(callerId: number | undefined, text: string): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const parsed = parseGrantSub(text);
    if (!parsed.ok) return { text: parsed.message };

    const { telegramId, days } = parsed.args;
    try {
      const entitlement = this.deps.ledger.adminGrant(telegramId, days);
      return {
        text:
          '✅ Подписка выдана\n\n' +
          `Пользователь: ${telegramId}\n` +
          `Добавлено дней: ${days}\n` +
          (entitlement.expiresAt ? `Действует до: ${formatDate(entitlement.expiresAt)}` : ''),
      };
    } catch (err) {
      if (isProxyBotError(err, 'NOT_FOUND')) {
        return { text: `❌ Пользователь с ID \`${telegramId}\` не найден`, markdown: true };
      }
      throw err;
    }
  }

  setUserActive(callerId: number | undefined, text: string, active: boolean): Reply {
    const denied = this.denyAdmin(callerId);
    if (denied) return denied;

    const telegramId = parseIdArgument(text);
    if (telegramId === null) {
      return { text: `Использование: /${active ? 'unblock' : 'block'} <telegram_id>` };
    }

    try {
      this.deps.users.setActive(telegramId, active);
      return { text: `✅ Пользователь ${telegramId} ${active ? 'разблокирован' : 'заблокирован'}.` };
    } catch (err) {
      if (isProxyBotError(err, 'NOT_FOUND')) return { text: `Пользователь ${telegramId} не найден.` };
      throw err;
    }
  }

  // ═══════════════════════════════════════════════
  // ФОНОВЫЕ ПРОВЕРКИ
  // ═══════════════════════════════════════════════

  /** Истёкшие подписки: каждому пользователю — одно уведомление на каждое истечение */
  collectExpiryNotices(): ExpiryNotice[] {
    const { users, clock } = this.deps;
    const now = clock.now();

    return users.listNewlyExpired(now).map((user) => {
      users.markExpiryNotified(user.id, now);
      return {
        telegramId: user.telegramId,
        reply: {
          text: '⏰ Твоя подписка на прокси истекла.\n\nПродли через /start, чтобы продолжить пользоваться.',
          keyboard: subscriptionKeyboard(this.deps.config, false),
        },
      };
    });
  }

  /** Текст для админов, если прокси упал или поднялся с прошлой проверки */
  async checkProxyHealth(): Promise<string | null> {
    const healthy = await this.deps.monitor.healthCheck();
    const previous = this.proxyHealthy;
    this.proxyHealthy = healthy;

    if (previous === healthy) return null;
    if (!healthy) return `❌ Прокси не отвечает (${this.deps.monitor.url})`;
    return previous === null ? null : '✅ Прокси снова доступен.';
  }

  // ─── helpers ───

  private activeServers(): ProxyServer[] {
    const { directory, config } = this.deps;
    directory.seedFromConfig(config.proxyServers);
    return directory.listActive();
  }

  private denyConfig(user: UserRecord): Reply | null {
    const { ledger, config } = this.deps;
    if (!user.isActive) {
      return { text: '⛔ Доступ заблокирован администратором.' };
    }
    if (!ledger.isEntitled(user)) {
      return {
        text: '❌ У тебя нет активной подписки.\n\nОформи её, чтобы получить конфиги прокси.',
        keyboard: subscriptionKeyboard(config, this.trialEnabled && ledger.isTrialEligible(user)),
      };
    }
    return null;
  }

  private configFailure(err: unknown): Reply {
    if (isProxyBotError(err, 'NOT_ENTITLED')) {
      return { text: '❌ Подписка истекла. Продлить: /start' };
    }
    if (isProxyBotError(err, 'NO_ACTIVE_SERVERS')) {
      return { text: '😔 Сейчас нет доступных серверов. Попробуй позже.' };
    }
    console.error('[Orchestrator] Ошибка выдачи конфига:', errorMessage(err));
    throw err;
  }

  private denyAdmin(callerId: number | undefined): Reply | null {
    const auth = checkAdmin(callerId, this.deps.config.adminIds);
    return auth.allowed ? null : { text: `❌ ${auth.reason}`, alert: true };
  }
}
