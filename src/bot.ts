import { Telegraf, Markup, type Context } from 'telegraf';
import { message } from 'telegraf/filters';
import type { User } from 'telegraf/types';
import cron, { type ScheduledTask } from 'node-cron';
import type { BotConfig } from './config';
import { openDatabase } from './database';
import { errorMessage } from './errors';
import { CALLBACK, type Keyboard, type Reply } from './messages';
import { Orchestrator } from './orchestrator';
import { PaymentStore } from './payment-store';
import { ProxyMonitor } from './proxy-monitor';
import { ProxyConfigRegistry } from './proxy-registry';
import { ServerDirectory } from './server-directory';
import { SubscriptionLedger } from './subscription-ledger';
import { systemClock } from './time';
import { UserStore, type UserProfile } from './user-store';

function toProfile(from: User | undefined): UserProfile {
  if (!from) {
    throw new Error('Update has no sender');
  }
  return { telegramId: from.id, username: from.username, firstName: from.first_name };
}

function keyboardMarkup(keyboard: Keyboard) {
  return Markup.inlineKeyboard(
    keyboard.map((row) => row.map((button) => Markup.button.callback(button.text, button.data))),
  );
}

async function send(ctx: Context, reply: Reply): Promise<void> {
  await ctx.reply(reply.text, {
    ...(reply.markdown ? { parse_mode: 'Markdown' as const } : {}),
    ...(reply.keyboard ? keyboardMarkup(reply.keyboard) : {}),
  });
}

/** Ответ на нажатие кнопки: alert — всплывашкой, остальное — сообщением */
async function answerCallback(ctx: Context, reply: Reply): Promise<void> {
  if (reply.alert) {
    await ctx.answerCbQuery(reply.text.slice(0, 200), { show_alert: true });
    return;
  }
  await ctx.answerCbQuery();
  await send(ctx, reply);
}

export async function notifyAdmins(bot: Telegraf, adminIds: readonly number[], text: string): Promise<void> {
  for (const adminId of adminIds) {
    try {
      await bot.telegram.sendMessage(adminId, text);
    } catch (err) {
      console.error(`[Bot] Не удалось уведомить админа ${adminId}:`, errorMessage(err));
    }
  }
}

export function createBot(config: BotConfig, orchestrator: Orchestrator): Telegraf {
  const bot = new Telegraf(config.botToken);

  const relayAdminNote = async (reply: Reply): Promise<void> => {
    if (reply.adminNote) await notifyAdmins(bot, config.adminIds, reply.adminNote);
  };

  // ═══════════════════════════════════════════════
  // КОМАНДЫ ДЛЯ ПОЛЬЗОВАТЕЛЕЙ
  // ═══════════════════════════════════════════════

  bot.start((ctx) => send(ctx, orchestrator.start(toProfile(ctx.from))));
  bot.help((ctx) => send(ctx, orchestrator.help()));
  bot.command('status', (ctx) => send(ctx, orchestrator.status(toProfile(ctx.from))));
  bot.command('config', (ctx) => send(ctx, orchestrator.showConfig(toProfile(ctx.from))));
  bot.command('trial', async (ctx) => {
    const reply = orchestrator.startTrial(toProfile(ctx.from));
    await send(ctx, reply);
    await relayAdminNote(reply);
  });

  bot.action(CALLBACK.getConfig, (ctx) => answerCallback(ctx, orchestrator.showConfig(toProfile(ctx.from))));
  bot.action(CALLBACK.freeTrial, async (ctx) => {
    const reply = orchestrator.startTrial(toProfile(ctx.from));
    await answerCallback(ctx, reply);
    await relayAdminNote(reply);
  });

  bot.action(CALLBACK.refreshConfig, async (ctx) => {
    const reply = orchestrator.refreshConfig(toProfile(ctx.from));
    if (reply.alert) return answerCallback(ctx, reply);

    await ctx.answerCbQuery('Конфиг обновлён!');
    await send(ctx, reply);
  });

  // ═══════════════════════════════════════════════
  // ПОКУПКА И ОПЛАТА
  // ═══════════════════════════════════════════════

  bot.action(CALLBACK.subscribe, async (ctx) => {
    await ctx.answerCbQuery();
    const invoice = orchestrator.invoice(toProfile(ctx.from));

    try {
      await ctx.replyWithInvoice({
        title: invoice.title,
        description: invoice.description,
        payload: invoice.payload,
        provider_token: invoice.providerToken,
        currency: invoice.currency,
        prices: [{ label: 'Подписка', amount: invoice.amountMinorUnits }],
      });
    } catch (err) {
      console.error('[Bot] Ошибка создания инвойса:', errorMessage(err));
      await ctx.reply('Ошибка при создании платежа. Попробуй позже.');
    }
  });

  bot.on('pre_checkout_query', async (ctx) => {
    const query = ctx.preCheckoutQuery;
    const decision = orchestrator.validatePreCheckout({
      externalUserId: query.from.id,
      payload: query.invoice_payload,
      currency: query.currency,
      totalAmount: query.total_amount,
    });

    if (decision.ok) {
      await ctx.answerPreCheckoutQuery(true);
    } else {
      await ctx.answerPreCheckoutQuery(false, decision.message);
    }
  });

  bot.on(message('successful_payment'), async (ctx) => {
    const payment = ctx.message.successful_payment;
    const profile = toProfile(ctx.from);

    const reply = orchestrator.handlePayment(profile, {
      externalUserId: profile.telegramId,
      amountMinorUnits: payment.total_amount,
      currencyCode: payment.currency,
      providerReference: payment.provider_payment_charge_id || payment.telegram_payment_charge_id,
    });
    await send(ctx, reply);
    await relayAdminNote(reply);
  });

  // ═══════════════════════════════════════════════
  // АДМИНСКИЕ КОМАНДЫ
  // ═══════════════════════════════════════════════

  bot.command('admin', (ctx) => send(ctx, orchestrator.adminPanel(ctx.from?.id)));
  bot.command('server_add', (ctx) => send(ctx, orchestrator.serverAdd(ctx.from?.id, ctx.message.text)));
  bot.command('server_toggle', (ctx) => send(ctx, orchestrator.serverToggle(ctx.from?.id, ctx.message.text)));
  bot.command('grant_sub', (ctx) => send(ctx, orchestrator.grantSub(ctx.from?.id, ctx.message.text)));
  bot.command('block', (ctx) => send(ctx, orchestrator.setUserActive(ctx.from?.id, ctx.message.text, false)));
  bot.command('unblock', (ctx) => send(ctx, orchestrator.setUserActive(ctx.from?.id, ctx.message.text, true)));

  bot.action(CALLBACK.adminMain, (ctx) => answerCallback(ctx, orchestrator.adminPanel(ctx.from?.id)));
  bot.action(CALLBACK.adminServers, (ctx) => answerCallback(ctx, orchestrator.adminServers(ctx.from?.id)));
  bot.action(CALLBACK.adminStats, (ctx) => answerCallback(ctx, orchestrator.adminStats(ctx.from?.id)));
  bot.action(CALLBACK.adminUsers, (ctx) => answerCallback(ctx, orchestrator.adminUsers(ctx.from?.id)));
  bot.action(CALLBACK.adminPayments, (ctx) => answerCallback(ctx, orchestrator.adminPayments(ctx.from?.id)));
  bot.action(CALLBACK.adminProxy, async (ctx) => answerCallback(ctx, await orchestrator.adminProxy(ctx.from?.id)));

  // Всё, что не предусмотрели обработчики: SQLite, сеть Telegram
  bot.catch(async (err, ctx) => {
    console.error(`[Bot] Ошибка обработки ${ctx.updateType}:`, err);
    try {
      await ctx.reply('⚠️ Что-то пошло не так. Попробуй позже.');
    } catch (replyErr) {
      console.error('[Bot] Не удалось ответить пользователю:', errorMessage(replyErr));
    }
  });

  return bot;
}

// ═══════════════════════════════════════════════
// CRON: МОНИТОРИНГ И УВЕДОМЛЕНИЯ
// ═══════════════════════════════════════════════

export function scheduleJobs(bot: Telegraf, config: BotConfig, orchestrator: Orchestrator): ScheduledTask[] {
  // Каждые 30 минут — уведомления об истёкших подписках
  const expiryTask = cron.schedule('*/30 * * * *', async () => {
    try {
      const notices = orchestrator.collectExpiryNotices();
      if (notices.length === 0) return;

      console.log(`[Cron] Истекло подписок: ${notices.length}`);
      for (const notice of notices) {
        try {
          await bot.telegram.sendMessage(
            notice.telegramId,
            notice.reply.text,
            notice.reply.keyboard ? keyboardMarkup(notice.reply.keyboard) : {},
          );
        } catch (err) {
          // Юзер мог заблокировать бота
          console.error(`[Cron] Не удалось уведомить ${notice.telegramId}:`, errorMessage(err));
        }
      }
    } catch (err) {
      console.error('[Cron] Ошибка проверки истёкших подписок:', err);
    }
  });

  // Каждые 5 минут — здоровье прокси
  const healthTask = cron.schedule('*/5 * * * *', async () => {
    try {
      const alert = await orchestrator.checkProxyHealth();
      if (alert) await notifyAdmins(bot, config.adminIds, alert);
    } catch (err) {
      console.error('[Cron] Ошибка проверки прокси:', err);
    }
  });

  return [expiryTask, healthTask];
}

// ═══════════════════════════════════════════════
// ЗАПУСК
// ═══════════════════════════════════════════════

export function startBot(config: BotConfig): void {
  const db = openDatabase(config.databasePath);
  const clock = systemClock;

  const users = new UserStore(db);
  const payments = new PaymentStore(db);
  const ledger = new SubscriptionLedger(db, users, payments, clock, { subscriptionDays: config.subscriptionDays });
  const directory = new ServerDirectory(db, clock);
  const registry = new ProxyConfigRegistry(db, users, ledger, clock);
  const monitor = new ProxyMonitor({ host: config.metricsHost, port: config.metricsPort });

  const orchestrator = new Orchestrator({ config, clock, users, payments, ledger, registry, directory, monitor });
  const bot = createBot(config, orchestrator);
  const tasks = scheduleJobs(bot, config, orchestrator);

  bot.launch().catch((err) => {
    console.error('❌ Бот остановился с ошибкой:', err);
    process.exit(1);
  });

  console.log('🤖 Бот запущен!');
  console.log(`👑 Админы: ${config.adminIds.join(', ')}`);
  console.log(`💰 Подписка: ${config.subscriptionPrice} ${config.subscriptionCurrency} / ${config.subscriptionDays} дн.`);
  console.log(`🎁 Триал: ${config.trialDays > 0 ? `${config.trialDays} дн.` : 'выключен'}`);

  // Graceful stop
  const stop = (signal: string) => {
    for (const task of tasks) task.stop();
    bot.stop(signal);
    db.close();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}
