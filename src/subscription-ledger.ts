import type { DB } from './database';
import { ProxyBotError, type Result, type TrialError } from './errors';
import type { PaymentStore } from './payment-store';
import { addDays, type Clock } from './time';
import type { UserRecord, UserStore } from './user-store';

export interface Entitlement {
  entitled: boolean;
  expiresAt: Date | null;
}

export interface LedgerOptions {
  /** Сколько дней добавляет одна оплата */
  subscriptionDays: number;
}

type WithWindow = Pick<UserRecord, 'subscriptionUntil'>;

function assertPositiveDays(days: number): void {
  if (!Number.isInteger(days) || days <= 0) {
    throw new ProxyBotError('INVALID_DURATION', `Duration must be a positive number of days, got ${days}`);
  }
}

/**
 * Окно подписки пользователя (users.subscription_until).
 *
 * Подписка активна, пока subscription_until строго больше текущего момента.
 * Триал доступен только тем, у кого subscription_until ни разу не выставлялся.
 * Оплата и админский грант продлевают активную подписку от её конца,
 * а истёкшую — от текущего момента: прошедшее время не засчитывается.
 *
 * Все изменения идут в BEGIN IMMEDIATE транзакции — read-check-write
 * для одного пользователя не может переплестись с другим запросом.
 */
export class SubscriptionLedger {
  private readonly db: DB;
  private readonly users: UserStore;
  private readonly payments: PaymentStore;
  private readonly clock: Clock;
  private readonly options: LedgerOptions;

  constructor(db: DB, users: UserStore, payments: PaymentStore, clock: Clock, options: LedgerOptions) {
    assertPositiveDays(options.subscriptionDays);
    this.db = db;
    this.users = users;
    this.payments = payments;
    this.clock = clock;
    this.options = options;
  }

  isEntitled(user: WithWindow): boolean {
    return user.subscriptionUntil !== null && this.clock.now().getTime() < user.subscriptionUntil.getTime();
  }

  isTrialEligible(user: WithWindow): boolean {
    return user.subscriptionUntil === null;
  }

  entitlementOf(user: WithWindow): Entitlement {
    return { entitled: this.isEntitled(user), expiresAt: user.subscriptionUntil };
  }

  getEntitlement(telegramId: number): Entitlement {
    return this.entitlementOf(this.users.requireByTelegramId(telegramId));
  }

  grantTrial(telegramId: number, days: number): Result<Entitlement, TrialError> {
    assertPositiveDays(days);

    return this.db
      .transaction((): Result<Entitlement, TrialError> => {
        const user = this.users.requireByTelegramId(telegramId);

        // Любое окно (триал, грант, оплата) сжигает триал навсегда — даже активное
        if (!this.isTrialEligible(user)) return { ok: false, error: 'TRIAL_ALREADY_USED' };
        if (this.isEntitled(user)) return { ok: false, error: 'ALREADY_ENTITLED' };

        const until = addDays(this.clock.now(), days);
        this.users.setSubscriptionUntil(user.id, until);
        console.log(`[Ledger] Триал ${days} дн. для ${telegramId}`);
        return { ok: true, value: { entitled: true, expiresAt: until } };
      })
      .immediate();
  }

  /**
   * Записывает завершённый платёж и продлевает подписку на subscriptionDays.
   * Сумма уже в основных единицах валюты и не проверяется.
   */
  applyPayment(telegramId: number, amount: number, currency: string, providerRef: string): Entitlement {
    return this.db
      .transaction((): Entitlement => {
        const user = this.users.requireByTelegramId(telegramId);
        const now = this.clock.now();

        this.payments.record(
          {
            userId: user.id,
            amount,
            currency,
            status: 'completed',
            providerPaymentId: providerRef,
          },
          now,
        );

        const until = this.extend(user, this.options.subscriptionDays, now);
        console.log(`[Ledger] Оплата ${amount} ${currency} от ${telegramId}, до ${until.toISOString()}`);
        return { entitled: true, expiresAt: until };
      })
      .immediate();
  }

  adminGrant(telegramId: number, days: number): Entitlement {
    assertPositiveDays(days);

    return this.db
      .transaction((): Entitlement => {
        const user = this.users.requireByTelegramId(telegramId);
        const until = this.extend(user, days, this.clock.now());
        console.log(`[Ledger] Админ выдал ${days} дн. пользователю ${telegramId}`);
        return { entitled: true, expiresAt: until };
      })
      .immediate();
  }

  private extend(user: UserRecord, days: number, now: Date): Date {
    const current = user.subscriptionUntil;
    const base = current !== null && now.getTime() < current.getTime() ? current : now;
    const until = addDays(base, days);
    this.users.setSubscriptionUntil(user.id, until);
    return until;
  }
}
