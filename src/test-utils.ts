import { openDatabase, type DB } from './database';
import { PaymentStore } from './payment-store';
import { ProxyConfigRegistry } from './proxy-registry';
import type { SecretGenerator } from './secrets';
import { ServerDirectory } from './server-directory';
import { SubscriptionLedger } from './subscription-ledger';
import { DAY_MS, type Clock } from './time';
import { UserStore } from './user-store';

export class FakeClock implements Clock {
  private current: number;

  constructor(start: string | Date) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  advanceDays(days: number): void {
    this.advance(days * DAY_MS);
  }
}

/** Предсказуемые секреты: secret-1, secret-2, ... */
export function sequentialSecrets(prefix = 'secret'): SecretGenerator {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export interface Core {
  db: DB;
  clock: FakeClock;
  users: UserStore;
  payments: PaymentStore;
  ledger: SubscriptionLedger;
  directory: ServerDirectory;
  registry: ProxyConfigRegistry;
}

export function createCore(options: { subscriptionDays?: number; generateSecret?: SecretGenerator } = {}): Core {
  const db = openDatabase(':memory:');
  const clock = new FakeClock('2025-01-01T00:00:00.000Z');
  const users = new UserStore(db);
  const payments = new PaymentStore(db);
  const ledger = new SubscriptionLedger(db, users, payments, clock, {
    subscriptionDays: options.subscriptionDays ?? 30,
  });
  const directory = new ServerDirectory(db, clock);
  const registry = new ProxyConfigRegistry(db, users, ledger, clock, options.generateSecret ?? sequentialSecrets());
  return { db, clock, users, payments, ledger, directory, registry };
}
