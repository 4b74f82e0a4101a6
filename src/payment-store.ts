import type { DB } from './database';
import { parseStoredTime, toStoredTime } from './time';

export type PaymentStatus = 'pending' | 'completed';

type PaymentRow = {
  id: number;
  user_id: number;
  amount: number;
  currency: string;
  status: PaymentStatus;
  provider_payment_id: string | null;
  created_at: string;
};

export interface PaymentRecord {
  readonly id: number;
  readonly userId: number;
  readonly amount: number;
  readonly currency: string;
  readonly status: PaymentStatus;
  readonly providerPaymentId: string | null;
  readonly createdAt: Date;
}

export interface NewPayment {
  userId: number;
  amount: number;
  currency: string;
  status: PaymentStatus;
  providerPaymentId: string | null;
}

export interface PaymentStats {
  completed: number;
  todayCompleted: number;
  revenue: Array<{ currency: string; total: number }>;
}

function rowToRecord(row: PaymentRow): PaymentRecord {
  return {
    id: row.id,
    userId: row.user_id,
    amount: row.amount,
    currency: row.currency,
    status: row.status,
    providerPaymentId: row.provider_payment_id,
    createdAt: parseStoredTime(row.created_at),
  };
}

const PAYMENT_COLUMNS = 'id, user_id, amount, currency, status, provider_payment_id, created_at';

// ─── Подготовленные запросы ───

function prepareQueries(db: DB) {
  return {
    insert: db.prepare(`
      INSERT INTO payments (user_id, amount, currency, status, provider_payment_id, created_at)
      VALUES (@user_id, @amount, @currency, @status, @provider_payment_id, @created_at)
    `),
    get: db.prepare(`SELECT ${PAYMENT_COLUMNS} FROM payments WHERE id = ?`),
    listByUser: db.prepare(`SELECT ${PAYMENT_COLUMNS} FROM payments WHERE user_id = ? ORDER BY id ASC`),
    listRecent: db.prepare(`SELECT ${PAYMENT_COLUMNS} FROM payments ORDER BY id DESC LIMIT ?`),
    counts: db.prepare(`
      SELECT
        COUNT(*) AS completed,
        COUNT(CASE WHEN date(created_at) = date(?) THEN 1 END) AS today_completed
      FROM payments WHERE status = 'completed'
    `),
    revenue: db.prepare(`
      SELECT currency, SUM(amount) AS total FROM payments
      WHERE status = 'completed'
      GROUP BY currency ORDER BY currency ASC
    `),
  };
}

/** Журнал платежей: записи только добавляются */
export class PaymentStore {
  private readonly queries: ReturnType<typeof prepareQueries>;

  constructor(db: DB) {
    this.queries = prepareQueries(db);
  }

  record(payment: NewPayment, createdAt: Date): PaymentRecord {
    const result = this.queries.insert.run({
      user_id: payment.userId,
      amount: payment.amount,
      currency: payment.currency,
      status: payment.status,
      provider_payment_id: payment.providerPaymentId,
      created_at: toStoredTime(createdAt),
    });

    const recorded = this.get(Number(result.lastInsertRowid));
    if (!recorded) {
      throw new Error(`Payment ${result.lastInsertRowid} vanished after insert`);
    }
    return recorded;
  }

  get(id: number): PaymentRecord | null {
    const row = this.queries.get.get(id) as PaymentRow | undefined;
    return row ? rowToRecord(row) : null;
  }

  listByUser(userId: number): PaymentRecord[] {
    const rows = this.queries.listByUser.all(userId) as PaymentRow[];
    return rows.map(rowToRecord);
  }

  listRecent(limit: number): PaymentRecord[] {
    const rows = this.queries.listRecent.all(limit) as PaymentRow[];
    return rows.map(rowToRecord);
  }

  stats(now: Date): PaymentStats {
    const counts = this.queries.counts.get(toStoredTime(now)) as { completed: number; today_completed: number };
    const revenue = this.queries.revenue.all() as Array<{ currency: string; total: number }>;

    return {
      completed: counts.completed,
      todayCompleted: counts.today_completed,
      revenue,
    };
  }
}
