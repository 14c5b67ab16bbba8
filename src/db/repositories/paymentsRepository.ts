// src/db/repositories/paymentsRepository.ts
import { Knex } from 'knex';
import { TABLES } from '../schema';
import {
  Clock,
  DAY_MS,
  fromDbTimestamp,
  systemClock,
  toDbTimestamp
} from '../../utils/dateUtils';

interface PaymentRow {
  id: number | string;
  user_id: number | string;
  charge_id: string;
  amount: number | string;
  package_id: string;
  status: string;
  created_at: Date | string | number;
  completed_at: Date | string | number | null;
}

export interface RecordPaymentInput {
  userId: number;
  chargeId: string;
  amount: number;
  packageId: string;
}

/**
 * Premium is active while a completed payment falls inside the
 * validity window.
 */
export function premiumCutoff(now: Date, validityDays: number): Date {
  return new Date(now.getTime() - validityDays * DAY_MS);
}

export class PaymentsRepository {
  constructor(
    private readonly db: Knex,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Store a completed payment. Returns false when the charge id was
   * already recorded (redelivered update).
   */
  async recordPayment(input: RecordPaymentInput): Promise<boolean> {
    const now = toDbTimestamp(this.clock());

    const inserted = await this.db<PaymentRow>(TABLES.payments)
      .insert({
        user_id: input.userId,
        charge_id: input.chargeId,
        amount: input.amount,
        package_id: input.packageId,
        status: 'completed',
        created_at: now,
        completed_at: now
      })
      .onConflict('charge_id')
      .ignore()
      .returning('id');

    return inserted.length > 0;
  }

  async countByChargeId(chargeId: string): Promise<number> {
    const rows: Array<{ count: number | string }> = await this.db(TABLES.payments)
      .where('charge_id', chargeId)
      .count({ count: '*' });
    return Number(rows[0]?.count ?? 0);
  }

  /** Completion time of the latest completed payment after `cutoff`. */
  async lastCompletedSince(userId: number, cutoff: Date): Promise<Date | null> {
    const row = await this.db<PaymentRow>(TABLES.payments)
      .where('user_id', userId)
      .andWhere('status', 'completed')
      .andWhere('completed_at', '>', toDbTimestamp(cutoff))
      .orderBy('completed_at', 'desc')
      .first();

    return row?.completed_at ? fromDbTimestamp(row.completed_at) : null;
  }

  async hasActivePremium(userId: number, cutoff: Date): Promise<boolean> {
    return (await this.lastCompletedSince(userId, cutoff)) !== null;
  }
}
