/**
 * Thank-You Store
 *
 * Pass-through persistence of extracted thank-you slips into PostgreSQL.
 * Nothing in the analysis reads back from here.
 */

import { query, getClient } from '../db/client.js';
import { logger } from '../config/logger.js';
import type { ThankYou } from '../types/models.js';

export interface StoredThankYou {
  id: number;
  runId: string;
  receiverKey: string;
  receiverName: string;
  giverKey: string | null;
  giverName: string | null;
  amount: number;
  withinOrganization: boolean;
  description: string | null;
  slipDate: Date | null;
  createdAt: Date;
}

interface ThankYouRow {
  id: number;
  run_id: string;
  receiver_key: string;
  receiver_name: string;
  giver_key: string | null;
  giver_name: string | null;
  amount: string;
  within_organization: boolean;
  description: string | null;
  slip_date: Date | null;
  created_at: Date;
}

const INSERT_SQL = `
  INSERT INTO thank_you_slips (
    run_id, receiver_key, receiver_name, giver_key, giver_name,
    amount, within_organization, description, slip_date
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
`;

export class ThankYouStoreService {
  /**
   * Insert every record of one run inside a single transaction
   *
   * @returns number of rows inserted
   */
  static async saveAll(runId: string, thankYous: readonly ThankYou[]): Promise<number> {
    if (thankYous.length === 0) {
      return 0;
    }

    const client = await getClient();
    try {
      await client.query('BEGIN');
      for (const thankYou of thankYous) {
        await client.query(INSERT_SQL, [
          runId,
          thankYou.receiver.key,
          thankYou.receiver.fullName,
          thankYou.giver?.key ?? null,
          thankYou.giver?.fullName ?? null,
          thankYou.amount,
          thankYou.withinOrganization,
          thankYou.description,
          thankYou.date,
        ]);
      }
      await client.query('COMMIT');
      logger.info(`Stored ${thankYous.length} thank-you slips`, { runId });
      return thankYous.length;
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error('Error storing thank-you slips', { error, runId });
      throw error;
    } finally {
      client.release();
    }
  }

  static async listByReceiver(receiverKey: string): Promise<StoredThankYou[]> {
    const sql = `
      SELECT * FROM thank_you_slips
      WHERE receiver_key = $1
      ORDER BY created_at DESC, id DESC
    `;

    try {
      const result = await query<ThankYouRow>(sql, [receiverKey]);
      return result.rows.map(this.mapRow);
    } catch (error) {
      logger.error('Error listing thank-you slips', { error, receiverKey });
      throw error;
    }
  }

  /**
   * Delete stored slips, either for one run or all of them
   */
  static async clear(runId?: string): Promise<number> {
    const result = runId
      ? await query('DELETE FROM thank_you_slips WHERE run_id = $1', [runId])
      : await query('DELETE FROM thank_you_slips');
    return result.rowCount ?? 0;
  }

  private static mapRow(row: ThankYouRow): StoredThankYou {
    return {
      id: row.id,
      runId: row.run_id,
      receiverKey: row.receiver_key,
      receiverName: row.receiver_name,
      giverKey: row.giver_key,
      giverName: row.giver_name,
      amount: parseFloat(row.amount),
      withinOrganization: row.within_organization,
      description: row.description,
      slipDate: row.slip_date,
      createdAt: row.created_at,
    };
  }
}
