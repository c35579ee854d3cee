import type { QueryResultRow } from 'pg';
import type { DbExecutor } from '../../connections/db/executor';
import { readBoolean, readDate, readEnum, readNumber } from '../../connections/db/row';
import type { Rider } from '../../connections/db/models';
import { isRiderStatus, RiderStatus } from '../../constants';

export interface RiderRepository {
  findByUserId(userId: number): Promise<Rider | null>;
  lockByUserId(userId: number): Promise<Rider | null>;
  setStatus(userId: number, status: RiderStatus): Promise<void>;
}

const RIDER_COLUMNS = 'id, user_id, warehouse_id, status, is_suspended, created_at, updated_at';

export const mapRider = (row: QueryResultRow): Rider => ({
  id: readNumber(row, 'id'),
  user_id: readNumber(row, 'user_id'),
  warehouse_id: readNumber(row, 'warehouse_id'),
  status: readEnum(row, 'status', isRiderStatus),
  is_suspended: readBoolean(row, 'is_suspended'),
  created_at: readDate(row, 'created_at'),
  updated_at: readDate(row, 'updated_at'),
});

export class PgRiderRepository implements RiderRepository {
  constructor(private readonly db: DbExecutor) {}

  async findByUserId(userId: number): Promise<Rider | null> {
    const result = await this.db.query(`SELECT ${RIDER_COLUMNS} FROM riders WHERE user_id = $1`, [userId]);
    return result.rows.length > 0 ? mapRider(result.rows[0]) : null;
  }

  async lockByUserId(userId: number): Promise<Rider | null> {
    const result = await this.db.query(`SELECT ${RIDER_COLUMNS} FROM riders WHERE user_id = $1 FOR UPDATE`, [userId]);
    return result.rows.length > 0 ? mapRider(result.rows[0]) : null;
  }

  async setStatus(userId: number, status: RiderStatus): Promise<void> {
    await this.db.query('UPDATE riders SET status = $1, updated_at = CURRENT_TIMESTAMP WHERE user_id = $2', [
      status,
      userId,
    ]);
  }
}
