import type { QueryResultRow } from 'pg';
import type { DbExecutor } from '../../connections/db/executor';
import {
  readBoolean,
  readDate,
  readEnum,
  readNullableEnum,
  readNullableNumber,
  readNullableString,
  readNumber,
} from '../../connections/db/row';
import type { CreateOrderStatusHistoryInput, OrderStatusHistory } from '../../connections/db/models';
import { isOrderStatus, isUserRole } from '../../constants';

export interface OrderHistoryRepository {
  record(input: CreateOrderStatusHistoryInput): Promise<OrderStatusHistory>;
  findByOrderId(orderId: number): Promise<OrderStatusHistory[]>;
}

const HISTORY_COLUMNS =
  'id, order_id, from_status, to_status, actor_id, actor_role, reason, succeeded, denial_code, created_at';

export const mapOrderStatusHistory = (row: QueryResultRow): OrderStatusHistory => ({
  id: readNumber(row, 'id'),
  order_id: readNumber(row, 'order_id'),
  from_status: readNullableEnum(row, 'from_status', isOrderStatus),
  to_status: readEnum(row, 'to_status', isOrderStatus),
  actor_id: readNullableNumber(row, 'actor_id'),
  actor_role: readNullableEnum(row, 'actor_role', isUserRole),
  reason: readNullableString(row, 'reason'),
  succeeded: readBoolean(row, 'succeeded'),
  denial_code: readNullableString(row, 'denial_code'),
  created_at: readDate(row, 'created_at'),
});

export class PgOrderHistoryRepository implements OrderHistoryRepository {
  constructor(private readonly db: DbExecutor) {}

  async record(input: CreateOrderStatusHistoryInput): Promise<OrderStatusHistory> {
    const result = await this.db.query(
      `INSERT INTO order_status_history
         (order_id, from_status, to_status, actor_id, actor_role, reason, succeeded, denial_code)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${HISTORY_COLUMNS}`,
      [
        input.order_id,
        input.from_status,
        input.to_status,
        input.actor_id,
        input.actor_role,
        input.reason ?? null,
        input.succeeded,
        input.denial_code ?? null,
      ]
    );
    return mapOrderStatusHistory(result.rows[0]);
  }

  async findByOrderId(orderId: number): Promise<OrderStatusHistory[]> {
    const result = await this.db.query(
      `SELECT ${HISTORY_COLUMNS} FROM order_status_history WHERE order_id = $1 ORDER BY created_at, id`,
      [orderId]
    );
    return result.rows.map(mapOrderStatusHistory);
  }
}
