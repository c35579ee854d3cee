import type { QueryResultRow } from 'pg';
import type { DbExecutor } from '../../connections/db/executor';
import { readDate, readEnum, readNullableNumber, readNumber, readString } from '../../connections/db/row';
import type { CreateDeliveryInput, Delivery } from '../../connections/db/models';
import { ACTIVE_DELIVERY_STATUSES, DeliveryStatus, isDeliveryStatus } from '../../constants';

export interface DeliveryRepository {
  findByOrderId(orderId: number): Promise<Delivery | null>;
  create(input: CreateDeliveryInput): Promise<Delivery>;
  updateStatus(orderId: number, status: DeliveryStatus): Promise<Delivery | null>;
  hasOtherActiveDelivery(riderId: number, excludeOrderId: number): Promise<boolean>;
}

const DELIVERY_COLUMNS = 'id, order_id, rider_id, status, delivery_fee, created_at, updated_at';

export const mapDelivery = (row: QueryResultRow): Delivery => ({
  id: readNumber(row, 'id'),
  order_id: readNumber(row, 'order_id'),
  rider_id: readNullableNumber(row, 'rider_id'),
  status: readEnum(row, 'status', isDeliveryStatus),
  delivery_fee: readString(row, 'delivery_fee'),
  created_at: readDate(row, 'created_at'),
  updated_at: readDate(row, 'updated_at'),
});

export class PgDeliveryRepository implements DeliveryRepository {
  constructor(private readonly db: DbExecutor) {}

  async findByOrderId(orderId: number): Promise<Delivery | null> {
    const result = await this.db.query(`SELECT ${DELIVERY_COLUMNS} FROM deliveries WHERE order_id = $1`, [orderId]);
    return result.rows.length > 0 ? mapDelivery(result.rows[0]) : null;
  }

  // deliveries_order_id_key rejects a second delivery for the same order
  async create(input: CreateDeliveryInput): Promise<Delivery> {
    const result = await this.db.query(
      `INSERT INTO deliveries (order_id, rider_id, delivery_fee)
       VALUES ($1, $2, $3)
       RETURNING ${DELIVERY_COLUMNS}`,
      [input.order_id, input.rider_id, input.delivery_fee]
    );
    return mapDelivery(result.rows[0]);
  }

  async updateStatus(orderId: number, status: DeliveryStatus): Promise<Delivery | null> {
    const result = await this.db.query(
      `UPDATE deliveries SET status = $1, updated_at = CURRENT_TIMESTAMP
       WHERE order_id = $2
       RETURNING ${DELIVERY_COLUMNS}`,
      [status, orderId]
    );
    return result.rows.length > 0 ? mapDelivery(result.rows[0]) : null;
  }

  async hasOtherActiveDelivery(riderId: number, excludeOrderId: number): Promise<boolean> {
    const result = await this.db.query(
      `SELECT 1 FROM deliveries
       WHERE rider_id = $1 AND order_id <> $2 AND status = ANY($3::text[])
       LIMIT 1`,
      [riderId, excludeOrderId, ACTIVE_DELIVERY_STATUSES]
    );
    return result.rows.length > 0;
  }
}
