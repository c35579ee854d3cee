import type { QueryResultRow } from 'pg';
import type { DbExecutor } from '../../connections/db/executor';
import {
  readDate,
  readEnum,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString,
} from '../../connections/db/row';
import type {
  CreateOrderInput,
  CreateOrderItemInput,
  Order,
  OrderItem,
  UpdateOrderStatusInput,
} from '../../connections/db/models';
import { IN_FLIGHT_ORDER_STATUSES, isOrderStatus, ORDER_STATUS, OrderStatus } from '../../constants';

/**
 * Visibility boundary for order reads
 */
export type OrderScope =
  | { kind: 'all' }
  | { kind: 'shopkeeper'; shopkeeperId: number }
  | { kind: 'warehouse_admin'; adminId: number }
  | { kind: 'rider'; riderId: number };

export interface OrderListFilter {
  scope: OrderScope;
  statuses?: readonly OrderStatus[];
  limit: number;
  offset: number;
}

export interface OrderPage {
  orders: Order[];
  total: number;
}

export interface OrderRepository {
  /**
   * Serialize creation for one (shopkeeper, warehouse) pair until the
   * transaction ends
   */
  lockInFlightSlot(shopkeeperId: number, warehouseId: number): Promise<void>;
  findInFlight(shopkeeperId: number, warehouseId: number): Promise<Order | null>;
  create(input: CreateOrderInput): Promise<Order>;
  addItems(orderId: number, lines: readonly CreateOrderItemInput[]): Promise<OrderItem[]>;
  findById(id: number): Promise<Order | null>;
  lockById(id: number): Promise<Order | null>;
  findItems(orderId: number): Promise<OrderItem[]>;
  findItemsByOrderIds(orderIds: readonly number[]): Promise<OrderItem[]>;
  updateStatus(id: number, input: UpdateOrderStatusInput): Promise<Order | null>;
  list(filter: OrderListFilter): Promise<OrderPage>;
}

const ORDER_COLUMNS =
  'id, shopkeeper_id, warehouse_id, status, total_amount, rejection_reason, cancellation_reason, cancelled_by, notes, created_at, updated_at';

const ORDER_ITEM_COLUMNS = 'id, order_id, item_id, quantity, price, created_at';

export const mapOrder = (row: QueryResultRow): Order => ({
  id: readNumber(row, 'id'),
  shopkeeper_id: readNumber(row, 'shopkeeper_id'),
  warehouse_id: readNumber(row, 'warehouse_id'),
  status: readEnum(row, 'status', isOrderStatus),
  total_amount: readString(row, 'total_amount'),
  rejection_reason: readNullableString(row, 'rejection_reason'),
  cancellation_reason: readNullableString(row, 'cancellation_reason'),
  cancelled_by: readNullableNumber(row, 'cancelled_by'),
  notes: readNullableString(row, 'notes'),
  created_at: readDate(row, 'created_at'),
  updated_at: readDate(row, 'updated_at'),
});

export const mapOrderItem = (row: QueryResultRow): OrderItem => ({
  id: readNumber(row, 'id'),
  order_id: readNumber(row, 'order_id'),
  item_id: readNumber(row, 'item_id'),
  quantity: readNumber(row, 'quantity'),
  price: readString(row, 'price'),
  created_at: readDate(row, 'created_at'),
});

const buildScopeCondition = (scope: OrderScope, params: unknown[]): string | null => {
  switch (scope.kind) {
    case 'all':
      return null;
    case 'shopkeeper':
      params.push(scope.shopkeeperId);
      return `o.shopkeeper_id = $${params.length}`;
    case 'warehouse_admin':
      params.push(scope.adminId);
      return `o.warehouse_id IN (SELECT w.id FROM warehouses w WHERE w.admin_id = $${params.length})`;
    case 'rider':
      params.push(scope.riderId);
      return `EXISTS (SELECT 1 FROM deliveries d WHERE d.order_id = o.id AND d.rider_id = $${params.length})`;
  }
};

export class PgOrderRepository implements OrderRepository {
  constructor(private readonly db: DbExecutor) {}

  async lockInFlightSlot(shopkeeperId: number, warehouseId: number): Promise<void> {
    await this.db.query('SELECT pg_advisory_xact_lock($1::int, $2::int)', [shopkeeperId, warehouseId]);
  }

  async findInFlight(shopkeeperId: number, warehouseId: number): Promise<Order | null> {
    const result = await this.db.query(
      `SELECT ${ORDER_COLUMNS} FROM orders
       WHERE shopkeeper_id = $1 AND warehouse_id = $2 AND status = ANY($3::text[])
       ORDER BY id
       LIMIT 1`,
      [shopkeeperId, warehouseId, [...IN_FLIGHT_ORDER_STATUSES]]
    );
    return result.rows.length > 0 ? mapOrder(result.rows[0]) : null;
  }

  async create(input: CreateOrderInput): Promise<Order> {
    const result = await this.db.query(
      `INSERT INTO orders (shopkeeper_id, warehouse_id, status, total_amount, notes)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${ORDER_COLUMNS}`,
      [input.shopkeeper_id, input.warehouse_id, ORDER_STATUS.PENDING, input.total_amount, input.notes ?? null]
    );
    return mapOrder(result.rows[0]);
  }

  async addItems(orderId: number, lines: readonly CreateOrderItemInput[]): Promise<OrderItem[]> {
    const items: OrderItem[] = [];

    for (const line of lines) {
      const result = await this.db.query(
        `INSERT INTO order_items (order_id, item_id, quantity, price)
         VALUES ($1, $2, $3, $4)
         RETURNING ${ORDER_ITEM_COLUMNS}`,
        [orderId, line.item_id, line.quantity, line.price]
      );
      items.push(mapOrderItem(result.rows[0]));
    }

    return items;
  }

  async findById(id: number): Promise<Order | null> {
    const result = await this.db.query(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`, [id]);
    return result.rows.length > 0 ? mapOrder(result.rows[0]) : null;
  }

  async lockById(id: number): Promise<Order | null> {
    const result = await this.db.query(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1 FOR UPDATE`, [id]);
    return result.rows.length > 0 ? mapOrder(result.rows[0]) : null;
  }

  async findItems(orderId: number): Promise<OrderItem[]> {
    const result = await this.db.query(
      `SELECT ${ORDER_ITEM_COLUMNS} FROM order_items WHERE order_id = $1 ORDER BY item_id`,
      [orderId]
    );
    return result.rows.map(mapOrderItem);
  }

  async findItemsByOrderIds(orderIds: readonly number[]): Promise<OrderItem[]> {
    if (orderIds.length === 0) {
      return [];
    }

    const result = await this.db.query(
      `SELECT ${ORDER_ITEM_COLUMNS} FROM order_items WHERE order_id = ANY($1::int[]) ORDER BY order_id, item_id`,
      [[...orderIds]]
    );
    return result.rows.map(mapOrderItem);
  }

  async updateStatus(id: number, input: UpdateOrderStatusInput): Promise<Order | null> {
    const result = await this.db.query(
      `UPDATE orders
       SET status = $1,
           rejection_reason = COALESCE($2, rejection_reason),
           cancellation_reason = COALESCE($3, cancellation_reason),
           cancelled_by = COALESCE($4, cancelled_by),
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $5
       RETURNING ${ORDER_COLUMNS}`,
      [
        input.status,
        input.rejection_reason ?? null,
        input.cancellation_reason ?? null,
        input.cancelled_by ?? null,
        id,
      ]
    );
    return result.rows.length > 0 ? mapOrder(result.rows[0]) : null;
  }

  async list(filter: OrderListFilter): Promise<OrderPage> {
    const params: unknown[] = [];
    const conditions: string[] = [];

    const scopeCondition = buildScopeCondition(filter.scope, params);
    if (scopeCondition) {
      conditions.push(scopeCondition);
    }

    if (filter.statuses && filter.statuses.length > 0) {
      params.push([...filter.statuses]);
      conditions.push(`o.status = ANY($${params.length}::text[])`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const countResult = await this.db.query(`SELECT COUNT(*)::int AS total FROM orders o ${whereClause}`, params);
    const total = countResult.rows.length > 0 ? readNumber(countResult.rows[0], 'total') : 0;

    const pageParams = [...params, filter.limit, filter.offset];
    const result = await this.db.query(
      `SELECT ${ORDER_COLUMNS} FROM orders o ${whereClause}
       ORDER BY o.created_at DESC, o.id DESC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      pageParams
    );

    return { orders: result.rows.map(mapOrder), total };
  }
}
