import type { QueryResultRow } from 'pg';
import type { DbExecutor } from '../../connections/db/executor';
import { readDate, readNullableString, readNumber, readString } from '../../connections/db/row';
import type { Item } from '../../connections/db/models';

export interface ItemRepository {
  findByIds(ids: readonly number[]): Promise<Item[]>;
  findByWarehouse(warehouseId: number): Promise<Item[]>;
  /**
   * Exclusive row locks held until the surrounding transaction ends.
   * Rows are locked in ascending id order.
   */
  lockByIds(ids: readonly number[]): Promise<Item[]>;
  setQuantity(id: number, quantity: number): Promise<Item | null>;
}

const ITEM_COLUMNS = 'id, warehouse_id, name, description, sku, price, quantity, created_at, updated_at';

export const mapItem = (row: QueryResultRow): Item => ({
  id: readNumber(row, 'id'),
  warehouse_id: readNumber(row, 'warehouse_id'),
  name: readString(row, 'name'),
  description: readNullableString(row, 'description'),
  sku: readString(row, 'sku'),
  price: readString(row, 'price'),
  quantity: readNumber(row, 'quantity'),
  created_at: readDate(row, 'created_at'),
  updated_at: readDate(row, 'updated_at'),
});

export class PgItemRepository implements ItemRepository {
  constructor(private readonly db: DbExecutor) {}

  async findByIds(ids: readonly number[]): Promise<Item[]> {
    if (ids.length === 0) {
      return [];
    }

    const result = await this.db.query(
      `SELECT ${ITEM_COLUMNS} FROM items WHERE id = ANY($1::int[]) ORDER BY id`,
      [[...ids]]
    );
    return result.rows.map(mapItem);
  }

  async findByWarehouse(warehouseId: number): Promise<Item[]> {
    const result = await this.db.query(
      `SELECT ${ITEM_COLUMNS} FROM items WHERE warehouse_id = $1 ORDER BY name, id`,
      [warehouseId]
    );
    return result.rows.map(mapItem);
  }

  async lockByIds(ids: readonly number[]): Promise<Item[]> {
    if (ids.length === 0) {
      return [];
    }

    const result = await this.db.query(
      `SELECT ${ITEM_COLUMNS} FROM items WHERE id = ANY($1::int[]) ORDER BY id FOR UPDATE`,
      [[...ids]]
    );
    return result.rows.map(mapItem);
  }

  async setQuantity(id: number, quantity: number): Promise<Item | null> {
    const result = await this.db.query(
      `UPDATE items SET quantity = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2 RETURNING ${ITEM_COLUMNS}`,
      [quantity, id]
    );
    return result.rows.length > 0 ? mapItem(result.rows[0]) : null;
  }
}
