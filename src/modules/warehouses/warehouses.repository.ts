import type { QueryResultRow } from 'pg';
import type { DbExecutor } from '../../connections/db/executor';
import { readBoolean, readDate, readNullableString, readNumber, readString } from '../../connections/db/row';
import type { Warehouse } from '../../connections/db/models';

export interface WarehouseRepository {
  findById(id: number): Promise<Warehouse | null>;
}

const WAREHOUSE_COLUMNS =
  'id, admin_id, name, address, latitude, longitude, is_active, is_approved, created_at, updated_at';

export const mapWarehouse = (row: QueryResultRow): Warehouse => ({
  id: readNumber(row, 'id'),
  admin_id: readNumber(row, 'admin_id'),
  name: readString(row, 'name'),
  address: readString(row, 'address'),
  latitude: readNullableString(row, 'latitude'),
  longitude: readNullableString(row, 'longitude'),
  is_active: readBoolean(row, 'is_active'),
  is_approved: readBoolean(row, 'is_approved'),
  created_at: readDate(row, 'created_at'),
  updated_at: readDate(row, 'updated_at'),
});

export class PgWarehouseRepository implements WarehouseRepository {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: number): Promise<Warehouse | null> {
    const result = await this.db.query(`SELECT ${WAREHOUSE_COLUMNS} FROM warehouses WHERE id = $1`, [id]);
    return result.rows.length > 0 ? mapWarehouse(result.rows[0]) : null;
  }
}
