import type { DbExecutor } from '../executor';

export interface Migration {
  up(db: DbExecutor): Promise<void>;
  down(db: DbExecutor): Promise<void>;
}

export interface MigrationInfo {
  name: string;
  migration: Migration;
}
