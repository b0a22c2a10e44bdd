import { Queryable } from '../connection';

export interface Migration {
  up(db: Queryable): Promise<void>;
  down(db: Queryable): Promise<void>;
}
