import { QuerySpec } from './query.types';

/**
 * Runs a query description against a backing store and resolves with the affected rows.
 * Bound to the Supabase implementation in production; tests bind an in-memory one.
 */
export abstract class QueryExecutor {
    abstract run<R>(spec: QuerySpec): Promise<R[]>;
}
