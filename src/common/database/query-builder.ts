import { QueryExecutor } from './query-executor';
import { FilterCondition, FilterValue, QuerySpec } from './query.types';
import { InsertRow, TableName, TableRow } from '../types/storefront.types';

type Column<T> = keyof T & string;

/**
 * Immutable query builder scoped to one table. Every call returns a new builder, so a
 * partially built query can be branched (e.g. an optional category filter) safely.
 * Nothing is sent until `execute()`.
 */
export class QueryBuilder<T> {
    constructor(
        private readonly executor: QueryExecutor,
        private readonly spec: QuerySpec,
    ) {}

    private with<U = T>(patch: Partial<QuerySpec>): QueryBuilder<U> {
        return new QueryBuilder<U>(this.executor, { ...this.spec, ...patch });
    }

    equals<C extends Column<T>>(column: C, value: T[C] & FilterValue): QueryBuilder<T> {
        return this.with({ filters: [...this.spec.filters, { column, operator: 'eq', value }] });
    }

    greaterThan<C extends Column<T>>(column: C, value: T[C] & FilterValue): QueryBuilder<T> {
        return this.with({ filters: [...this.spec.filters, { column, operator: 'gt', value }] });
    }

    /** Matches rows satisfying at least one of `conditions`. */
    or(conditions: ReadonlyArray<FilterCondition<T>>): QueryBuilder<T> {
        if (conditions.length === 0) {
            return this;
        }
        const group = conditions.map(({ column, operator, value }) => ({ column: String(column), operator, value }));
        return this.with({ anyOf: [...this.spec.anyOf, group] });
    }

    orderBy(column: Column<T>, descending = false): QueryBuilder<T> {
        return this.with({ order: [...this.spec.order, { column, descending }] });
    }

    /** Pages by offset and page size; translated to an inclusive row range. */
    range(offset: number, limit: number): QueryBuilder<T> {
        return this.with({ range: { from: offset, to: offset + limit - 1 } });
    }

    limit(count: number): QueryBuilder<T> {
        return this.with({ limit: count });
    }

    /**
     * Embeds the row of `table` referenced by `foreignKey` under `alias`
     * (`null` when the referenced row is gone).
     */
    embed<A extends string, K extends TableName>(
        alias: A,
        table: K,
        foreignKey: Column<T>,
    ): QueryBuilder<T & { [P in A]: TableRow<K> | null }> {
        return this.with<T & { [P in A]: TableRow<K> | null }>({
            embed: [...this.spec.embed, { alias, table, foreignKey }],
        });
    }

    describe(): QuerySpec {
        return this.spec;
    }

    execute(): Promise<T[]> {
        return this.executor.run<T>(this.spec);
    }
}

/** Entry point for one table: picks the statement kind, then hands back a builder. */
export class TableClient<K extends TableName> {
    constructor(
        private readonly executor: QueryExecutor,
        private readonly table: K,
    ) {}

    private start<T>(patch: Partial<QuerySpec>): QueryBuilder<T> {
        return new QueryBuilder<T>(this.executor, {
            table: this.table,
            action: 'select',
            columns: '*',
            embed: [],
            filters: [],
            anyOf: [],
            order: [],
            ...patch,
        });
    }

    select(): QueryBuilder<TableRow<K>> {
        return this.start<TableRow<K>>({ action: 'select' });
    }

    selectColumns<C extends keyof TableRow<K> & string>(
        columns: readonly C[],
    ): QueryBuilder<Pick<TableRow<K>, C>> {
        return this.start<Pick<TableRow<K>, C>>({ action: 'select', columns });
    }

    /** Resolves with the inserted row(s). */
    insert(values: InsertRow<K>): QueryBuilder<TableRow<K>> {
        return this.start<TableRow<K>>({ action: 'insert', values: { ...values } });
    }

    /** Resolves with the updated rows; an empty result means nothing matched. */
    update(values: Partial<TableRow<K>>): QueryBuilder<TableRow<K>> {
        return this.start<TableRow<K>>({ action: 'update', values: { ...values } });
    }

    /** Resolves with the deleted rows. */
    delete(): QueryBuilder<TableRow<K>> {
        return this.start<TableRow<K>>({ action: 'delete' });
    }
}
