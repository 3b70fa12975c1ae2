import { QueryExecutor } from '../../src/common/database/query-executor';
import { DatabaseError } from '../../src/common/database/database.error';
import { FilterCondition, QuerySpec } from '../../src/common/database/query.types';
import { StorefrontTables, TableName } from '../../src/common/types/storefront.types';

type StoredRow = Record<string, unknown>;

export type Seed = { [K in TableName]?: Array<Partial<StorefrontTables[K]>> };

const TABLES: readonly TableName[] = ['products', 'cart_items', 'view_history', 'qa', 'reviews'];

// Mirrors Postgres ordering for the value kinds the tests use.
function compareValues(a: unknown, b: unknown): number {
    if (a === b) return 0;
    if (a === null || a === undefined) return 1;
    if (b === null || b === undefined) return -1;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
    return String(a) < String(b) ? -1 : 1;
}

function likeToRegExp(pattern: string): RegExp {
    const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`^${escaped.replace(/%/g, '.*').replace(/_/g, '.')}$`, 'is');
}

function matches(row: StoredRow, condition: FilterCondition): boolean {
    const actual = row[condition.column];
    switch (condition.operator) {
        case 'eq':
            return actual === condition.value;
        case 'gt':
            return actual !== null && actual !== undefined && compareValues(actual, condition.value) > 0;
        case 'ilike':
            return typeof actual === 'string' && likeToRegExp(String(condition.value)).test(actual);
    }
}

/**
 * Evaluates query descriptions against in-process arrays. Records every query description it runs so
 * tests can assert on what was (or was not) sent to storage.
 */
export class InMemoryQueryExecutor extends QueryExecutor {
    readonly calls: QuerySpec[] = [];
    private readonly tables = new Map<TableName, StoredRow[]>();
    private readonly nextIds = new Map<TableName, number>();
    private pendingFailure: string | null = null;
    private clock = Date.parse('2025-01-01T00:00:00.000Z');

    constructor(seed: Seed = {}) {
        super();
        for (const table of TABLES) {
            this.tables.set(table, []);
            this.nextIds.set(table, 1);
        }
        for (const table of TABLES) {
            for (const row of seed[table] ?? []) {
                this.store(table, { ...row });
            }
        }
    }

    /** Makes the next query reject like a transport failure. */
    failNextWith(message: string): void {
        this.pendingFailure = message;
    }

    rows(table: TableName): StoredRow[] {
        return this.clone<StoredRow>(this.table(table));
    }

    async run<R>(spec: QuerySpec): Promise<R[]> {
        this.calls.push(spec);
        if (this.pendingFailure !== null) {
            const message = this.pendingFailure;
            this.pendingFailure = null;
            throw new DatabaseError(message, spec.table, spec.action);
        }

        switch (spec.action) {
            case 'select':
                return this.clone<R>(this.select(spec));
            case 'insert':
                return this.clone<R>([this.store(spec.table, { ...spec.values })]);
            case 'update': {
                const updated = this.table(spec.table).filter((row) => this.isMatch(row, spec));
                for (const row of updated) {
                    Object.assign(row, spec.values);
                }
                return this.clone<R>(updated);
            }
            case 'delete': {
                const rows = this.table(spec.table);
                const removed = rows.filter((row) => this.isMatch(row, spec));
                this.tables.set(spec.table, rows.filter((row) => !removed.includes(row)));
                return this.clone<R>(removed);
            }
        }
    }

    private table(name: TableName): StoredRow[] {
        return this.tables.get(name) ?? [];
    }

    private store(table: TableName, row: StoredRow): StoredRow {
        const id = typeof row.id === 'number' ? row.id : (this.nextIds.get(table) ?? 1);
        this.nextIds.set(table, Math.max(this.nextIds.get(table) ?? 1, id + 1));
        const timestamp = new Date(this.clock).toISOString();
        this.clock += 1000;
        const stored: StoredRow = { created_at: timestamp, ...row, id };
        if (table === 'cart_items' && stored.updated_at === undefined) {
            stored.updated_at = stored.created_at;
        }
        this.table(table).push(stored);
        return stored;
    }

    private isMatch(row: StoredRow, spec: QuerySpec): boolean {
        return spec.filters.every((filter) => matches(row, filter))
            && spec.anyOf.every((group) => group.some((condition) => matches(row, condition)));
    }

    private select(spec: QuerySpec): StoredRow[] {
        let rows = this.table(spec.table).filter((row) => this.isMatch(row, spec));
        if (spec.order.length > 0) {
            rows = [...rows].sort((a, b) => {
                for (const order of spec.order) {
                    const result = compareValues(a[order.column], b[order.column]);
                    if (result !== 0) return order.descending ? -result : result;
                }
                return 0;
            });
        }
        if (spec.range) {
            rows = rows.slice(spec.range.from, spec.range.to + 1);
        }
        if (spec.limit !== undefined) {
            rows = rows.slice(0, spec.limit);
        }
        return rows.map((row) => this.project(row, spec));
    }

    private project(row: StoredRow, spec: QuerySpec): StoredRow {
        const projected: StoredRow = {};
        const columns = spec.columns === '*' ? Object.keys(row) : spec.columns;
        for (const column of columns) {
            projected[column] = row[column];
        }
        for (const relation of spec.embed) {
            const target = this.table(relation.table).find((candidate) => candidate.id === row[relation.foreignKey]);
            projected[relation.alias] = target ?? null;
        }
        return projected;
    }

    // Callers get copies, as they would from a real round trip.
    private clone<T>(rows: StoredRow[]): T[] {
        return JSON.parse(JSON.stringify(rows));
    }
}
