import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../supabase.service';
import { QueryExecutor } from './query-executor';
import { DatabaseError } from './database.error';
import { FilterCondition, FilterOperator, FilterValue, QuerySpec } from './query.types';

interface PostgrestFailure {
    message: string;
    code?: string;
    details?: string;
}

/** Renders the select list, with embedded relations as `alias:fk(*)`. */
export function renderColumns(spec: Pick<QuerySpec, 'columns' | 'embed'>): string {
    const base = spec.columns === '*' ? ['*'] : [...spec.columns];
    const embeds = spec.embed.map((relation) => `${relation.alias}:${relation.foreignKey}(*)`);
    return [...base, ...embeds].join(', ');
}

// Values are quoted so commas and parentheses inside user input stay literal.
function quoteValue(value: FilterValue): string {
    if (typeof value !== 'string') {
        return String(value);
    }
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Renders OR'ed conditions into a PostgREST logic-tree string, e.g. `a.eq.1,b.ilike."%x%"`. */
export function renderOrFilter(conditions: readonly FilterCondition[]): string {
    return conditions
        .map((condition) => `${condition.column}.${condition.operator}.${quoteValue(condition.value)}`)
        .join(',');
}

/** One `column=operator.value` query parameter, as passed to PostgREST's `filter()`. */
export interface RenderedFilter {
    column: string;
    operator: FilterOperator;
    value: FilterValue;
}

/** AND'ed filters and OR groups in the order PostgREST receives them. */
export function renderFilters(spec: Pick<QuerySpec, 'filters' | 'anyOf'>): { filters: RenderedFilter[]; anyOf: string[] } {
    return {
        filters: spec.filters.map(({ column, operator, value }) => ({ column, operator, value })),
        anyOf: spec.anyOf.map((group) => renderOrFilter(group)),
    };
}

@Injectable()
export class SupabaseQueryExecutor extends QueryExecutor {
    private readonly logger = new Logger(SupabaseQueryExecutor.name);

    constructor(private readonly supabaseService: SupabaseService) {
        super();
    }

    // Filters are chained on each concrete builder; `filter()` and `or()` return the same builder type.
    async run<R>(spec: QuerySpec): Promise<R[]> {
        const table = this.supabaseService.getClient().from(spec.table);
        const columns = renderColumns(spec);
        const { filters, anyOf } = renderFilters(spec);
        this.logger.debug(`${spec.action} ${spec.table} (${filters.length} filters, ${anyOf.length} or-groups)`);

        switch (spec.action) {
            case 'select': {
                let query = table.select(columns);
                for (const filter of filters) {
                    query = query.filter(filter.column, filter.operator, filter.value);
                }
                for (const group of anyOf) {
                    query = query.or(group);
                }
                for (const order of spec.order) {
                    query = query.order(order.column, { ascending: !order.descending });
                }
                if (spec.range) {
                    query = query.range(spec.range.from, spec.range.to);
                }
                if (spec.limit !== undefined) {
                    query = query.limit(spec.limit);
                }
                const { data, error } = await query;
                return this.unwrap<R>(spec, data, error);
            }
            case 'insert': {
                const { data, error } = await table.insert(spec.values ?? {}).select(columns);
                return this.unwrap<R>(spec, data, error);
            }
            case 'update': {
                let query = table.update(spec.values ?? {});
                for (const filter of filters) {
                    query = query.filter(filter.column, filter.operator, filter.value);
                }
                for (const group of anyOf) {
                    query = query.or(group);
                }
                const { data, error } = await query.select(columns);
                return this.unwrap<R>(spec, data, error);
            }
            case 'delete': {
                let query = table.delete();
                for (const filter of filters) {
                    query = query.filter(filter.column, filter.operator, filter.value);
                }
                for (const group of anyOf) {
                    query = query.or(group);
                }
                const { data, error } = await query.select(columns);
                return this.unwrap<R>(spec, data, error);
            }
        }
    }

    private unwrap<R>(spec: QuerySpec, data: unknown, error: PostgrestFailure | null): R[] {
        if (error) {
            this.logger.error(`Supabase ${spec.action} on ${spec.table} failed: ${error.message}`);
            throw new DatabaseError(error.message, spec.table, spec.action, error.code, error.details);
        }
        if (!Array.isArray(data)) {
            return [];
        }
        return data as R[];
    }
}
