import { TableName } from '../types/storefront.types';

export type FilterValue = string | number | boolean;

export type FilterOperator = 'eq' | 'gt' | 'ilike';

export interface FilterCondition<T = Record<string, unknown>> {
    column: keyof T & string;
    operator: FilterOperator;
    value: FilterValue;
}

export interface OrderSpec {
    column: string;
    descending: boolean;
}

export interface EmbeddedRelation {
    alias: string;
    table: TableName;
    foreignKey: string;
}

export type QueryAction = 'select' | 'insert' | 'update' | 'delete';

/**
 * Plain description of a single table request. Builders produce it, executors run it.
 * `anyOf` groups are OR'ed internally and AND'ed with everything else.
 */
export interface QuerySpec {
    table: TableName;
    action: QueryAction;
    columns: '*' | readonly string[];
    embed: EmbeddedRelation[];
    values?: object;
    filters: FilterCondition[];
    anyOf: FilterCondition[][];
    order: OrderSpec[];
    range?: { from: number; to: number };
    limit?: number;
}
