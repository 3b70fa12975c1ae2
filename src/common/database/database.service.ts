import { Injectable } from '@nestjs/common';
import { QueryExecutor } from './query-executor';
import { TableClient } from './query-builder';
import { TableName } from '../types/storefront.types';

/**
 * Data access client handed to every feature service. Each request is an independent
 * round trip; there are no transactions spanning calls.
 */
@Injectable()
export class DatabaseService {
    constructor(private readonly executor: QueryExecutor) {}

    from<K extends TableName>(table: K): TableClient<K> {
        return new TableClient(this.executor, table);
    }
}
