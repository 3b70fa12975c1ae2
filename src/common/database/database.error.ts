import { QueryAction } from './query.types';

export class DatabaseError extends Error {
    constructor(
        message: string,
        readonly table: string,
        readonly action: QueryAction,
        readonly code?: string,
        readonly details?: string,
    ) {
        super(message);
        this.name = 'DatabaseError';
    }
}
