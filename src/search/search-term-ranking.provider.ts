export interface PopularSearchTerm {
    term: string;
    count: number;
    trend: 'up' | 'down';
}

/** Source of ranked popular search terms. Bind another implementation in SearchModule to replace it. */
export abstract class SearchTermRankingProvider {
    abstract getTopTerms(limit: number): Promise<PopularSearchTerm[]>;
}

const STATIC_RANKING: readonly PopularSearchTerm[] = [
    { term: 'sneakers', count: 156, trend: 'up' },
    { term: 'running shoes', count: 134, trend: 'up' },
    { term: 't-shirt', count: 98, trend: 'down' },
    { term: 'jeans', count: 87, trend: 'up' },
    { term: 'hoodie', count: 76, trend: 'up' },
    { term: 'backpack', count: 65, trend: 'down' },
    { term: 'watch', count: 54, trend: 'up' },
    { term: 'cap', count: 43, trend: 'up' },
    { term: 'sandals', count: 38, trend: 'down' },
    { term: 'accessories', count: 32, trend: 'up' },
];

/** Fixed ranked list; stands in until real search analytics exist. */
export class StaticSearchTermRankingProvider extends SearchTermRankingProvider {
    constructor(private readonly ranking: readonly PopularSearchTerm[] = STATIC_RANKING) {
        super();
    }

    async getTopTerms(limit: number): Promise<PopularSearchTerm[]> {
        return this.ranking.slice(0, Math.max(0, limit)).map((term) => ({ ...term }));
    }
}
