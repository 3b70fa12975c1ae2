import { Controller, Get, Logger, Query, ValidationPipe } from '@nestjs/common';
import { PopularSearchTerm, SearchTermRankingProvider } from './search-term-ranking.provider';
import { PopularSearchTermsQueryDto, ProductSearchQueryDto } from './dto/search.dto';
import { ProductsService } from '../products/products.service';
import { FormattedProduct, ProductFormatter } from '../products/product-formatter';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

@Controller()
export class SearchController {
    private readonly logger = new Logger(SearchController.name);

    constructor(
        private readonly rankingProvider: SearchTermRankingProvider,
        private readonly productsService: ProductsService,
        private readonly formatter: ProductFormatter,
    ) {}

    @Get('popular-search-terms')
    async getPopularSearchTerms(
        @Query(new ValidationPipe({ transform: true })) query: PopularSearchTermsQueryDto,
    ): Promise<ResponseEnvelope<PopularSearchTerm[]>> {
        const terms = await this.rankingProvider.getTopTerms(query.limit);
        return createEnvelope(terms);
    }

    @Get('products-search')
    async searchProducts(
        @Query(new ValidationPipe({ transform: true })) query: ProductSearchQueryDto,
    ): Promise<ResponseEnvelope<FormattedProduct[]>> {
        const term = query.q.trim();
        if (!term) {
            this.logger.log('Empty search query; returning no results');
            return createEnvelope([], 'Search query is empty');
        }
        const products = await this.productsService.search(term);
        return createEnvelope(this.formatter.formatAll(products));
    }
}
