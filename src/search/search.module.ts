import { Module } from '@nestjs/common';
import { ProductsModule } from '../products/products.module';
import { SearchController } from './search.controller';
import { SearchTermRankingProvider, StaticSearchTermRankingProvider } from './search-term-ranking.provider';

@Module({
  imports: [ProductsModule],
  controllers: [SearchController],
  providers: [
    { provide: SearchTermRankingProvider, useFactory: () => new StaticSearchTermRankingProvider() },
  ],
})
export class SearchModule {}
