import { Body, Controller, Get, HttpStatus, Post, Query, ValidationPipe } from '@nestjs/common';
import { ViewHistoryService } from './view-history.service';
import { RecentViewsQueryDto, RecordViewDto } from './dto/view-history.dto';
import { FormattedProduct, ProductFormatter } from '../products/product-formatter';
import { ViewHistoryRow } from '../common/types/storefront.types';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

@Controller('products-recent-views')
export class ViewHistoryController {
    constructor(
        private readonly viewHistoryService: ViewHistoryService,
        private readonly formatter: ProductFormatter,
    ) {}

    @Get()
    async listRecentViews(
        @Query(new ValidationPipe({ transform: true })) query: RecentViewsQueryDto,
    ): Promise<ResponseEnvelope<FormattedProduct[]>> {
        const { products, fallback } = await this.viewHistoryService.findRecent(query.user_id, query.limit);
        const message = fallback ? 'No recently viewed products; showing latest products' : 'Success';
        return createEnvelope(this.formatter.formatAll(products), message);
    }

    @Post()
    async recordView(
        @Body(new ValidationPipe({ whitelist: true })) body: RecordViewDto,
    ): Promise<ResponseEnvelope<ViewHistoryRow>> {
        const entry = await this.viewHistoryService.recordView(body.user_id, body.product_id);
        return createEnvelope(entry, 'View recorded', HttpStatus.CREATED);
    }
}
