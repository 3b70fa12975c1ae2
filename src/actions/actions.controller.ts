import { Controller, Get, Param, ParseIntPipe, Query, ValidationPipe } from '@nestjs/common';
import { ActionsService } from './actions.service';
import { ProductActionQueryDto } from './dto/product-action-query.dto';
import { FormattedProduct, ProductFormatter } from '../products/product-formatter';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

export interface ProductActionView {
    product: FormattedProduct;
    is_favorite: boolean;
    in_cart: boolean;
    cart_quantity: number;
    likes: number;
}

@Controller('api')
export class ActionsController {
    constructor(
        private readonly actionsService: ActionsService,
        private readonly formatter: ProductFormatter,
    ) {}

    // GET for every action, so the URLs in `api_urls` can be followed directly.
    @Get(':action/:productId')
    async handleAction(
        @Param('action') action: string,
        @Param('productId', ParseIntPipe) productId: number,
        @Query(new ValidationPipe({ transform: true })) query: ProductActionQueryDto,
    ): Promise<ResponseEnvelope<ProductActionView>> {
        const outcome = await this.actionsService.perform({
            action,
            productId,
            userId: query.user_id,
            quantity: query.quantity,
        });
        return createEnvelope(
            {
                product: this.formatter.format(outcome.product),
                is_favorite: outcome.isFavorite,
                in_cart: outcome.inCart,
                cart_quantity: outcome.cartQuantity,
                likes: outcome.likes,
            },
            outcome.message,
        );
    }
}
