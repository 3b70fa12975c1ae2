import { Body, Controller, Delete, Get, HttpStatus, Param, ParseIntPipe, Patch, Post, Query, ValidationPipe } from '@nestjs/common';
import { CartService } from './cart.service';
import { CartLineView, presentCartLine } from './cart-line.view';
import { CartItemsQueryDto, CreateCartItemDto, UpdateCartItemDto } from './dto/cart-item.dto';
import { ProductsService } from '../products/products.service';
import { ProductFormatter } from '../products/product-formatter';
import { CartItemRow } from '../common/types/storefront.types';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

@Controller('cart-items')
export class CartController {
    constructor(
        private readonly cartService: CartService,
        private readonly productsService: ProductsService,
        private readonly formatter: ProductFormatter,
    ) {}

    @Get()
    async listCartItems(
        @Query(new ValidationPipe({ transform: true })) query: CartItemsQueryDto,
    ): Promise<ResponseEnvelope<CartLineView[]>> {
        const lines = await this.cartService.listActive(query.user_id);
        return createEnvelope(lines.map((line) => presentCartLine(line, this.formatter)));
    }

    @Post()
    async addCartItem(
        @Body(new ValidationPipe({ whitelist: true })) body: CreateCartItemDto,
    ): Promise<ResponseEnvelope<CartItemRow>> {
        await this.productsService.getById(body.product_id);
        const { item, created } = await this.cartService.addItem(
            body.user_id,
            body.product_id,
            body.quantity,
            body.selected_options,
        );
        const message = created ? 'Added to cart' : `Cart quantity updated to ${item.quantity}`;
        return createEnvelope(item, message, HttpStatus.CREATED);
    }

    @Patch(':cartItemId')
    async updateCartItem(
        @Param('cartItemId', ParseIntPipe) cartItemId: number,
        @Body(new ValidationPipe({ whitelist: true })) body: UpdateCartItemDto,
    ): Promise<ResponseEnvelope<CartItemRow>> {
        const item = await this.cartService.updateItem(cartItemId, body);
        return createEnvelope(item, 'Cart item updated');
    }

    @Delete(':cartItemId')
    async removeCartItem(
        @Param('cartItemId', ParseIntPipe) cartItemId: number,
    ): Promise<ResponseEnvelope<null>> {
        await this.cartService.removeItemById(cartItemId);
        return createEnvelope(null, 'Removed from cart');
    }
}
