import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ProductsService, parseLikes } from '../products/products.service';
import { CartService } from '../cart/cart.service';
import { ProductRow } from '../common/types/storefront.types';

export const PRODUCT_ACTIONS = ['get', 'favorite', 'cart-add', 'cart-remove', 'cart-update'] as const;

export type ProductAction = (typeof PRODUCT_ACTIONS)[number];

export function isProductAction(value: string): value is ProductAction {
    return (PRODUCT_ACTIONS as readonly string[]).includes(value);
}

export interface ProductActionRequest {
    action: string;
    productId: number;
    userId: number;
    quantity: number;
}

/** Product state as seen by one user after an action ran. */
export interface ProductActionOutcome {
    message: string;
    product: ProductRow;
    isFavorite: boolean;
    inCart: boolean;
    cartQuantity: number;
    likes: number;
}

@Injectable()
export class ActionsService {
    private readonly logger = new Logger(ActionsService.name);

    constructor(
        private readonly productsService: ProductsService,
        private readonly cartService: CartService,
    ) {}

    /**
     * Runs one action of the unified product endpoint, then re-reads the product and the
     * user's cart row. Calls are sequential and independent; a failure part-way leaves
     * earlier writes in place.
     */
    async perform(request: ProductActionRequest): Promise<ProductActionOutcome> {
        const { action, productId, userId, quantity } = request;
        if (!isProductAction(action)) {
            throw new BadRequestException(`Unsupported action: ${action}`);
        }
        this.logger.log(`Action ${action} on product ${productId} for user ${userId}`);

        const message = await this.apply(action, productId, userId, quantity);

        const product = await this.productsService.getById(productId);
        const cartItem = await this.cartService.findActiveItem(userId, productId);

        this.logger.log(`Action ${action} on product ${productId} completed`);
        return {
            message,
            product,
            isFavorite: product.is_favorite,
            inCart: cartItem !== null,
            cartQuantity: cartItem?.quantity ?? 0,
            likes: parseLikes(product.likes),
        };
    }

    private async apply(action: ProductAction, productId: number, userId: number, quantity: number): Promise<string> {
        switch (action) {
            case 'favorite': {
                const { isFavorite } = await this.productsService.toggleFavorite(productId);
                return isFavorite ? 'Added to favorites' : 'Removed from favorites';
            }
            case 'cart-add': {
                if (quantity < 1) {
                    throw new BadRequestException('quantity must be at least 1 to add to cart');
                }
                await this.productsService.getById(productId);
                const { item, created } = await this.cartService.addItem(userId, productId, quantity);
                return created ? 'Added to cart' : `Cart quantity updated to ${item.quantity}`;
            }
            case 'cart-remove':
                await this.cartService.removeItem(userId, productId);
                return 'Removed from cart';
            case 'cart-update': {
                const item = await this.cartService.setQuantity(userId, productId, quantity);
                return item ? `Quantity changed to ${quantity}` : 'Product is not in the cart; nothing to update';
            }
            case 'get':
                return 'Product retrieved';
        }
    }
}
