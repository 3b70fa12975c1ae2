import { Injectable, Logger } from '@nestjs/common';
import { CartLine, CartService } from '../cart/cart.service';
import { ProductsService } from '../products/products.service';
import { ProductRow } from '../common/types/storefront.types';

export interface UserCollections {
  userId: number;
  cartLines: CartLine[];
  favorites: ProductRow[];
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly cartService: CartService,
    private readonly productsService: ProductsService,
  ) {}

  /**
   * Cart and favorites in one read. Favorites are the product-level flag, so every user
   * sees the same favorite list.
   */
  async getCartAndFavorites(userId: number): Promise<UserCollections> {
    const cartLines = await this.cartService.listActive(userId);
    const favorites = await this.productsService.findFavorites();
    this.logger.log(`User ${userId}: ${cartLines.length} cart items, ${favorites.length} favorites`);
    return { userId, cartLines, favorites };
  }
}
