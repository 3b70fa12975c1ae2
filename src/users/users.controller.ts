import { Controller, Get, Query, ValidationPipe } from '@nestjs/common';
import { UsersService } from './users.service';
import { UserQueryDto } from './dto/user-query.dto';
import { CartLineView, presentCartLine } from '../cart/cart-line.view';
import { FormattedProduct, ProductFormatter } from '../products/product-formatter';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

export interface CartAndFavoritesView {
  user_id: number;
  cart_items: CartLineView[];
  favorites: FormattedProduct[];
  cart_count: number;
  favorites_count: number;
}

@Controller('user')
export class UsersController {
  constructor(
    private readonly usersService: UsersService,
    private readonly formatter: ProductFormatter,
  ) {}

  @Get('cart-and-favorites')
  async getCartAndFavorites(
    @Query(new ValidationPipe({ transform: true })) query: UserQueryDto,
  ): Promise<ResponseEnvelope<CartAndFavoritesView>> {
    const { userId, cartLines, favorites } = await this.usersService.getCartAndFavorites(query.user_id);
    const cartItems = cartLines.map((line) => presentCartLine(line, this.formatter));
    const favoriteProducts = this.formatter.formatAll(favorites);
    return createEnvelope({
      user_id: userId,
      cart_items: cartItems,
      favorites: favoriteProducts,
      cart_count: cartItems.length,
      favorites_count: favoriteProducts.length,
    });
  }
}
