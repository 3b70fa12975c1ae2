import { CartLine } from './cart.service';
import { FormattedProduct, ProductFormatter } from '../products/product-formatter';

export interface CartLineView {
    cart_item_id: number;
    user_id: number;
    quantity: number;
    product: FormattedProduct;
}

export function presentCartLine(line: CartLine, formatter: ProductFormatter): CartLineView {
    return {
        cart_item_id: line.cartItemId,
        user_id: line.userId,
        quantity: line.quantity,
        product: formatter.format(line.product),
    };
}
