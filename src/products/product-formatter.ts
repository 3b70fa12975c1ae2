import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProductRow } from '../common/types/storefront.types';
import { publicApiBaseUrl } from '../common/config/app-config';

export const CURRENCY_SUFFIX = '원';

const groupedInteger = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export interface ProductActionUrls {
    get: string;
    favorite: string;
    cart_add: string;
    cart_remove: string;
    cart_update: string;
}

export type FormattedProduct = Omit<ProductRow, 'price' | 'discount'> & {
    price: string;
    discount: string;
    api_urls: ProductActionUrls;
};

// Integer part only, matching how prices are shown in the storefront.
function integerPart(value: number | string): number {
    return Math.trunc(Number(value)) || 0;
}

/** `15000` -> `"15,000원"`. */
export function formatPrice(value: number | string): string {
    return `${groupedInteger.format(integerPart(value))}${CURRENCY_SUFFIX}`;
}

/** `10` -> `"10%"`. */
export function formatDiscount(value: number | string): string {
    return `${integerPart(value)}%`;
}

export function buildActionUrls(baseUrl: string, productId: number): ProductActionUrls {
    return {
        get: `${baseUrl}/api/get/${productId}`,
        favorite: `${baseUrl}/api/favorite/${productId}`,
        cart_add: `${baseUrl}/api/cart-add/${productId}`,
        cart_remove: `${baseUrl}/api/cart-remove/${productId}`,
        cart_update: `${baseUrl}/api/cart-update/${productId}`,
    };
}

export function formatProduct(product: ProductRow, baseUrl: string): FormattedProduct {
    return {
        ...product,
        price: formatPrice(product.price),
        discount: formatDiscount(product.discount),
        api_urls: buildActionUrls(baseUrl, product.id),
    };
}

/** Display formatting for product rows, bound to the configured public API host. */
@Injectable()
export class ProductFormatter {
    private readonly baseUrl: string;

    constructor(configService: ConfigService) {
        this.baseUrl = publicApiBaseUrl(configService);
    }

    format(product: ProductRow): FormattedProduct {
        return formatProduct(product, this.baseUrl);
    }

    formatAll(products: readonly ProductRow[]): FormattedProduct[] {
        return products.map((product) => this.format(product));
    }
}
