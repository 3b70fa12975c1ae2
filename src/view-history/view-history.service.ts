import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { DatabaseService } from '../common/database/database.service';
import { ProductRow, ViewHistoryRow } from '../common/types/storefront.types';
import { ProductsService } from '../products/products.service';

export interface RecentViews {
    products: ProductRow[];
    /** True when the user had no history and the latest catalog products were returned instead. */
    fallback: boolean;
}

@Injectable()
export class ViewHistoryService {
    private readonly logger = new Logger(ViewHistoryService.name);

    constructor(
        private readonly database: DatabaseService,
        private readonly productsService: ProductsService,
    ) {}

    private viewHistory() {
        return this.database.from('view_history');
    }

    async findRecent(userId: number, limit: number): Promise<RecentViews> {
        this.logger.log(`Recent views - user_id: ${userId}, limit: ${limit}`);
        const rows = await this.viewHistory()
            .select()
            .embed('product', 'products', 'product_id')
            .equals('user_id', userId)
            .orderBy('viewed_at', true)
            .limit(limit)
            .execute();

        const products: ProductRow[] = [];
        for (const row of rows) {
            if (row.product) {
                products.push(row.product);
            }
        }
        if (products.length > 0) {
            return { products, fallback: false };
        }

        this.logger.log(`No view history for user ${userId}; returning latest products`);
        return { products: await this.productsService.findLatest(limit), fallback: true };
    }

    /**
     * Records that a user viewed a product, refreshing `viewed_at` when the pair was seen before.
     * NOTE: check-then-write, so two simultaneous first views can produce duplicate rows.
     */
    async recordView(userId: number, productId: number): Promise<ViewHistoryRow> {
        await this.productsService.getById(productId);
        const viewedAt = new Date().toISOString();

        const [existing] = await this.viewHistory()
            .select()
            .equals('user_id', userId)
            .equals('product_id', productId)
            .execute();

        if (existing) {
            const [updated] = await this.viewHistory()
                .update({ viewed_at: viewedAt })
                .equals('id', existing.id)
                .execute();
            return updated ?? { ...existing, viewed_at: viewedAt };
        }

        const [created] = await this.viewHistory()
            .insert({ user_id: userId, product_id: productId, viewed_at: viewedAt })
            .execute();
        if (!created) {
            throw new InternalServerErrorException('View history insert returned no row');
        }
        this.logger.log(`Recorded first view of product ${productId} by user ${userId}`);
        return created;
    }
}
