import { Injectable, InternalServerErrorException, Logger, NotFoundException } from '@nestjs/common';
import { DatabaseService } from '../common/database/database.service';
import { ProductRow } from '../common/types/storefront.types';
import { CreateProductDto, UpdateProductDto } from './dto/product.dto';

/** Category values that mean "no category filter". */
export const ALL_CATEGORIES = ['전체', 'all'];

export const RANKING_SIZE = 20;

export interface FavoriteToggleResult {
    productId: number;
    isFavorite: boolean;
    likes: number;
}

/** Likes are stored as a string-encoded integer; anything unparsable counts as zero. */
export function parseLikes(value: string | number | null | undefined): number {
    const parsed = parseInt(String(value ?? '0'), 10);
    return isNaN(parsed) ? 0 : parsed;
}

/** Like count after a favorite toggle, never below zero. */
export function nextLikeCount(currentLikes: number, wasFavorite: boolean): number {
    return Math.max(0, currentLikes + (wasFavorite ? -1 : 1));
}

@Injectable()
export class ProductsService {
    private readonly logger = new Logger(ProductsService.name);

    constructor(private readonly database: DatabaseService) {}

    private products() {
        return this.database.from('products');
    }

    async findPage(offset: number, limit: number, category?: string): Promise<ProductRow[]> {
        this.logger.log(`Listing products - offset: ${offset}, limit: ${limit}, category: ${category ?? 'none'}`);
        let query = this.products().select();
        if (category && !ALL_CATEGORIES.includes(category)) {
            query = query.equals('category', category);
        }
        const rows = await query.orderBy('created_at', true).range(offset, limit).execute();
        this.logger.log(`Listed ${rows.length} products`);
        return rows;
    }

    async findAll(): Promise<ProductRow[]> {
        const rows = await this.products().select().orderBy('created_at', true).execute();
        this.logger.log(`Listed all ${rows.length} products`);
        return rows;
    }

    async findById(productId: number): Promise<ProductRow | null> {
        this.logger.debug(`Fetching product by ID: ${productId}`);
        const rows = await this.products().select().equals('id', productId).execute();
        return rows[0] ?? null;
    }

    async getById(productId: number): Promise<ProductRow> {
        const product = await this.findById(productId);
        if (!product) {
            this.logger.warn(`Product not found - product_id: ${productId}`);
            throw new NotFoundException('Product not found');
        }
        return product;
    }

    async create(product: CreateProductDto): Promise<ProductRow> {
        const [created] = await this.products().insert({ ...product }).execute();
        if (!created) {
            throw new InternalServerErrorException('Product insert returned no row');
        }
        this.logger.log(`Product created with ID: ${created.id}`);
        return created;
    }

    async update(productId: number, updates: UpdateProductDto): Promise<ProductRow> {
        const [updated] = await this.products().update({ ...updates }).equals('id', productId).execute();
        if (!updated) {
            this.logger.warn(`Cannot update, product not found - product_id: ${productId}`);
            throw new NotFoundException('Product not found');
        }
        this.logger.log(`Product ${productId} updated`);
        return updated;
    }

    async findFavorites(): Promise<ProductRow[]> {
        const rows = await this.products().select().equals('is_favorite', true).orderBy('created_at', true).execute();
        this.logger.log(`Found ${rows.length} favorite products`);
        return rows;
    }

    async findLatest(limit: number): Promise<ProductRow[]> {
        return this.products().select().orderBy('created_at', true).limit(limit).execute();
    }

    /** Top products by like count. */
    async findRanking(limit = RANKING_SIZE): Promise<ProductRow[]> {
        const rows = await this.products().select().orderBy('likes', true).limit(limit).execute();
        this.logger.log(`Ranking returned ${rows.length} products`);
        return rows;
    }

    /**
     * Case-insensitive substring match on product or brand name. The caller trims the
     * term; an empty term is rejected here so no unfiltered scan can slip through.
     */
    async search(term: string): Promise<ProductRow[]> {
        if (!term) {
            return [];
        }
        const pattern = `%${term}%`;
        const rows = await this.products()
            .select()
            .or([
                { column: 'product_name', operator: 'ilike', value: pattern },
                { column: 'brand_name', operator: 'ilike', value: pattern },
            ])
            .orderBy('created_at', true)
            .execute();
        this.logger.log(`Search '${term}' matched ${rows.length} products`);
        return rows;
    }

    /**
     * Flips `is_favorite` and moves the like counter with it.
     * NOTE: read-then-write; concurrent toggles on one product can lose an update.
     */
    async toggleFavorite(productId: number): Promise<FavoriteToggleResult> {
        const [current] = await this.products()
            .selectColumns(['id', 'is_favorite', 'likes'])
            .equals('id', productId)
            .execute();
        if (!current) {
            this.logger.warn(`Cannot toggle favorite, product not found - product_id: ${productId}`);
            throw new NotFoundException('Product not found');
        }

        const isFavorite = !current.is_favorite;
        const likes = nextLikeCount(parseLikes(current.likes), current.is_favorite);

        await this.products()
            .update({ is_favorite: isFavorite, likes: String(likes) })
            .equals('id', productId)
            .execute();

        this.logger.log(`Product ${productId} favorite -> ${isFavorite} (likes: ${likes})`);
        return { productId, isFavorite, likes };
    }
}
