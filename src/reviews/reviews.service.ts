import { Injectable, InternalServerErrorException, Logger, NotFoundException } from '@nestjs/common';
import { DatabaseService } from '../common/database/database.service';
import { ReviewRow } from '../common/types/storefront.types';
import { ProductsService } from '../products/products.service';
import { CreateReviewDto, UpdateReviewDto } from './dto/review.dto';

@Injectable()
export class ReviewsService {
    private readonly logger = new Logger(ReviewsService.name);

    constructor(
        private readonly database: DatabaseService,
        private readonly productsService: ProductsService,
    ) {}

    private reviews() {
        return this.database.from('reviews');
    }

    async listForProduct(productId: number): Promise<ReviewRow[]> {
        await this.productsService.getById(productId);
        const rows = await this.reviews().select().equals('product_id', productId).orderBy('created_at', true).execute();
        this.logger.log(`Found ${rows.length} reviews for product ${productId}`);
        return rows;
    }

    async create(productId: number, review: CreateReviewDto): Promise<ReviewRow> {
        await this.productsService.getById(productId);
        const [created] = await this.reviews()
            .insert({ product_id: productId, user_name: review.user_name, rating: review.rating, content: review.content })
            .execute();
        if (!created) {
            throw new InternalServerErrorException('Review insert returned no row');
        }
        this.logger.log(`Review ${created.id} added to product ${productId}`);
        return created;
    }

    async update(reviewId: number, updates: UpdateReviewDto): Promise<ReviewRow> {
        const [updated] = await this.reviews().update({ ...updates }).equals('id', reviewId).execute();
        if (!updated) {
            throw new NotFoundException('Review not found');
        }
        return updated;
    }
}
