import { Body, Controller, Get, HttpStatus, Param, ParseIntPipe, Patch, Post, ValidationPipe } from '@nestjs/common';
import { ReviewsService } from './reviews.service';
import { CreateReviewDto, UpdateReviewDto } from './dto/review.dto';
import { ReviewRow } from '../common/types/storefront.types';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

@Controller()
export class ReviewsController {
    constructor(private readonly reviewsService: ReviewsService) {}

    @Get('products/:productId/reviews')
    async listReviews(@Param('productId', ParseIntPipe) productId: number): Promise<ResponseEnvelope<ReviewRow[]>> {
        return createEnvelope(await this.reviewsService.listForProduct(productId));
    }

    @Post('products/:productId/reviews')
    async createReview(
        @Param('productId', ParseIntPipe) productId: number,
        @Body(new ValidationPipe({ whitelist: true })) body: CreateReviewDto,
    ): Promise<ResponseEnvelope<ReviewRow>> {
        const review = await this.reviewsService.create(productId, body);
        return createEnvelope(review, 'Review created', HttpStatus.CREATED);
    }

    @Patch('reviews/:reviewId')
    async updateReview(
        @Param('reviewId', ParseIntPipe) reviewId: number,
        @Body(new ValidationPipe({ whitelist: true })) body: UpdateReviewDto,
    ): Promise<ResponseEnvelope<ReviewRow>> {
        return createEnvelope(await this.reviewsService.update(reviewId, body), 'Review updated');
    }
}
