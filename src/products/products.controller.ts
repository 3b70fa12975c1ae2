import { Body, Controller, Get, HttpStatus, Logger, Param, ParseIntPipe, Patch, Post, Query, ValidationPipe } from '@nestjs/common';
import { ProductsService } from './products.service';
import { FormattedProduct, ProductFormatter } from './product-formatter';
import { ListProductsQueryDto } from './dto/list-products-query.dto';
import { CreateProductDto, UpdateProductDto } from './dto/product.dto';
import { createEnvelope, ResponseEnvelope } from '../common/response/envelope';

@Controller()
export class ProductsController {
    private readonly logger = new Logger(ProductsController.name);

    constructor(
        private readonly productsService: ProductsService,
        private readonly formatter: ProductFormatter,
    ) {}

    @Get('products')
    async listProducts(
        @Query(new ValidationPipe({ transform: true })) query: ListProductsQueryDto,
    ): Promise<ResponseEnvelope<FormattedProduct[]>> {
        const products = await this.productsService.findPage(query.offset, query.limit, query.category);
        return createEnvelope(this.formatter.formatAll(products));
    }

    @Get('products/all')
    async listAllProducts(): Promise<ResponseEnvelope<FormattedProduct[]>> {
        const products = await this.productsService.findAll();
        return createEnvelope(this.formatter.formatAll(products));
    }

    @Get('products/:productId')
    async getProduct(
        @Param('productId', ParseIntPipe) productId: number,
    ): Promise<ResponseEnvelope<FormattedProduct>> {
        const product = await this.productsService.getById(productId);
        this.logger.log(`Product detail - ${product.brand_name} - ${product.product_name}`);
        return createEnvelope(this.formatter.format(product));
    }

    @Post('products')
    async createProduct(
        @Body(new ValidationPipe({ whitelist: true })) body: CreateProductDto,
    ): Promise<ResponseEnvelope<FormattedProduct>> {
        const product = await this.productsService.create(body);
        return createEnvelope(this.formatter.format(product), 'Product created', HttpStatus.CREATED);
    }

    @Patch('products/:productId')
    async updateProduct(
        @Param('productId', ParseIntPipe) productId: number,
        @Body(new ValidationPipe({ whitelist: true })) body: UpdateProductDto,
    ): Promise<ResponseEnvelope<FormattedProduct>> {
        const product = await this.productsService.update(productId, body);
        return createEnvelope(this.formatter.format(product), 'Product updated');
    }

    @Get('products-favorites')
    async listFavorites(): Promise<ResponseEnvelope<FormattedProduct[]>> {
        const products = await this.productsService.findFavorites();
        return createEnvelope(this.formatter.formatAll(products));
    }

    @Get('products-ranking')
    async listRanking(): Promise<ResponseEnvelope<FormattedProduct[]>> {
        const products = await this.productsService.findRanking();
        return createEnvelope(this.formatter.formatAll(products));
    }
}
