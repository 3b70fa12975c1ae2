import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from '../common/common.module';
import { ProductsController } from './products.controller';
import { ProductsService } from './products.service';
import { ProductFormatter } from './product-formatter';

@Module({
  imports: [ConfigModule, CommonModule],
  controllers: [ProductsController],
  providers: [ProductsService, ProductFormatter],
  exports: [ProductsService, ProductFormatter],
})
export class ProductsModule {}
