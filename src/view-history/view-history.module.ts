import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { ProductsModule } from '../products/products.module';
import { ViewHistoryController } from './view-history.controller';
import { ViewHistoryService } from './view-history.service';

@Module({
  imports: [CommonModule, ProductsModule],
  controllers: [ViewHistoryController],
  providers: [ViewHistoryService],
})
export class ViewHistoryModule {}
