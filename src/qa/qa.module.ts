import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { ProductsModule } from '../products/products.module';
import { QaController } from './qa.controller';
import { QaService } from './qa.service';

@Module({
  imports: [CommonModule, ProductsModule],
  controllers: [QaController],
  providers: [QaService],
})
export class QaModule {}
