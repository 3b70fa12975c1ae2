import { Module } from '@nestjs/common';
import { ProductsModule } from '../products/products.module';
import { CartModule } from '../cart/cart.module';
import { ActionsController } from './actions.controller';
import { ActionsService } from './actions.service';

@Module({
  imports: [ProductsModule, CartModule],
  controllers: [ActionsController],
  providers: [ActionsService],
})
export class ActionsModule {}
