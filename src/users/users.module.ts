import { Module } from '@nestjs/common';
import { CartModule } from '../cart/cart.module';
import { ProductsModule } from '../products/products.module';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';

@Module({
  imports: [CartModule, ProductsModule],
  controllers: [UsersController],
  providers: [UsersService],
})
export class UsersModule {}
