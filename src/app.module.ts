import { Module, NestModule, MiddlewareConsumer, RequestMethod } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { CommonModule } from './common/common.module';
import { ProductsModule } from './products/products.module';
import { CartModule } from './cart/cart.module';
import { ActionsModule } from './actions/actions.module';
import { UsersModule } from './users/users.module';
import { ViewHistoryModule } from './view-history/view-history.module';
import { SearchModule } from './search/search.module';
import { ReviewsModule } from './reviews/reviews.module';
import { QaModule } from './qa/qa.module';
import { UserThrottlerGuard } from './common/guards/user-throttler.guard';
import { EnvelopeExceptionFilter } from './common/filters/envelope-exception.filter';
import { RequestLoggerMiddleware } from './common/middleware/request-logger.middleware';
import { readIntConfig } from './common/config/app-config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          ttl: readIntConfig(configService, 'THROTTLE_TTL_MS', 60_000),
          limit: readIntConfig(configService, 'THROTTLE_LIMIT', 120),
        },
      ],
    }),
    CommonModule,
    ProductsModule,
    CartModule,
    ActionsModule,
    UsersModule,
    ViewHistoryModule,
    SearchModule,
    ReviewsModule,
    QaModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_GUARD,
      useClass: UserThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: EnvelopeExceptionFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(RequestLoggerMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
