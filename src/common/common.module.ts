import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { SupabaseService } from './supabase.service';
import { DatabaseService } from './database/database.service';
import { QueryExecutor } from './database/query-executor';
import { SupabaseQueryExecutor } from './database/supabase-query-executor';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: SupabaseService,
      useFactory: async (configService: ConfigService) => {
        const service = new SupabaseService(configService);
        await service.initialize();
        return service;
      },
      inject: [ConfigService],
    },
    { provide: QueryExecutor, useClass: SupabaseQueryExecutor },
    DatabaseService,
  ],
  exports: [SupabaseService, DatabaseService],
})
export class CommonModule {}
