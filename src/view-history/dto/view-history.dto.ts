import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';

export const DEFAULT_RECENT_VIEWS_LIMIT = 50;
export const MAX_RECENT_VIEWS_LIMIT = 200;

export class RecentViewsQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    user_id: number = 1;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    @Max(MAX_RECENT_VIEWS_LIMIT)
    limit: number = DEFAULT_RECENT_VIEWS_LIMIT;
}

export class RecordViewDto {
    @IsInt()
    user_id!: number;

    @IsInt()
    product_id!: number;
}
