import { IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class PopularSearchTermsQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    @Max(100)
    limit: number = 10;
}

export class ProductSearchQueryDto {
    @IsOptional()
    @IsString()
    @MaxLength(100)
    q: string = '';
}
