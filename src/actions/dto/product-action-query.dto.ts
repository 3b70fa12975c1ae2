import { IsInt, IsOptional, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class ProductActionQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    user_id: number = 1;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    quantity: number = 1;
}
