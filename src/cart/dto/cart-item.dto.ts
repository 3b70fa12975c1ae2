import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { Type } from 'class-transformer';

export class CartItemsQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    user_id?: number;
}

export class CreateCartItemDto {
    @IsInt()
    user_id!: number;

    @IsInt()
    product_id!: number;

    @IsInt()
    @Min(1)
    quantity!: number;

    @IsOptional()
    @IsString()
    @MaxLength(500)
    selected_options?: string;
}

export class UpdateCartItemDto {
    @IsOptional()
    @IsInt()
    @Min(0)
    quantity?: number;

    @IsOptional()
    @IsString()
    @MaxLength(500)
    selected_options?: string;
}
