import { IsBoolean, IsNotEmpty, IsNumberString, IsOptional, IsString, IsUrl } from 'class-validator';

export class CreateProductDto {
    @IsString() @IsNotEmpty() brand_name!: string;
    @IsString() @IsNotEmpty() product_name!: string;
    @IsUrl() image_url!: string;
    @IsNumberString() price!: string;
    @IsNumberString() discount!: string;
    @IsNumberString() likes!: string;
    @IsString() reviews!: string;
    @IsBoolean() is_favorite!: boolean;
    @IsString() @IsNotEmpty() category!: string;
}

export class UpdateProductDto {
    @IsOptional() @IsString() @IsNotEmpty() brand_name?: string;
    @IsOptional() @IsString() @IsNotEmpty() product_name?: string;
    @IsOptional() @IsUrl() image_url?: string;
    @IsOptional() @IsNumberString() price?: string;
    @IsOptional() @IsNumberString() discount?: string;
    @IsOptional() @IsNumberString() likes?: string;
    @IsOptional() @IsString() reviews?: string;
    @IsOptional() @IsBoolean() is_favorite?: boolean;
    @IsOptional() @IsString() @IsNotEmpty() category?: string;
}
