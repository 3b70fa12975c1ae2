import { IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export class CreateReviewDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(100)
    user_name!: string;

    @IsInt()
    @Min(1)
    @Max(5)
    rating!: number;

    @IsString()
    @IsNotEmpty()
    @MaxLength(2000)
    content!: string;
}

export class UpdateReviewDto {
    @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100) user_name?: string;
    @IsOptional() @IsInt() @Min(1) @Max(5) rating?: number;
    @IsOptional() @IsString() @IsNotEmpty() @MaxLength(2000) content?: string;
}
