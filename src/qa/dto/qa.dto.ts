import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateQaDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(100)
    user_name!: string;

    @IsString()
    @IsNotEmpty()
    @MaxLength(2000)
    question!: string;
}

export class UpdateQaDto {
    @IsOptional() @IsString() @IsNotEmpty() @MaxLength(100) user_name?: string;
    @IsOptional() @IsString() @IsNotEmpty() @MaxLength(2000) question?: string;
    @IsOptional() @IsString() @MaxLength(2000) answer?: string;
}
