import { IsOptional, IsString } from 'class-validator';

export class AuthOptionsDto {
  @IsOptional()
  @IsString()
  phone?: string;

  @IsOptional()
  @IsString()
  code?: string;

  @IsOptional()
  @IsString()
  password?: string;

  @IsOptional()
  @IsString()
  phoneCodeHash?: string;
}
