import { IsOptional, IsString } from 'class-validator';

export class ConfigOptionsDto {
  @IsOptional()
  @IsString()
  apiId?: string;

  @IsOptional()
  @IsString()
  apiHash?: string;
}
