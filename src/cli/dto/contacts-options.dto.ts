import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class ContactsOptionsDto {
  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @IsBoolean()
  pinnedOnly?: boolean = false;

  @IsOptional()
  @IsBoolean()
  refresh?: boolean = false;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: '--limit must be an integer' })
  @Min(1, { message: '--limit must be at least 1' })
  @Max(1000, { message: '--limit must be at most 1000' })
  limit?: number;
}
