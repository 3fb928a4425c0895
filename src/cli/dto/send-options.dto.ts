import { IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

export class SendOptionsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: '--to must not be empty' })
  to?: string;

  @IsOptional()
  @Matches(/^-?\d+$/, { message: '--to-id must be an integer' })
  toId?: string;
}
