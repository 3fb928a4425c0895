import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';

/**
 * DTO for API credentials, used both for `config` input and for the
 * stored credentials record. No coercion: callers parse the CLI strings
 * and a stored record must already hold a number.
 */
export class CredentialsDto {
  @IsInt({ message: 'API ID must be an integer' })
  @Min(1, { message: 'API ID must be a positive number' })
  apiId!: number;

  @IsString({ message: 'API hash must be a string' })
  @IsNotEmpty({ message: 'API hash is required' })
  apiHash!: string;
}
