import { IsArray, IsIn, IsInt, IsOptional } from 'class-validator';

/**
 * DTO for pins.json: pinned contact ids in the order they were pinned
 */
export class PinRecordDto {
  @IsOptional()
  @IsIn([1], { message: 'Unsupported pins record version' })
  version?: number;

  @IsArray({ message: 'ids must be an array' })
  @IsInt({ each: true, message: 'Pinned ids must be integers' })
  ids!: number[];
}
