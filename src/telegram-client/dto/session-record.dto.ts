import {
  IsDefined,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { SessionState } from '../interfaces/auth-state.interface';

export const SESSION_STATES: ReadonlyArray<SessionState['kind']> = [
  'unauthenticated',
  'code_requested',
  'password_required',
  'authorized',
];

/**
 * DTO for the logged-in user stored with an authorized session
 */
export class UserInfoDto {
  @IsInt({ message: 'User ID must be an integer' })
  id!: number;

  @IsOptional()
  @IsString()
  firstName?: string;

  @IsOptional()
  @IsString()
  lastName?: string;

  @IsOptional()
  @IsString()
  username?: string;

  @IsOptional()
  @IsString()
  phone?: string;
}

type SessionRecordShape = { state?: string; sessionToken?: string };

const isNot =
  (...states: SessionState['kind'][]) =>
  (record: SessionRecordShape): boolean =>
    !states.some((state) => state === record.state);

const isOneOf =
  (...states: SessionState['kind'][]) =>
  (record: SessionRecordShape): boolean =>
    states.some((state) => state === record.state);

/**
 * DTO for session.json. Which fields are required depends on `state`.
 */
export class SessionRecordDto {
  @IsOptional()
  @IsIn([1], { message: 'Unsupported session record version' })
  version?: number;

  @IsIn(SESSION_STATES, { message: 'Unknown session state' })
  state!: SessionState['kind'];

  @ValidateIf(
    (record: SessionRecordShape) =>
      isNot('unauthenticated')(record) || record.sessionToken !== undefined,
  )
  @IsString({ message: 'Session token must be a string' })
  @IsNotEmpty({ message: 'Session token is required' })
  sessionToken?: string;

  @ValidateIf(isNot('unauthenticated'))
  @IsString({ message: 'Phone must be a string' })
  @IsNotEmpty({ message: 'Phone is required' })
  phone?: string;

  @ValidateIf(isOneOf('code_requested'))
  @IsString({ message: 'Phone code hash must be a string' })
  @IsNotEmpty({ message: 'Phone code hash is required' })
  phoneCodeHash?: string;

  @ValidateIf(isOneOf('code_requested'))
  @IsISO8601({}, { message: 'requestedAt must be an ISO timestamp' })
  requestedAt?: string;

  @IsOptional()
  @IsString()
  passwordHint?: string;

  @ValidateIf(isOneOf('authorized'))
  @IsDefined({ message: 'User is required' })
  @ValidateNested()
  @Type(() => UserInfoDto)
  user?: UserInfoDto;

  @ValidateIf(isOneOf('authorized'))
  @IsISO8601({}, { message: 'authorizedAt must be an ISO timestamp' })
  authorizedAt?: string;
}
