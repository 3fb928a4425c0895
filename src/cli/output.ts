import { ErrorKind, toAppException } from '../common/exceptions/base.exception';
import {
  Contact,
  UserInfo,
} from '../telegram-client/interfaces/contact.interface';

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ErrorPayload {
  success: false;
  error: ErrorKind;
  message: string;
}

export interface UserPayload {
  id: number;
  first_name: string | null;
  last_name: string | null;
  username: string | null;
  phone: string | null;
}

export interface ContactPayload {
  id: number;
  name: string;
  type: string;
}

export function toUserPayload(user: UserInfo): UserPayload {
  return {
    id: user.id,
    first_name: user.firstName ?? null,
    last_name: user.lastName ?? null,
    username: user.username ?? null,
    phone: user.phone ?? null,
  };
}

export function toContactPayload(contact: Contact): ContactPayload {
  return { id: contact.id, name: contact.name, type: contact.kind };
}

export function toErrorPayload(error: unknown): ErrorPayload {
  const exception = toAppException(error);
  return {
    success: false,
    error: exception.errorCode,
    message: exception.message,
  };
}

/**
 * One JSON document per command, 2-space indented
 */
export function writeJson(sink: OutputSink, payload: object): void {
  sink.write(`${JSON.stringify(payload, null, 2)}\n`);
}
