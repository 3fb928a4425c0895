import { Credentials } from '../../credentials/interfaces/credentials.interface';
import { SignInOutcome } from './auth-state.interface';
import { Contact, UserInfo } from './contact.interface';

/**
 * Injection token for the provider transport
 */
export const MESSAGING_TRANSPORT = Symbol('MESSAGING_TRANSPORT');

export type UploadProgressCallback = (sent: number, total: number) => void;

export interface SentFile {
  messageId?: number;
}

/**
 * Capability the core needs from the messaging provider.
 *
 * Failures are reported as AppException subclasses (InvalidPhone, InvalidCode,
 * ExpiredCode, InvalidPassword, InvalidCredentials, NotAuthenticated,
 * TransportError). Each call is a single request; nothing is retried here.
 */
export interface MessagingTransport {
  connect(credentials: Credentials, sessionToken?: string): Promise<void>;
  isConnected(): boolean;
  /** Serialized session (auth key) to persist between runs */
  exportSession(): string;

  requestCode(phone: string): Promise<{ phoneCodeHash: string }>;
  submitCode(
    phone: string,
    code: string,
    phoneCodeHash: string,
  ): Promise<SignInOutcome>;
  submitPassword(password: string): Promise<UserInfo>;
  /** The logged-in user, or null when the session is not (or no longer) authorized */
  getCurrentUser(): Promise<UserInfo | null>;
  logOut(): Promise<void>;

  listContacts(limit: number): Promise<Contact[]>;
  sendFile(
    recipientId: number,
    filePath: string,
    onProgress?: UploadProgressCallback,
  ): Promise<SentFile>;

  disconnect(): Promise<void>;
}
