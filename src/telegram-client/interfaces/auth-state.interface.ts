import { UserInfo } from './contact.interface';

/**
 * Login state machine states.
 *
 * Only the session variants live in session.json; `unconfigured` is derived
 * from the absence of API credentials.
 */
export type UnconfiguredState = { kind: 'unconfigured' };

export type UnauthenticatedState = {
  kind: 'unauthenticated';
  sessionToken?: string;
};

export type CodeRequestedState = {
  kind: 'code_requested';
  phone: string;
  phoneCodeHash: string;
  sessionToken: string;
  requestedAt: string;
};

export type PasswordRequiredState = {
  kind: 'password_required';
  phone: string;
  sessionToken: string;
  passwordHint?: string;
};

export type AuthorizedState = {
  kind: 'authorized';
  phone: string;
  sessionToken: string;
  user: UserInfo;
  authorizedAt: string;
};

export type SessionState =
  | UnauthenticatedState
  | CodeRequestedState
  | PasswordRequiredState
  | AuthorizedState;

export type AuthState = UnconfiguredState | SessionState;

export type AuthStateKind = AuthState['kind'];

export type SignInOutcome =
  | { status: 'authorized'; user: UserInfo }
  | { status: 'password_required'; hint?: string };

export interface AuthStatus {
  configured: boolean;
  authenticated: boolean;
  state: AuthStateKind;
  user?: UserInfo;
  /** Set when an authorized session was rejected by the provider */
  sessionRevoked?: boolean;
}
