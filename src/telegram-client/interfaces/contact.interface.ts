/**
 * Kind of chat a contact entry refers to
 */
export enum ContactKind {
  USER = 'user',
  GROUP = 'group',
  CHANNEL = 'channel',
  BOT = 'bot',
}

/**
 * A reachable chat as listed by Telegram. Identity is `id`; names are not unique.
 */
export interface Contact {
  readonly id: number;
  readonly name: string;
  readonly kind: ContactKind;
}

/**
 * The logged-in Telegram account
 */
export interface UserInfo {
  id: number;
  firstName?: string;
  lastName?: string;
  username?: string;
  phone?: string;
}
