/**
 * Telegram application credentials (issued at my.telegram.org)
 */
export interface Credentials {
  apiId: number;
  apiHash: string;
}
