/**
 * Registered client application
 *
 * `secret` signs access tokens minted for this app, scoping them to it.
 */
export interface App {
  id: number;
  name: string;
  secret: string;
}
