/**
 * Identity Types
 *
 * Accounts are owned by the identity store; the workflow only reads them.
 */

export interface Identity {
  id: string;
  login: string;
  email: string;
}
