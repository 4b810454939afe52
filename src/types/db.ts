import type { Account } from "./account";

/**
 * Durable record of accounts. Implementations serialize conflicting writes;
 * the auth core keeps no other shared state.
 */
export interface AccountStore {
  findByEmail(email: string): Promise<Account | null>;
  findById(id: string): Promise<Account | null>;
  /** Matches only while the stored expiry is after `now`. */
  findByVerificationToken(token: string, now: Date): Promise<Account | null>;
  /** Matches only while the stored expiry is after `now`. */
  findByResetToken(token: string, now: Date): Promise<Account | null>;
  /** Throws ConflictError when the email is already taken. */
  insert(account: Account): Promise<Account>;
  /** Replaces the stored record and touches `updatedAt`; throws NotFoundError for an unknown id. */
  update(account: Account): Promise<Account>;
}
