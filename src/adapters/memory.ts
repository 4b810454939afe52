import type { Account } from "../types/account";
import type { AccountStore } from "../types/db";
import { ConflictError, NotFoundError } from "../utils/errors";

function copyDate(value: Date | null): Date | null {
  return value ? new Date(value.getTime()) : null;
}

function copyAccount(account: Account): Account {
  return {
    ...account,
    verificationTokenExpiry: copyDate(account.verificationTokenExpiry),
    resetTokenExpiry: copyDate(account.resetTokenExpiry),
    createdAt: new Date(account.createdAt.getTime()),
    updatedAt: new Date(account.updatedAt.getTime()),
    lastLoginAt: copyDate(account.lastLoginAt),
  };
}

export interface MemoryAccountStoreOptions {
  now?: () => Date;
}

/**
 * Map-backed store for tests and local runs. Records are copied on the way in
 * and out, so callers never hold a reference into the store.
 */
export class MemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<string, Account>();
  private readonly now: () => Date;

  constructor(options: MemoryAccountStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.accounts.size;
  }

  async findByEmail(email: string): Promise<Account | null> {
    const found = this.find((account) => account.email === email);
    return found ? copyAccount(found) : null;
  }

  async findById(id: string): Promise<Account | null> {
    const found = this.accounts.get(id);
    return found ? copyAccount(found) : null;
  }

  async findByVerificationToken(token: string, now: Date): Promise<Account | null> {
    const found = this.find(
      (account) =>
        account.verificationToken === token &&
        account.verificationTokenExpiry !== null &&
        account.verificationTokenExpiry.getTime() > now.getTime()
    );
    return found ? copyAccount(found) : null;
  }

  async findByResetToken(token: string, now: Date): Promise<Account | null> {
    const found = this.find(
      (account) =>
        account.resetToken === token &&
        account.resetTokenExpiry !== null &&
        account.resetTokenExpiry.getTime() > now.getTime()
    );
    return found ? copyAccount(found) : null;
  }

  async insert(account: Account): Promise<Account> {
    if (this.accounts.has(account.id)) {
      throw new ConflictError(`Account ${account.id} already exists`);
    }
    if (this.find((existing) => existing.email === account.email)) {
      throw new ConflictError("Email already registered");
    }
    this.accounts.set(account.id, copyAccount(account));
    return copyAccount(account);
  }

  async update(account: Account): Promise<Account> {
    if (!this.accounts.has(account.id)) {
      throw new NotFoundError("Account not found");
    }
    if (this.find((existing) => existing.email === account.email && existing.id !== account.id)) {
      throw new ConflictError("Email already registered");
    }
    const next = copyAccount({ ...account, updatedAt: this.now() });
    this.accounts.set(account.id, next);
    return copyAccount(next);
  }

  private find(predicate: (account: Account) => boolean): Account | undefined {
    for (const account of this.accounts.values()) {
      if (predicate(account)) return account;
    }
    return undefined;
  }
}
