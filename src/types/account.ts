export interface Account {
  id: string;
  email: string;
  name: string;
  passwordHash: string;
  isVerified: boolean;
  isActive: boolean;
  isAdmin: boolean;
  // Each token is paired with its expiry: both set or both null.
  verificationToken: string | null;
  verificationTokenExpiry: Date | null;
  resetToken: string | null;
  resetTokenExpiry: Date | null;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
}

/** What callers outside the service may see of an account. */
export type AccountSummary = Pick<
  Account,
  "id" | "email" | "name" | "isVerified" | "isActive" | "isAdmin" | "createdAt" | "lastLoginAt"
>;
