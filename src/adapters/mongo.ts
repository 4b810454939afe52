import { MongoClient, MongoServerError, type Collection, type IndexDescription } from "mongodb";
import type { Account } from "../types/account";
import type { StoreConfig } from "../types/config";
import type { AccountStore } from "../types/db";
import { ConflictError, NotFoundError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("mongo");

/** Stored shape: the account id doubles as `_id`. */
export interface AccountDocument {
  _id: string;
  email: string;
  name: string;
  passwordHash: string;
  isVerified: boolean;
  isActive: boolean;
  isAdmin: boolean;
  verificationToken: string | null;
  verificationTokenExpiry: Date | null;
  resetToken: string | null;
  resetTokenExpiry: Date | null;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
}

type AccountFields = Omit<AccountDocument, "_id">;

export const ACCOUNT_INDEXES: IndexDescription[] = [
  { key: { email: 1 }, name: "email_unique", unique: true },
  {
    key: { verificationToken: 1 },
    name: "verification_token_unique",
    unique: true,
    partialFilterExpression: { verificationToken: { $type: "string" } },
  },
  {
    key: { resetToken: 1 },
    name: "reset_token_unique",
    unique: true,
    partialFilterExpression: { resetToken: { $type: "string" } },
  },
];

const DUPLICATE_KEY = 11000;

function isDuplicateKey(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === DUPLICATE_KEY;
}

function toFields(account: Account): AccountFields {
  return {
    email: account.email,
    name: account.name,
    passwordHash: account.passwordHash,
    isVerified: account.isVerified,
    isActive: account.isActive,
    isAdmin: account.isAdmin,
    verificationToken: account.verificationToken,
    verificationTokenExpiry: account.verificationTokenExpiry,
    resetToken: account.resetToken,
    resetTokenExpiry: account.resetTokenExpiry,
    createdAt: account.createdAt,
    updatedAt: account.updatedAt,
    lastLoginAt: account.lastLoginAt,
  };
}

function toAccount(doc: AccountDocument): Account {
  return {
    id: doc._id,
    email: doc.email,
    name: doc.name,
    passwordHash: doc.passwordHash,
    isVerified: doc.isVerified,
    isActive: doc.isActive,
    isAdmin: doc.isAdmin ?? false,
    verificationToken: doc.verificationToken ?? null,
    verificationTokenExpiry: doc.verificationTokenExpiry ?? null,
    resetToken: doc.resetToken ?? null,
    resetTokenExpiry: doc.resetTokenExpiry ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    lastLoginAt: doc.lastLoginAt ?? null,
  };
}

export interface MongoAccountStoreOptions {
  now?: () => Date;
}

export class MongoAccountStore implements AccountStore {
  private readonly now: () => Date;

  constructor(private readonly collection: Collection<AccountDocument>, options: MongoAccountStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async ensureIndexes(): Promise<void> {
    await this.collection.createIndexes(ACCOUNT_INDEXES);
  }

  async findByEmail(email: string): Promise<Account | null> {
    const doc = await this.collection.findOne({ email });
    return doc ? toAccount(doc) : null;
  }

  async findById(id: string): Promise<Account | null> {
    const doc = await this.collection.findOne({ _id: id });
    return doc ? toAccount(doc) : null;
  }

  async findByVerificationToken(token: string, now: Date): Promise<Account | null> {
    const doc = await this.collection.findOne({ verificationToken: token, verificationTokenExpiry: { $gt: now } });
    return doc ? toAccount(doc) : null;
  }

  async findByResetToken(token: string, now: Date): Promise<Account | null> {
    const doc = await this.collection.findOne({ resetToken: token, resetTokenExpiry: { $gt: now } });
    return doc ? toAccount(doc) : null;
  }

  async insert(account: Account): Promise<Account> {
    try {
      await this.collection.insertOne({ _id: account.id, ...toFields(account) });
    } catch (error) {
      if (isDuplicateKey(error)) {
        throw new ConflictError("Email already registered");
      }
      throw error;
    }
    return account;
  }

  async update(account: Account): Promise<Account> {
    const next: Account = { ...account, updatedAt: this.now() };
    try {
      const result = await this.collection.replaceOne({ _id: account.id }, toFields(next));
      if (result.matchedCount === 0) {
        throw new NotFoundError("Account not found");
      }
    } catch (error) {
      if (isDuplicateKey(error)) {
        throw new ConflictError("Email already registered");
      }
      throw error;
    }
    return next;
  }
}

export interface MongoStoreHandle {
  store: MongoAccountStore;
  client: MongoClient;
  close(): Promise<void>;
}

/** Open a client, bind the account collection and make sure its indexes exist. */
export async function connectMongoStore(
  config: StoreConfig,
  options: MongoAccountStoreOptions = {}
): Promise<MongoStoreHandle> {
  if (!config.mongoUri) {
    throw new Error("MONGO_URI is required to use the MongoDB account store");
  }

  const client = new MongoClient(config.mongoUri, {
    maxPoolSize: 10,
    serverSelectionTimeoutMS: 5000,
  });
  await client.connect();

  const collection = client.db(config.dbName).collection<AccountDocument>(config.collection);
  const store = new MongoAccountStore(collection, options);
  try {
    await store.ensureIndexes();
  } catch (error) {
    await client.close();
    throw error;
  }

  log.info(`Connected to MongoDB database "${config.dbName}", collection "${config.collection}"`);
  return {
    store,
    client,
    close: () => client.close(),
  };
}
