// Shared fixtures for the service tests. Nothing here touches the network.
import { AuthService } from '../auth';
import { MemoryAccountStore } from '../adapters/memory';
import { loadConfig } from '../config';
import type { Account } from '../types/account';
import type { ServiceConfig } from '../types/config';
import type { Notifier } from '../types/email';

export const TEST_SECRET = 'test-secret-key';
export const STRONG_PASSWORD = 'TestPassword123';
export const START = new Date('2024-01-01T00:00:00.000Z');

export function testConfig(overrides: Record<string, string> = {}): ServiceConfig {
  return loadConfig({
    NODE_ENV: 'test',
    JWT_SECRET: TEST_SECRET,
    BCRYPT_ROUNDS: '4',
    APP_NAME: 'Test App',
    CLIENT_BASE_URL: 'http://localhost:3000',
    ...overrides,
  });
}

export class TestClock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

export type SentKind = 'verification' | 'password-reset' | 'welcome' | 'password-changed';

export interface SentMessage {
  kind: SentKind;
  email: string;
  name: string;
  token?: string;
}

/** Records every send. `mode` decides how the next sends resolve. */
export class RecordingNotifier implements Notifier {
  readonly sent: SentMessage[] = [];
  mode: 'ok' | 'fail' | 'throw' = 'ok';

  private async record(message: SentMessage): Promise<boolean> {
    this.sent.push(message);
    if (this.mode === 'throw') throw new Error('smtp unavailable');
    return this.mode === 'ok';
  }

  sendVerification(email: string, name: string, token: string) {
    return this.record({ kind: 'verification', email, name, token });
  }

  sendPasswordReset(email: string, name: string, token: string) {
    return this.record({ kind: 'password-reset', email, name, token });
  }

  sendWelcome(email: string, name: string) {
    return this.record({ kind: 'welcome', email, name });
  }

  sendPasswordChanged(email: string, name: string) {
    return this.record({ kind: 'password-changed', email, name });
  }

  last(kind: SentKind): SentMessage | undefined {
    return [...this.sent].reverse().find((message) => message.kind === kind);
  }

  lastToken(kind: SentKind): string {
    const token = this.last(kind)?.token;
    if (!token) throw new Error(`No ${kind} token was sent`);
    return token;
  }
}

export interface TestHarness {
  auth: AuthService;
  store: MemoryAccountStore;
  notifier: RecordingNotifier;
  clock: TestClock;
  config: ServiceConfig;
}

export function createHarness(overrides: Record<string, string> = {}): TestHarness {
  const config = testConfig(overrides);
  const clock = new TestClock();
  const store = new MemoryAccountStore({ now: clock.now });
  const notifier = new RecordingNotifier();
  let nextId = 0;
  const auth = AuthService.create(config, {
    store,
    notifier,
    now: clock.now,
    newId: () => `account-${++nextId}`,
  });
  return { auth, store, notifier, clock, config };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 'account-1',
    email: 'user@example.com',
    name: 'Test User',
    passwordHash: 'not-a-real-hash',
    isVerified: false,
    isActive: true,
    isAdmin: false,
    verificationToken: null,
    verificationTokenExpiry: null,
    resetToken: null,
    resetTokenExpiry: null,
    createdAt: START,
    updatedAt: START,
    lastLoginAt: null,
    ...overrides,
  };
}

/** Sign up and verify in one go; returns the stored account. */
export async function createVerifiedAccount(
  harness: TestHarness,
  email = 'user@example.com',
  name = 'Test User',
  password = STRONG_PASSWORD
): Promise<Account> {
  await harness.auth.signup({ email, name, password });
  await harness.auth.verifyEmail(harness.notifier.lastToken('verification'));
  const account = await harness.store.findByEmail(email);
  if (!account) throw new Error('account was not stored');
  return account;
}
