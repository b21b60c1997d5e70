import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { CredentialStore } from '../../src/recipes/stores/credential-store.js';
import type { SQLiteDatabaseAdapter } from '../../src/persistence/sqlite-adapter.js';
import { ValidationError } from '../../src/validation/validator.js';
import { START, createClock, openTestDatabase, testHasher, type TestClock } from './fixtures.js';

describe('CredentialStore', () => {
  let db: SQLiteDatabaseAdapter;
  let clock: TestClock;
  let store: CredentialStore;

  async function storedDigest(username: string): Promise<string> {
    const result = await db.query<{ password_hash: string }>(
      'SELECT password_hash FROM users WHERE username = ?',
      [username]
    );
    return result.rows[0].password_hash;
  }

  beforeEach(async () => {
    db = await openTestDatabase();
    clock = createClock();
    store = new CredentialStore(db, testHasher, { clock: clock.now });
  });

  afterEach(async () => {
    await db.disconnect();
  });

  describe('register', () => {
    it('should create a user with a zero recipe count', async () => {
      const id = await store.register('  alice ', 'secret1');

      expect(id).toBe(1);
      expect(await store.getUser('alice')).toEqual({
        id: 1,
        username: 'alice',
        role: 'user',
        createdAt: START,
        lastLogin: null,
        recipeCount: 0,
      });
    });

    it('should store a salted digest instead of the password', async () => {
      await store.register('alice', 'secret1');

      const digest = await storedDigest('alice');
      expect(digest).not.toContain('secret1');
      expect(digest).toMatch(/^\$2[aby]\$04\$/);
    });

    it('should reject a duplicate username', async () => {
      await store.register('alice', 'secret1');

      const attempt = store.register('alice', 'another1');
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(store.register('alice', 'another1')).rejects.toMatchObject({
        code: 'DUPLICATE_USERNAME',
        message: 'Username already exists',
      });
    });

    it('should let only one of two racing registrations win', async () => {
      const results = await Promise.allSettled([
        store.register('alice', 'secret1'),
        store.register('alice', 'secret2'),
      ]);

      expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
      expect(results.filter(r => r.status === 'rejected')).toHaveLength(1);
    });

    it('should reject invalid fields without storing anything', async () => {
      await expect(store.register('al', 'secret1')).rejects.toMatchObject({ code: 'USERNAME_INVALID' });
      await expect(store.register('alice', '123')).rejects.toMatchObject({ code: 'PASSWORD_INVALID' });
      await expect(store.register('alice', 'secret1', 'owner')).rejects.toMatchObject({ code: 'ROLE_INVALID' });

      expect(await store.getUser('alice')).toBeNull();
    });
  });

  describe('login', () => {
    it('should return the role for matching credentials', async () => {
      await store.register('alice', 'secret1');
      await store.register('root_admin', 'secret2', 'admin');

      expect(await store.login('alice', 'secret1')).toBe('user');
      expect(await store.login('root_admin', 'secret2')).toBe('admin');
    });

    it('should record the login time', async () => {
      await store.register('alice', 'secret1');
      clock.advance(60_000);

      await store.login('alice', 'secret1');

      const user = await store.getUser('alice');
      expect(user?.lastLogin).toBe(START + 60_000);
    });

    it('should return null for a wrong password or unknown user', async () => {
      await store.register('alice', 'secret1');

      expect(await store.login('alice', 'secret2')).toBeNull();
      expect(await store.login('nobody', 'secret1')).toBeNull();
      expect((await store.getUser('alice'))?.lastLogin).toBeNull();
    });

    it('should return null for input that fails validation', async () => {
      await store.register('alice', 'secret1');

      expect(await store.login('al', 'secret1')).toBeNull();
      expect(await store.login('alice', '')).toBeNull();
      expect(await store.login('alice smith', 'secret1')).toBeNull();
    });

    it('should upgrade a legacy sha256 digest on successful login', async () => {
      const legacy = createHash('sha256').update('secret1', 'utf8').digest('hex');
      await db.query(
        'INSERT INTO users (username, password_hash, role, created_at, recipe_count) VALUES (?, ?, ?, ?, 0)',
        ['carol', legacy, 'user', START]
      );

      expect(await store.login('carol', 'secret1')).toBe('user');

      const upgraded = await storedDigest('carol');
      expect(upgraded).toMatch(/^\$2[aby]\$04\$[./A-Za-z0-9]{53}$/);
      expect(await store.login('carol', 'secret1')).toBe('user');
    });

    it('should keep a legacy digest after a failed login', async () => {
      const legacy = createHash('sha256').update('secret1', 'utf8').digest('hex');
      await db.query(
        'INSERT INTO users (username, password_hash, role, created_at, recipe_count) VALUES (?, ?, ?, ?, 0)',
        ['carol', legacy, 'user', START]
      );

      expect(await store.login('carol', 'wrong-password')).toBeNull();
      expect(await storedDigest('carol')).toBe(legacy);
    });
  });

  describe('removeIn', () => {
    it('should delete the account inside a transaction', async () => {
      await store.register('alice', 'secret1');

      const removed = await db.transaction(tx => store.removeIn(tx, 'alice'));
      const missing = await db.transaction(tx => store.removeIn(tx, 'alice'));

      expect(removed).toBe(true);
      expect(missing).toBe(false);
      expect(await store.getUser('alice')).toBeNull();
    });
  });
});
