import { createHash, generateKeyPairSync, type KeyObject } from 'node:crypto';
import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { compactDecrypt, decodeProtectedHeader } from 'jose';
import { type FastifyInstance } from 'fastify';
import { buildTestServer, seedUser, AUTH_HEADERS } from './helpers';
import { InMemoryStore } from './in-memory-store';

describe('access token routes', () => {
  let privateKey: KeyObject;
  let publicKeyParam: string;
  let store: InMemoryStore;
  let app: FastifyInstance;
  let aliceId: number;
  let bobId: number;

  beforeAll(() => {
    const pair = generateKeyPairSync('rsa', { modulusLength: 2048 });
    privateKey = pair.privateKey;
    publicKeyParam = pair.publicKey.export({ format: 'der', type: 'spki' }).toString('base64url');
  });

  beforeEach(async () => {
    store = new InMemoryStore();
    app = await buildTestServer(store);
    aliceId = await seedUser(store, 'alice');
    bobId = await seedUser(store, 'bob');
  });

  afterEach(async () => {
    await app.close();
  });

  function requestToken(login: string, query: Record<string, string>, method: 'GET' | 'POST' = 'GET') {
    return app.inject({
      method,
      url: `/users/${login}/access_tokens`,
      query: { public_key: publicKeyParam, ...query },
      headers: AUTH_HEADERS,
    });
  }

  async function decrypt(jwe: string): Promise<string> {
    const { plaintext } = await compactDecrypt(jwe, privateKey);
    return new TextDecoder().decode(plaintext);
  }

  it('issues a sealed 64-character secret for the caller', async () => {
    const res = await requestToken('alice', {});

    expect(res.statusCode).toBe(200);
    const body = res.json<{ user_id: number; encrypted_access_token: string }>();
    expect(body.user_id).toBe(aliceId);
    expect(decodeProtectedHeader(body.encrypted_access_token)).toEqual({
      alg: 'RSA-OAEP-256',
      enc: 'A256GCM',
    });

    const secret = await decrypt(body.encrypted_access_token);
    expect(secret).toMatch(/^[A-Za-z0-9_-]{64}$/);
    expect(store.tokens).toEqual([
      { id: 1, userId: aliceId, hash: createHash('sha256').update(secret).digest('hex') },
    ]);
  });

  it('accepts POST with the same query parameters', async () => {
    const res = await requestToken('alice', {}, 'POST');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ user_id: aliceId });
  });

  it('refuses impersonation by a non-admin', async () => {
    for (const target of ['bob', 'ghost']) {
      const res = await requestToken('alice', { impersonate: target });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        code: 'UNAUTHORIZED',
        message: 'You do not have permission to impersonate other users',
      });
    }
    expect(store.tokens).toEqual([]);
  });

  it('lets an admin impersonate another user', async () => {
    await store.userRepo.setAdmin(store, aliceId, true);

    const res = await requestToken('alice', { impersonate: 'bob' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ user_id: bobId });
    expect(store.tokens.map((t) => t.userId)).toEqual([bobId]);
  });

  it('answers 422 when an admin impersonates an unknown user', async () => {
    await store.userRepo.setAdmin(store, aliceId, true);

    const res = await requestToken('alice', { impersonate: 'ghost' });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ code: 'UNPROCESSABLE_ENTITY', message: 'User ghost does not exist' });
  });

  it('refuses a non-admin whatever the impersonation value', async () => {
    for (const target of ['', 'x'.repeat(300)]) {
      const res = await requestToken('alice', { impersonate: target });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        code: 'UNAUTHORIZED',
        message: 'You do not have permission to impersonate other users',
      });
    }
  });

  it('answers 422 when an admin impersonates an empty or over-long login', async () => {
    await store.userRepo.setAdmin(store, aliceId, true);
    const long = 'x'.repeat(300);

    const empty = await requestToken('alice', { impersonate: '' });
    const tooLong = await requestToken('alice', { impersonate: long });

    expect(empty.statusCode).toBe(422);
    expect(empty.json()).toEqual({ code: 'UNPROCESSABLE_ENTITY', message: 'User  does not exist' });
    expect(tooLong.statusCode).toBe(422);
    expect(tooLong.json()).toEqual({ code: 'UNPROCESSABLE_ENTITY', message: `User ${long} does not exist` });
    expect(store.tokens).toEqual([]);
  });

  it('returns 404 for an unknown subject', async () => {
    const res = await requestToken('ghost', {});

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
  });

  it('rejects a public key that cannot be parsed', async () => {
    const res = await requestToken('alice', { public_key: 'not-a-key' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ code: 'BAD_REQUEST', message: 'Invalid public key' });
    expect(store.tokens).toEqual([]);
  });

  it('requires a public key', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/users/alice/access_tokens',
      headers: AUTH_HEADERS,
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'BAD_REQUEST', message: 'Invalid access token request' });
  });

  it('keeps only the newest eight digests per user', async () => {
    const secrets: string[] = [];
    for (let i = 0; i < 9; i++) {
      const res = await requestToken('bob', {});
      secrets.push(await decrypt(res.json<{ encrypted_access_token: string }>().encrypted_access_token));
    }

    const hashes = store.tokens.filter((t) => t.userId === bobId).map((t) => t.hash);
    expect(hashes).toEqual(
      secrets.slice(1).map((s) => createHash('sha256').update(s).digest('hex')),
    );
  });
});
