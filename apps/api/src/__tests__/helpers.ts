import { type FastifyInstance } from 'fastify';
import { CryptoRandomSource, JoseTokenCrypto } from '@collab/shared';
import { type RandomSource } from '@collab/domain';
import { buildServer } from '../server';
import { InMemoryStore } from './in-memory-store';

export const API_TOKEN = 'test-secret';
export const AUTH_HEADERS = { authorization: `token ${API_TOKEN}` };

export async function buildTestServer(
  store: InMemoryStore = new InMemoryStore(),
  random: RandomSource = new CryptoRandomSource(),
): Promise<FastifyInstance> {
  return buildServer({
    apiToken: API_TOKEN,
    userRepo: store.userRepo,
    inviteCodeRepo: store.inviteCodeRepo,
    accessTokenRepo: store.accessTokenRepo,
    tokenCrypto: new JoseTokenCrypto(),
    random,
    withTransaction: store.withTransaction,
  });
}

export async function seedUser(store: InMemoryStore, login: string, admin = false): Promise<number> {
  const id = await store.userRepo.create(store, { login, admin });
  if (id === null) throw new Error(`seed user ${login} already exists`);
  return id;
}
