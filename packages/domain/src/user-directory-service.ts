import { type User } from './user';
import { type UserRepository, type TransactionRunner } from './ports';

export interface UserDirectoryServiceDeps {
  userRepo: UserRepository;
  withTransaction: TransactionRunner;
}

export class UserDirectoryService {
  constructor(private readonly deps: UserDirectoryServiceDeps) {}

  async listUsers(): Promise<User[]> {
    return this.deps.withTransaction((tx) => this.deps.userRepo.list(tx));
  }

  async createUser(login: string, admin: boolean): Promise<User> {
    const { userRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const userId = await userRepo.create(tx, { login, admin });
      if (userId === null) {
        throw new UserDirectoryError('CONFLICT', `User ${login} already exists`);
      }

      const user = await userRepo.findById(tx, userId);
      if (!user) {
        throw new UserDirectoryError('INTERNAL', "Couldn't find the user we just created");
      }
      return user;
    });
  }

  async getUserByLogin(login: string): Promise<User> {
    const user = await this.deps.withTransaction((tx) => this.deps.userRepo.findByLogin(tx, login));
    if (!user) {
      throw new UserDirectoryError('NOT_FOUND', 'User not found');
    }
    return user;
  }

  async getUserById(id: number): Promise<User> {
    const user = await this.deps.withTransaction((tx) => this.deps.userRepo.findById(tx, id));
    if (!user) {
      throw new UserDirectoryError('NOT_FOUND', 'User not found');
    }
    return user;
  }

  async setAdminFlag(id: number, admin: boolean): Promise<void> {
    const updated = await this.deps.withTransaction((tx) => this.deps.userRepo.setAdmin(tx, id, admin));
    if (!updated) {
      throw new UserDirectoryError('NOT_FOUND', 'User not found');
    }
  }

  async deleteUser(id: number): Promise<void> {
    const deleted = await this.deps.withTransaction((tx) => this.deps.userRepo.delete(tx, id));
    if (!deleted) {
      throw new UserDirectoryError('NOT_FOUND', 'User not found');
    }
  }
}

export class UserDirectoryError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND' | 'CONFLICT' | 'INTERNAL',
    message: string,
  ) {
    super(message);
    this.name = 'UserDirectoryError';
  }
}
