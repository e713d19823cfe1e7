import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@collab/shared';
import { UserDirectoryError, type UserDirectoryService, type User } from '@collab/domain';
import {
  CreateUserRequestSchema,
  UpdateUserRequestSchema,
  UserIdParamsSchema,
  UserLoginParamsSchema,
  type UserResponse,
} from '@collab/proto';
import { parseInput } from './parse';

interface UserRouteDeps {
  userDirectory: UserDirectoryService;
}

function mapUserDirectoryError(err: unknown): never {
  if (err instanceof UserDirectoryError) {
    const codeMap: Record<UserDirectoryError['kind'], ErrorCode> = {
      NOT_FOUND: ErrorCode.NOT_FOUND,
      CONFLICT: ErrorCode.CONFLICT,
      INTERNAL: ErrorCode.INTERNAL,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

export function toUserResponse(user: User): UserResponse {
  return { id: user.id, login: user.login, admin: user.admin };
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { userDirectory } = deps;

  app.get('/users', async (_request, reply) => {
    const users = await userDirectory.listUsers();
    return reply.status(200).send(users.map(toUserResponse));
  });

  app.post('/users', async (request, reply) => {
    const body = parseInput(CreateUserRequestSchema, request.body, 'Invalid user data');

    try {
      const user = await userDirectory.createUser(body.login, body.admin);
      return reply.status(200).send(toUserResponse(user));
    } catch (err) {
      return mapUserDirectoryError(err);
    }
  });

  app.get('/users/:login', async (request, reply) => {
    const { login } = parseInput(UserLoginParamsSchema, request.params, 'Invalid login');

    try {
      const user = await userDirectory.getUserByLogin(login);
      return reply.status(200).send(toUserResponse(user));
    } catch (err) {
      return mapUserDirectoryError(err);
    }
  });

  app.put('/users/:id', async (request, reply) => {
    const { id } = parseInput(UserIdParamsSchema, request.params, 'Invalid user id');
    const body = parseInput(UpdateUserRequestSchema, request.body, 'Invalid user data');

    try {
      await userDirectory.setAdminFlag(id, body.admin);
      return reply.status(200).send();
    } catch (err) {
      return mapUserDirectoryError(err);
    }
  });

  app.delete('/users/:id', async (request, reply) => {
    const { id } = parseInput(UserIdParamsSchema, request.params, 'Invalid user id');

    try {
      await userDirectory.deleteUser(id);
      return reply.status(200).send();
    } catch (err) {
      return mapUserDirectoryError(err);
    }
  });
}
