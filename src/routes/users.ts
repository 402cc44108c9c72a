import { Router, type Request, type Response } from 'express';
import type { UserStore } from '../data/users';
import { NotFoundError } from '../errors';
import { sendSuccess } from '../response';
import { decodeUserPayload, parseUserId, validateCreate, validateUpdate } from '../validation';

export function usersRouter(store: UserStore): Router {
  const router = Router();

  // Get all users
  router.get('/', (_req: Request, res: Response) => {
    sendSuccess(res, 200, 'Users retrieved successfully', { kind: 'users', users: store.list() });
  });

  // Get a user by id
  router.get('/:id', (req: Request, res: Response) => {
    const id = parseUserId(req.params.id);
    const user = store.findById(id);
    if (!user) {
      throw new NotFoundError();
    }
    sendSuccess(res, 200, 'User found', { kind: 'user', user });
  });

  // Create user
  router.post('/', (req: Request, res: Response) => {
    const input = validateCreate(decodeUserPayload(req.body));
    const user = store.create(input);
    sendSuccess(res, 201, 'User created successfully', { kind: 'user', user });
  });

  // Update user, id stays the same
  router.put('/:id', (req: Request, res: Response) => {
    const id = parseUserId(req.params.id);
    const input = validateUpdate(decodeUserPayload(req.body));
    const user = store.replace(id, input);
    if (!user) {
      throw new NotFoundError();
    }
    sendSuccess(res, 200, 'User updated successfully', { kind: 'user', user });
  });

  // Delete user
  router.delete('/:id', (req: Request, res: Response) => {
    const id = parseUserId(req.params.id);
    if (!store.remove(id)) {
      throw new NotFoundError();
    }
    sendSuccess(res, 200, 'User deleted successfully', { kind: 'none' });
  });

  return router;
}
