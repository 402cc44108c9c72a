export interface User {
  id: number;
  name: string;
  email: string;
}

export type UserInput = Omit<User, 'id'>;

// Records the service starts with
export const seedUsers: User[] = [
  { id: 1, name: 'Juan Pérez', email: 'juan@example.com' },
  { id: 2, name: 'María García', email: 'maria@example.com' },
];

/**
 * In-memory user records keyed by id, in insertion order.
 * Ids come from a counter that only moves forward, so a deleted id is never handed out again.
 */
export class UserStore {
  private users = new Map<number, User>();
  private nextUserId = 1;

  constructor(seed: User[] = []) {
    for (const user of seed) {
      this.users.set(user.id, { ...user });
      this.nextUserId = Math.max(this.nextUserId, user.id + 1);
    }
  }

  get size(): number {
    return this.users.size;
  }

  list(): User[] {
    return Array.from(this.users.values(), (user) => ({ ...user }));
  }

  findById(id: number): User | undefined {
    const user = this.users.get(id);
    return user ? { ...user } : undefined;
  }

  create(input: UserInput): User {
    const user: User = { id: this.nextUserId, name: input.name, email: input.email };
    this.nextUserId++;
    this.users.set(user.id, user);
    return { ...user };
  }

  // Map.set on an existing key keeps its position
  replace(id: number, input: UserInput): User | undefined {
    if (!this.users.has(id)) {
      return undefined;
    }
    const user: User = { id, name: input.name, email: input.email };
    this.users.set(id, user);
    return { ...user };
  }

  remove(id: number): boolean {
    return this.users.delete(id);
  }
}
