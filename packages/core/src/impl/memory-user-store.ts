import type { FlowUser, UserLookupField, UserStore } from '../interfaces/user-store';

export class MemoryUserStore implements UserStore {
  private users = new Map<string, FlowUser>();

  constructor(users: FlowUser[] = []) {
    users.forEach(u => this.add(u));
  }

  add(user: FlowUser): void {
    this.users.set(user.id, { ...user });
  }

  async get(id: string): Promise<FlowUser | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findByIdentifier(uid: string, fields: UserLookupField[]): Promise<FlowUser | null> {
    const needle = uid.trim();
    if (!needle) return null;

    for (const user of this.users.values()) {
      if (fields.includes('username') && user.username === needle) return { ...user };
      if (fields.includes('email') && user.email.toLowerCase() === needle.toLowerCase()) return { ...user };
    }
    return null;
  }

  async setActive(id: string, active: boolean): Promise<void> {
    const user = this.users.get(id);
    if (!user) throw new Error(`User "${id}" not found`);
    this.users.set(id, { ...user, isActive: active });
  }
}
