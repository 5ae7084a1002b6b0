type UserId = number;

/**
 * Per-user OpenRouter keys plus the set of users whose next text message is
 * a key. The dispatcher only sees this interface.
 */
export interface SessionStore {
  setCredential(user: UserId, value: string): void;
  getCredential(user: UserId): string | undefined;
  removeCredential(user: UserId): void;

  markPending(user: UserId): void;
  clearPending(user: UserId): void;
  isPending(user: UserId): boolean;
}

// Lives as long as the process: a restart forgets every key.
export class InMemorySessionStore implements SessionStore {
  private readonly credentials = new Map<UserId, string>();
  private readonly pending = new Set<UserId>();

  setCredential(user: UserId, value: string): void {
    this.credentials.set(user, value);
  }

  getCredential(user: UserId): string | undefined {
    return this.credentials.get(user);
  }

  removeCredential(user: UserId): void {
    this.credentials.delete(user);
  }

  markPending(user: UserId): void {
    this.pending.add(user);
  }

  clearPending(user: UserId): void {
    this.pending.delete(user);
  }

  isPending(user: UserId): boolean {
    return this.pending.has(user);
  }
}
