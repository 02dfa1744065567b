export const normalizeUsername = (username: string): string =>
  username.trim().replace(/^@/, '').toLowerCase();

/**
 * Username denylist for bot commands
 */
export class AccessPolicy {
  private restrictedUsers: Set<string>;
  readonly denialMessage: string;

  constructor(restrictedUsers: string[], denialMessage: string) {
    this.restrictedUsers = new Set(
      restrictedUsers.map(normalizeUsername).filter(username => username.length > 0)
    );
    this.denialMessage = denialMessage;
  }

  isRestricted(username: string | undefined): boolean {
    if (!username) return false;
    return this.restrictedUsers.has(normalizeUsername(username));
  }
}

export const createAccessPolicy = (restrictedUsers: string[], denialMessage: string): AccessPolicy => {
  return new AccessPolicy(restrictedUsers, denialMessage);
};
