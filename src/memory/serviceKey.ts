const USER_SEPARATOR = '_user_';

export function deriveServiceKey(namespace: string, userId?: string | null): string {
  return userId ? `${namespace}${USER_SEPARATOR}${userId}` : namespace;
}

export function describeDatabase(databaseUrl: string): string {
  if (!databaseUrl.includes('@')) {
    return 'unknown';
  }
  return databaseUrl.split('@')[1].split('/')[0];
}
