export const ACCESS_LEVELS = ['Read', 'Edit', 'Delete'] as const;

/** Ordered permission level: Read < Edit < Delete. */
export type AccessLevel = (typeof ACCESS_LEVELS)[number];

/** Levels a grant row may carry. Delete is reserved to owners. */
export const GRANTABLE_LEVELS = ['Read', 'Edit'] as const;
export type GrantableLevel = (typeof GRANTABLE_LEVELS)[number];

export const ROLES = ['User', 'Admin'] as const;
export type Role = (typeof ROLES)[number];

export type TargetKind = 'file' | 'folder';

export type TargetRef = { kind: 'file'; id: number } | { kind: 'folder'; id: number };

export function fileRef(id: number): TargetRef {
  return { kind: 'file', id };
}

export function folderRef(id: number): TargetRef {
  return { kind: 'folder', id };
}

export function accessRank(level: AccessLevel): number {
  return ACCESS_LEVELS.indexOf(level);
}

export function isAtLeast(level: AccessLevel | null, minimum: AccessLevel): boolean {
  return level !== null && accessRank(level) >= accessRank(minimum);
}

export function higherOf(a: AccessLevel | null, b: AccessLevel | null): AccessLevel | null {
  if (a === null) return b;
  if (b === null) return a;
  return accessRank(a) >= accessRank(b) ? a : b;
}

/** The authenticated caller as seen by route handlers. */
export interface Actor {
  id: number;
  username: string;
  role: Role;
}
