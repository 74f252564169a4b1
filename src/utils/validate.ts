import { z } from 'zod';
import { GRANTABLE_LEVELS, fileRef, folderRef, type TargetRef } from '../types/access.js';

/**
 * Escapes SQL LIKE special characters to prevent wildcard injection
 * @param str - The string to escape
 * @returns Escaped string safe for use in LIKE patterns
 */
export function escapeLikeString(str: string): string {
  return str.replace(/[%_\\]/g, '\\$&');
}

const positiveId = z.coerce.number().int().positive();

export const idParamSchema = z.object({
  id: z.string().regex(/^\d+$/, 'ID must be a valid number').transform(Number),
});

export const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username cannot exceed 50 characters')
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may contain letters, numbers, _, . and -'),
  password: z.string().min(4, 'Password must be at least 4 characters'),
});

export const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export const createFolderSchema = z.object({
  name: z.string().min(1, 'Folder name is required'),
  parentFolderId: z.number().int().positive().nullable().optional(),
});

export const renameSchema = z.object({
  name: z.string().min(1, 'Name is required'),
});

export const moveSchema = z.object({
  targetFolderId: z.number().int().positive().nullable().optional(),
});

// Multipart fields arrive as strings
export const uploadFieldsSchema = z.object({
  folderId: z
    .string()
    .regex(/^\d+$/, 'folderId must be a valid number')
    .transform(Number)
    .optional(),
});

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1, 'Search query is required'),
});

const targetShape = {
  fileId: positiveId.optional(),
  folderId: positiveId.optional(),
};

function toTargetRef(
  { fileId, folderId }: { fileId?: number; folderId?: number },
  ctx: z.RefinementCtx
): TargetRef {
  if (fileId !== undefined && folderId === undefined) return fileRef(fileId);
  if (folderId !== undefined && fileId === undefined) return folderRef(folderId);
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Provide exactly one of fileId or folderId',
    path: ['fileId'],
  });
  return z.NEVER;
}

export const targetQuerySchema = z
  .object(targetShape)
  .transform((value, ctx) => toTargetRef(value, ctx));

export const grantPermissionSchema = z
  .object({
    userId: positiveId,
    accessLevel: z.enum(GRANTABLE_LEVELS),
    ...targetShape,
  })
  .transform((value, ctx) => ({
    userId: value.userId,
    accessLevel: value.accessLevel,
    target: toTargetRef(value, ctx),
  }));

export const createShareLinkSchema = z
  .object({
    expirationDate: z.string().datetime({ offset: true }).nullable().optional(),
    ...targetShape,
  })
  .transform((value, ctx) => ({
    expirationDate: value.expirationDate ? new Date(value.expirationDate) : null,
    target: toTargetRef(value, ctx),
  }));

export const shareTokenSchema = z.object({
  token: z.string().startsWith('share_', 'Invalid share token format'),
});

export const updateStorageSchema = z.object({
  newLimit: z.number().int().nonnegative('Storage limit cannot be negative'),
});

export const resetPasswordSchema = z.object({
  newPassword: z.string().min(4, 'Password must be at least 4 characters'),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type CreateFolderInput = z.infer<typeof createFolderSchema>;
export type MoveInput = z.infer<typeof moveSchema>;
export type GrantPermissionInput = z.infer<typeof grantPermissionSchema>;
export type CreateShareLinkInput = z.infer<typeof createShareLinkSchema>;
