import {
  createFolderSchema,
  createShareLinkSchema,
  escapeLikeString,
  grantPermissionSchema,
  idParamSchema,
  moveSchema,
  registerSchema,
  shareTokenSchema,
  targetQuerySchema,
  updateStorageSchema,
  uploadFieldsSchema,
} from '../utils/validate.js';

describe('validation schemas', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLikeString('50%_off\\sale')).toBe('50\\%\\_off\\\\sale');
  });

  it('parses numeric route ids and rejects others', () => {
    expect(idParamSchema.parse({ id: '42' })).toEqual({ id: 42 });
    expect(idParamSchema.safeParse({ id: '4x' }).success).toBe(false);
  });

  it('trims usernames and restricts their characters', () => {
    expect(registerSchema.parse({ username: '  alice  ', password: 'pass' })).toEqual({
      username: 'alice',
      password: 'pass',
    });

    const result = registerSchema.safeParse({ username: 'al ice', password: 'pass' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.path).toEqual(['username']);
    }
  });

  it('accepts a null parent or move target to mean the root', () => {
    expect(createFolderSchema.parse({ name: 'Docs', parentFolderId: null })).toEqual({
      name: 'Docs',
      parentFolderId: null,
    });
    expect(moveSchema.parse({})).toEqual({});
    expect(moveSchema.safeParse({ targetFolderId: -1 }).success).toBe(false);
  });

  it('reads the upload folder from multipart text fields', () => {
    expect(uploadFieldsSchema.parse({ folderId: '9' })).toEqual({ folderId: 9 });
    expect(uploadFieldsSchema.parse({})).toEqual({});
  });

  it('turns fileId or folderId into a target', () => {
    expect(targetQuerySchema.parse({ fileId: '3' })).toEqual({ kind: 'file', id: 3 });
    expect(targetQuerySchema.parse({ folderId: 5 })).toEqual({ kind: 'folder', id: 5 });
  });

  it('requires exactly one target id', () => {
    const both = targetQuerySchema.safeParse({ fileId: 1, folderId: 2 });
    const neither = targetQuerySchema.safeParse({});

    expect(both.success).toBe(false);
    expect(neither.success).toBe(false);
    if (!neither.success) {
      expect(neither.error.errors[0]?.message).toBe('Provide exactly one of fileId or folderId');
    }
  });

  it('only grants Read or Edit', () => {
    expect(grantPermissionSchema.parse({ userId: 2, accessLevel: 'Edit', folderId: 4 })).toEqual({
      userId: 2,
      accessLevel: 'Edit',
      target: { kind: 'folder', id: 4 },
    });
    expect(grantPermissionSchema.safeParse({ userId: 2, accessLevel: 'Delete', folderId: 4 }).success).toBe(false);
  });

  it('parses optional link expiry dates', () => {
    expect(createShareLinkSchema.parse({ fileId: 1 })).toEqual({
      expirationDate: null,
      target: { kind: 'file', id: 1 },
    });

    const parsed = createShareLinkSchema.parse({ fileId: 1, expirationDate: '2030-01-02T03:04:05.000Z' });
    expect(parsed.expirationDate?.toISOString()).toBe('2030-01-02T03:04:05.000Z');

    expect(createShareLinkSchema.safeParse({ fileId: 1, expirationDate: 'tomorrow' }).success).toBe(false);
  });

  it('rejects share tokens that do not use the expected prefix', () => {
    expect(shareTokenSchema.safeParse({ token: 'invalid-token' }).success).toBe(false);
    expect(shareTokenSchema.safeParse({ token: 'share_abc' }).success).toBe(true);
  });

  it('rejects negative storage limits', () => {
    expect(updateStorageSchema.safeParse({ newLimit: -5 }).success).toBe(false);
    expect(updateStorageSchema.parse({ newLimit: 0 })).toEqual({ newLimit: 0 });
  });
});
