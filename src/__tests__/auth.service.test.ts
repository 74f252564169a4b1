import jwt from 'jsonwebtoken';
import type { DataSource } from 'typeorm';
import { AuthService, ROOT_FOLDER_NAME } from '../services/auth.service.js';
import { FolderEntity } from '../entities/FolderEntity.js';
import { createLoggerStub, createTestDataSource } from '../testing/fixtures.js';

const SECRET = 'test-secret';

describe('AuthService', () => {
  let dataSource: DataSource;
  let auth: AuthService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    auth = new AuthService({
      dataSource,
      logger: createLoggerStub(),
      jwtSecret: SECRET,
      tokenTtl: 3600,
      defaultStorageLimit: 2048,
      saltRounds: 4,
    });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('makes the first account an active admin and later ones inactive users', async () => {
    const first = await auth.register('alice', 'password1');
    const second = await auth.register('bob', 'password2');

    expect(first).toMatchObject({ username: 'alice', role: 'Admin', isActive: true, storageLimit: 2048, usedStorage: 0 });
    expect(second).toMatchObject({ username: 'bob', role: 'User', isActive: false });
    expect(second).not.toHaveProperty('passwordHash');
  });

  it('creates a root folder for every account', async () => {
    const user = await auth.register('alice', 'password1');

    const roots = await dataSource.manager.find(FolderEntity, { where: { ownerId: user.id } });
    expect(roots).toHaveLength(1);
    expect(roots[0]).toMatchObject({ name: ROOT_FOLDER_NAME, parentFolderId: null, isDeleted: false });
  });

  it('rejects duplicate usernames', async () => {
    await auth.register('alice', 'password1');

    await expect(auth.register('alice', 'other')).rejects.toMatchObject({
      kind: 'Conflict',
      message: 'Username already exists',
    });
  });

  it('logs in active accounts and issues a verifiable token', async () => {
    const user = await auth.register('alice', 'password1');

    const session = await auth.login('alice', 'password1');

    expect(session.user.id).toBe(user.id);
    expect(auth.verifyToken(session.token)).toEqual({ userId: user.id, role: 'Admin' });
  });

  it('refuses wrong passwords, unknown users and inactive accounts', async () => {
    await auth.register('alice', 'password1');
    await auth.register('bob', 'password2');

    await expect(auth.login('alice', 'wrong')).rejects.toMatchObject({
      kind: 'Unauthorized',
      message: 'Invalid credentials',
    });
    await expect(auth.login('nobody', 'password1')).rejects.toMatchObject({ message: 'Invalid credentials' });
    await expect(auth.login('bob', 'password2')).rejects.toMatchObject({
      kind: 'Unauthorized',
      message: 'Account is not activated',
    });
  });

  it('returns null for tokens signed with another secret, expired or malformed', () => {
    const foreign = jwt.sign({ role: 'User' }, 'another-secret', { subject: '1' });
    const expired = jwt.sign({ role: 'User' }, SECRET, { subject: '1', expiresIn: -10 });
    const noSubject = jwt.sign({ role: 'User' }, SECRET);

    expect(auth.verifyToken(foreign)).toBeNull();
    expect(auth.verifyToken(expired)).toBeNull();
    expect(auth.verifyToken(noSubject)).toBeNull();
    expect(auth.verifyToken('not-a-token')).toBeNull();
  });
});
