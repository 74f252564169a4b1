import type { DataSource } from 'typeorm';
import { SharingService } from '../services/sharing.service.js';
import { TreeService } from '../services/tree.service.js';
import { AccessService } from '../services/access.service.js';
import { PermissionEntity } from '../entities/PermissionEntity.js';
import { ShareLinkEntity } from '../entities/ShareLinkEntity.js';
import { fileRef, folderRef } from '../types/access.js';
import {
  createBlobStub,
  createLoggerStub,
  createTestDataSource,
  seedFile,
  seedFolder,
  seedGrant,
  seedUser,
} from '../testing/fixtures.js';

const NOW = new Date('2025-06-01T12:00:00.000Z');

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('SharingService', () => {
  let dataSource: DataSource;
  let blobs: ReturnType<typeof createBlobStub>;
  let sharing: SharingService;
  let tree: TreeService;
  let access: AccessService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    blobs = createBlobStub();
    const logger = createLoggerStub();
    sharing = new SharingService({ dataSource, blobStorage: blobs, logger, now: () => NOW });
    tree = new TreeService({ dataSource, blobStorage: blobs, logger });
    access = new AccessService({ dataSource, logger });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('grants', () => {
    it('replaces an earlier grant for the same user and item', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const docs = await seedFolder(dataSource, alice.id, root.id, 'Docs');

      const first = await sharing.grantPermission(alice.id, bob.id, folderRef(docs.id), 'Read');
      const second = await sharing.grantPermission(alice.id, bob.id, folderRef(docs.id), 'Edit');

      expect(second.id).toBe(first.id);
      expect(second.accessLevel).toBe('Edit');
      expect(await dataSource.manager.count(PermissionEntity)).toBe(1);

      const grants = await sharing.listGrants(alice.id, folderRef(docs.id));
      expect(grants).toHaveLength(1);
      expect(grants[0]).toMatchObject({
        userId: bob.id,
        username: 'bob',
        target: { kind: 'folder', id: docs.id },
        accessLevel: 'Edit',
      });
    });

    it('carries a granted level, and its upgrade, down to nested items', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const f1 = await seedFolder(dataSource, alice.id, root.id, 'F1');
      const child = await seedFolder(dataSource, alice.id, f1.id, 'Child');
      const file = await seedFile(dataSource, alice.id, child.id, 'notes.txt');

      await sharing.grantPermission(alice.id, bob.id, folderRef(f1.id), 'Read');
      expect(await access.effectiveAccess(bob.id, folderRef(child.id))).toBe('Read');
      expect(await access.effectiveAccess(bob.id, fileRef(file.id))).toBe('Read');

      await sharing.grantPermission(alice.id, bob.id, folderRef(f1.id), 'Edit');
      expect(await access.effectiveAccess(bob.id, folderRef(child.id))).toBe('Edit');
      expect(await access.effectiveAccess(bob.id, fileRef(file.id))).toBe('Edit');
    });

    it('drops the inherited level on revoke unless a closer folder also grants it', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const f1 = await seedFolder(dataSource, alice.id, root.id, 'F1');
      const f2 = await seedFolder(dataSource, alice.id, f1.id, 'F2');
      const lone = await seedFolder(dataSource, alice.id, f1.id, 'Lone');
      const file = await seedFile(dataSource, alice.id, f2.id, 'plan.txt');

      const outer = await sharing.grantPermission(alice.id, bob.id, folderRef(f1.id), 'Edit');
      await sharing.grantPermission(alice.id, bob.id, folderRef(f2.id), 'Read');

      await sharing.revokePermission(alice.id, outer.id);

      expect(await access.effectiveAccess(bob.id, fileRef(file.id))).toBe('Read');
      expect(await access.effectiveAccess(bob.id, folderRef(f2.id))).toBe('Read');
      expect(await access.effectiveAccess(bob.id, folderRef(lone.id))).toBeNull();
      expect(await access.effectiveAccess(bob.id, folderRef(f1.id))).toBeNull();
    });

    it('refuses self-grants, non-owners and unknown users', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const { user: carol } = await seedUser(dataSource, 'carol');
      const docs = await seedFolder(dataSource, alice.id, root.id, 'Docs');
      await seedGrant(dataSource, bob.id, folderRef(docs.id), 'Edit');

      await expect(sharing.grantPermission(alice.id, alice.id, folderRef(docs.id), 'Read')).rejects.toMatchObject({
        kind: 'InvalidInput',
        message: 'Cannot grant permissions to yourself',
      });
      await expect(sharing.grantPermission(bob.id, carol.id, folderRef(docs.id), 'Read')).rejects.toMatchObject({
        kind: 'Forbidden',
      });
      await expect(sharing.grantPermission(alice.id, 999, folderRef(docs.id), 'Read')).rejects.toMatchObject({
        kind: 'NotFound',
        message: 'User not found',
      });
    });

    it('lets only the owner revoke a grant', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const file = await seedFile(dataSource, alice.id, root.id, 'a.txt');
      const grant = await sharing.grantPermission(alice.id, bob.id, fileRef(file.id), 'Edit');

      await expect(sharing.revokePermission(bob.id, grant.id)).rejects.toMatchObject({
        kind: 'Forbidden',
        message: 'Only the owner can revoke this permission',
      });

      await sharing.revokePermission(alice.id, grant.id);
      expect(await dataSource.manager.count(PermissionEntity)).toBe(0);
      await expect(sharing.revokePermission(alice.id, grant.id)).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('lists direct grants to the user and skips trashed items', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const docs = await seedFolder(dataSource, alice.id, root.id, 'Docs');
      const old = await seedFolder(dataSource, alice.id, root.id, 'Old');
      await seedGrant(dataSource, bob.id, folderRef(docs.id), 'Read');
      await seedGrant(dataSource, bob.id, folderRef(old.id), 'Edit');
      await tree.deleteFolder(alice.id, old.id);

      const shared = await sharing.listSharedWithMe(bob.id);

      expect(shared).toHaveLength(1);
      expect(shared[0]).toMatchObject({
        target: { kind: 'folder', id: docs.id },
        name: 'Docs',
        ownerId: alice.id,
        ownerUsername: 'alice',
        accessLevel: 'Read',
      });
    });
  });

  describe('share links', () => {
    it('resolves a file link and streams its bytes', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const file = await tree.uploadFile(alice.id, {
        folderId: root.id,
        name: 'hello.txt',
        mime: 'text/plain',
        buffer: Buffer.from('hello world'),
      });

      const link = await sharing.createShareLink(alice.id, fileRef(file.id), null);
      expect(link.token).toMatch(/^share_[0-9a-f]{24}$/);
      expect(link).toMatchObject({ type: 'file', targetId: file.id, itemName: 'hello.txt', isExpired: false });

      await expect(sharing.resolveShareLink(link.token)).resolves.toEqual({
        type: 'file',
        name: 'hello.txt',
        extension: '.txt',
        size: 11,
        uploadDate: expect.any(Date),
      });

      const opened = await sharing.openSharedFile(link.token);
      expect(opened.file.id).toBe(file.id);
      expect(await readAll(opened.stream)).toBe('hello world');
    });

    it('projects one level of a shared folder', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const album = await seedFolder(dataSource, alice.id, root.id, 'Album');
      const nested = await seedFolder(dataSource, alice.id, album.id, 'Nested');
      await seedFolder(dataSource, alice.id, nested.id, 'Deeper');
      const photo = await seedFile(dataSource, alice.id, album.id, 'photo.jpg', 42);
      await seedFile(dataSource, alice.id, nested.id, 'hidden.jpg');

      const link = await sharing.createShareLink(alice.id, folderRef(album.id));

      await expect(sharing.resolveShareLink(link.token)).resolves.toEqual({
        type: 'folder',
        name: 'Album',
        subFolders: [{ id: nested.id, name: 'Nested' }],
        files: [{ id: photo.id, name: 'photo.jpg', extension: '.jpg', size: 42 }],
      });
      await expect(sharing.openSharedFile(link.token)).rejects.toMatchObject({
        kind: 'InvalidInput',
        message: 'This link does not point to a file',
      });
    });

    it('reports expired links', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const file = await seedFile(dataSource, alice.id, root.id, 'a.txt');
      const yesterday = new Date(NOW.getTime() - 24 * 60 * 60 * 1000);

      const link = await sharing.createShareLink(alice.id, fileRef(file.id), yesterday);

      expect(link.isExpired).toBe(true);
      await expect(sharing.resolveShareLink(link.token)).rejects.toMatchObject({
        kind: 'Expired',
        message: 'This link has expired',
      });
    });

    it('reports links whose item was trashed or purged as gone', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const file = await seedFile(dataSource, alice.id, root.id, 'a.txt');
      const link = await sharing.createShareLink(alice.id, fileRef(file.id));

      await tree.deleteFile(alice.id, file.id);
      await expect(sharing.resolveShareLink(link.token)).rejects.toMatchObject({
        kind: 'Gone',
        message: 'File no longer available',
      });

      await tree.purgeFile(alice.id, file.id);
      await expect(sharing.resolveShareLink(link.token)).rejects.toMatchObject({ kind: 'Gone' });
      const [mine] = await sharing.listMyLinks(alice.id);
      expect(mine.itemName).toBeNull();
    });

    it('reports unknown tokens as not found', async () => {
      await expect(sharing.resolveShareLink('share_000000000000000000000000')).rejects.toMatchObject({
        kind: 'NotFound',
        message: 'Link not found',
      });
    });

    it('lets only the owner create links', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const docs = await seedFolder(dataSource, alice.id, root.id, 'Docs');
      await seedGrant(dataSource, bob.id, folderRef(docs.id), 'Edit');

      await expect(sharing.createShareLink(bob.id, folderRef(docs.id))).rejects.toMatchObject({
        kind: 'Forbidden',
        message: 'Only the owner can share this item',
      });
    });

    it('lists the caller links newest first and lets only the creator revoke', async () => {
      const { user: alice, root } = await seedUser(dataSource, 'alice');
      const { user: bob } = await seedUser(dataSource, 'bob');
      const a = await seedFile(dataSource, alice.id, root.id, 'a.txt');
      const b = await seedFile(dataSource, alice.id, root.id, 'b.txt');
      const first = await sharing.createShareLink(alice.id, fileRef(a.id));
      const second = await sharing.createShareLink(alice.id, fileRef(b.id));

      const mine = await sharing.listMyLinks(alice.id);
      expect(mine.map((l) => l.id)).toEqual([second.id, first.id]);
      await expect(sharing.listMyLinks(bob.id)).resolves.toEqual([]);

      await expect(sharing.revokeShareLink(bob.id, first.id)).rejects.toMatchObject({
        kind: 'Forbidden',
        message: 'Only the creator can revoke this link',
      });
      await sharing.revokeShareLink(alice.id, first.id);

      expect(await dataSource.manager.count(ShareLinkEntity)).toBe(1);
      await expect(sharing.resolveShareLink(first.token)).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });
});
