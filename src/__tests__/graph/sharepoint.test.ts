import { describe, expect, it } from 'vitest';
import {
  AlreadyExistsError,
  AuthError,
  DecodeError,
  InvalidArgumentsError,
  NotFoundError,
  TransportError,
} from '../../errors.js';
import { SharePointStorage, type SharePointStorageOptions } from '../../graph/sharepoint.js';
import {
  ARCHIVE_DRIVE_ID,
  FakeGraphDrive,
  SITE_ID,
  SITE_URL,
  TIMESTAMP,
} from '../helpers/fakeGraphDrive.js';

function setup(options: Partial<SharePointStorageOptions> = {}) {
  const drive = new FakeGraphDrive();
  const storage = new SharePointStorage({
    siteUrl: SITE_URL,
    credentials: { getToken: async () => 'test-token' },
    createClient: drive.createClient,
    ...options,
  });
  return { drive, storage };
}

describe('SharePointStorage.list', () => {
  it('lists the library root', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/report.docx', 'abc');
    drive.seedFolder('/Shared');

    const entries = await storage.list('/');

    expect(entries).toEqual([
      {
        name: 'report.docx',
        path: '/report.docx',
        isFolder: false,
        size: 3,
        modified: TIMESTAMP,
        created: TIMESTAMP,
        id: expect.any(String),
        mimeType: 'application/octet-stream',
      },
      {
        name: 'Shared',
        path: '/Shared',
        isFolder: true,
        size: 0,
        modified: TIMESTAMP,
        created: TIMESTAMP,
        id: expect.any(String),
      },
    ]);
  });

  it('builds entry paths under nested folders', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/Shared/2026/plan.md', '# plan');

    const entries = await storage.list('/Shared/2026/');

    expect(entries.map((entry) => entry.path)).toEqual(['/Shared/2026/plan.md']);
  });

  it('follows next links until the listing is complete', async () => {
    const { drive, storage } = setup();
    drive.pageSize = 2;
    for (const name of ['a.txt', 'b.txt', 'c.txt', 'd.txt', 'e.txt']) {
      drive.seedFile(`/Bulk/${name}`, name);
    }

    const entries = await storage.list('/Bulk');

    expect(entries.map((entry) => entry.name)).toEqual(['a.txt', 'b.txt', 'c.txt', 'd.txt', 'e.txt']);
    expect(drive.requests.filter((request) => request.path.endsWith(':/children'))).toHaveLength(3);
  });

  it('fails with NotFound for a missing folder', async () => {
    const { storage } = setup();

    const error = await storage.list('/missing').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: 'Not found (/missing: The resource could not be found.)' });
  });

  it('rejects a relative path before calling Graph', async () => {
    const { drive, storage } = setup();

    await expect(storage.list('Shared')).rejects.toBeInstanceOf(InvalidArgumentsError);
    expect(drive.requests).toEqual([]);
    expect(drive.tokens).toEqual([]);
  });

  it('looks up the site and library once', async () => {
    const { drive, storage } = setup();

    await storage.list('/');
    await storage.list('/');

    expect(drive.requests.filter((request) => request.path.startsWith('/sites/'))).toEqual([
      { method: 'GET', path: '/sites/contoso.sharepoint.com:/sites/team' },
      { method: 'GET', path: `/sites/${encodeURIComponent(SITE_ID)}/drives` },
    ]);
  });

  it('uses the library named in the configuration', async () => {
    const { drive, storage } = setup({ driveName: 'archive' });
    drive.seedFile('/old.txt', 'old', ARCHIVE_DRIVE_ID);

    const entries = await storage.list('/');

    expect(entries.map((entry) => entry.name)).toEqual(['old.txt']);
  });

  it('fails with NotFound when the named library does not exist', async () => {
    const { storage } = setup({ driveName: 'Missing' });

    await expect(storage.list('/')).rejects.toThrow(
      'Document library "Missing" not found on https://contoso.sharepoint.com/sites/team'
    );
  });

  it('retries the site lookup after a network failure', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/notes.txt', 'hello');
    drive.failNetwork();

    const error = await storage.list('/').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Graph request failed (/: fetch failed)' });

    await expect(storage.list('/')).resolves.toHaveLength(1);
  });

  it('reports server errors as TransportError with the status', async () => {
    const { drive, storage } = setup();
    drive.failNext(503, 'serviceNotAvailable');

    await expect(storage.list('/')).rejects.toMatchObject({
      kind: 'TransportError',
      status: 503,
      message: 'Graph API error 503 (/: Injected 503)',
    });
  });
});

describe('SharePointStorage.read', () => {
  it('decodes UTF-8 text by default', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/notes.txt', 'héllo wörld');

    await expect(storage.read('/notes.txt')).resolves.toEqual({
      kind: 'text',
      path: '/notes.txt',
      encoding: 'utf-8',
      text: 'héllo wörld',
    });
  });

  it('decodes other text encodings', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/wide.txt', Buffer.from('hi', 'utf16le'));
    drive.seedFile('/legacy.txt', Buffer.from([0x63, 0x61, 0x66, 0xe9]));

    await expect(storage.read('/wide.txt', 'utf-16le')).resolves.toMatchObject({ encoding: 'utf-16le', text: 'hi' });
    await expect(storage.read('/legacy.txt', 'latin1')).resolves.toMatchObject({
      encoding: 'windows-1252',
      text: 'café',
    });
  });

  it('keeps a leading byte order mark', async () => {
    const { storage } = setup();
    await storage.write('/bom.txt', '\uFEFFhello', { overwrite: true });

    await expect(storage.read('/bom.txt')).resolves.toEqual({
      kind: 'text',
      path: '/bom.txt',
      encoding: 'utf-8',
      text: '\uFEFFhello',
    });
  });

  it('returns raw bytes as base64', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/image.bin', Buffer.from([0x00, 0x01, 0x02, 0xff]));

    await expect(storage.read('/image.bin', 'base64')).resolves.toEqual({
      kind: 'bytes',
      path: '/image.bin',
      size: 4,
      base64: 'AAEC/w==',
    });
  });

  it('fails with DecodeError for bytes that are not valid in the encoding', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/blob.bin', Buffer.from([0xff, 0xfe, 0xfd]));

    const error = await storage.read('/blob.bin').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ message: '/blob.bin cannot be decoded as utf-8' });
  });

  it('rejects an unknown encoding before downloading', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/notes.txt', 'hello');

    await expect(storage.read('/notes.txt', 'klingon')).rejects.toThrow('Unsupported encoding "klingon"');
    expect(drive.requests).toEqual([]);
  });

  it('fails with NotFound for a missing file', async () => {
    const { storage } = setup();

    await expect(storage.read('/missing.txt')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('fails with NotFound when the path is a folder', async () => {
    const { drive, storage } = setup();
    drive.seedFolder('/Shared');

    await expect(storage.read('/Shared')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('SharePointStorage.write', () => {
  it('creates a file and its missing parent folders', async () => {
    const { drive, storage } = setup();

    const entry = await storage.write('/Drafts/2026/new.txt', 'hello', { overwrite: false });

    expect(entry).toMatchObject({ name: 'new.txt', path: '/Drafts/2026/new.txt', isFolder: false, size: 5 });
    expect(drive.contentOf('/Drafts/2026/new.txt')).toBe('hello');
  });

  it('refuses to replace an existing file when overwrite is false', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/notes.txt', 'original');

    const error = await storage.write('/notes.txt', 'changed', { overwrite: false }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AlreadyExistsError);
    expect(error).toMatchObject({ message: '/notes.txt already exists and overwrite is false' });
    expect(drive.contentOf('/notes.txt')).toBe('original');
  });

  it('replaces an existing file when overwrite is true', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/notes.txt', 'original');

    await storage.write('/notes.txt', 'changed', { overwrite: true });

    expect(drive.contentOf('/notes.txt')).toBe('changed');
  });

  it('writes base64 content as bytes', async () => {
    const { drive, storage } = setup();

    await storage.write('/greeting.txt', 'aGVsbG8=', { overwrite: true, encoding: 'base64' });

    expect(drive.contentOf('/greeting.txt')).toBe('hello');
  });

  it('rejects malformed base64 before calling Graph', async () => {
    const { drive, storage } = setup();

    await expect(
      storage.write('/greeting.txt', 'not base64!', { overwrite: true, encoding: 'base64' })
    ).rejects.toThrow('content is not valid base64');
    expect(drive.requests).toEqual([]);
  });

  it('rejects writing to the library root', async () => {
    const { storage } = setup();

    await expect(storage.write('/', 'x', { overwrite: true })).rejects.toBeInstanceOf(InvalidArgumentsError);
  });
});

describe('SharePointStorage.delete and exists', () => {
  it('deletes once, then reports NotFound', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/old.txt', 'bye');

    await storage.delete('/old.txt');

    await expect(storage.exists('/old.txt')).resolves.toBe(false);
    await expect(storage.delete('/old.txt')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reports files and folders as existing', async () => {
    const { drive, storage } = setup();
    drive.seedFile('/Shared/notes.txt', 'hi');

    await expect(storage.exists('/Shared')).resolves.toBe(true);
    await expect(storage.exists('/Shared/notes.txt')).resolves.toBe(true);
    await expect(storage.exists('/Shared/other.txt')).resolves.toBe(false);
  });

  it('surfaces failures other than a missing item', async () => {
    const { drive, storage } = setup();
    await storage.list('/');
    drive.failNext(403, 'accessDenied');

    await expect(storage.exists('/notes.txt')).rejects.toMatchObject({
      kind: 'PermissionDenied',
      message: 'Permission denied (/notes.txt: Injected 403)',
    });
  });
});

describe('SharePointStorage.createFolder', () => {
  it('creates a folder', async () => {
    const { storage } = setup();

    await expect(storage.createFolder('/Projects')).resolves.toMatchObject({
      name: 'Projects',
      path: '/Projects',
      isFolder: true,
    });
  });

  it('fails with AlreadyExists for an existing folder by default', async () => {
    const { storage } = setup();
    await storage.createFolder('/Projects');

    await expect(storage.createFolder('/Projects')).rejects.toMatchObject({
      kind: 'AlreadyExists',
      message: 'Already exists (/Projects: An item with the same name already exists under the parent)',
    });
  });

  it('fails with NotFound when the parent folder is missing', async () => {
    const { storage } = setup();

    await expect(storage.createFolder('/Projects/2026')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('returns the existing folder in idempotent mode', async () => {
    const { storage } = setup({ createFolderIdempotent: true });
    const first = await storage.createFolder('/Projects');

    const second = await storage.createFolder('/Projects');

    expect(second).toEqual(first);
  });

  it('still fails in idempotent mode when a file has the name', async () => {
    const { drive, storage } = setup({ createFolderIdempotent: true });
    drive.seedFile('/Projects', 'not a folder');

    await expect(storage.createFolder('/Projects')).rejects.toThrow('/Projects already exists and is not a folder');
  });
});

describe('SharePointStorage site operations', () => {
  it('returns site metadata', async () => {
    const { storage } = setup();

    await expect(storage.getSiteInfo()).resolves.toEqual({
      id: SITE_ID,
      name: 'team',
      title: 'Team Site',
      webUrl: SITE_URL,
      description: 'Team documents',
    });
  });

  it('reports a successful connection', async () => {
    const { storage } = setup();

    await expect(storage.testConnection()).resolves.toEqual({
      ok: true,
      siteUrl: SITE_URL,
      siteTitle: 'Team Site',
      message: 'Connection successful',
    });
  });

  it('reports a rejected connection instead of throwing', async () => {
    const { drive, storage } = setup();
    drive.failNext(403, 'accessDenied');

    await expect(storage.testConnection()).resolves.toEqual({
      ok: false,
      siteUrl: SITE_URL,
      message: `Permission denied (${SITE_URL}: Injected 403)`,
      errorKind: 'PermissionDenied',
    });
  });

  it('reports missing credentials instead of throwing', async () => {
    const { drive, storage } = setup({
      credentials: {
        getToken: async () => {
          throw new AuthError('Unavailable', 'Unable to acquire an access token. azure-cli: not logged in');
        },
      },
    });

    await expect(storage.testConnection()).resolves.toEqual({
      ok: false,
      siteUrl: SITE_URL,
      message: 'Unable to acquire an access token. azure-cli: not logged in',
      errorKind: 'AuthError',
    });
    expect(drive.requests).toEqual([]);
  });

  it('reports every breaker closed while Graph is healthy', () => {
    const { storage } = setup();

    expect(storage.breakerStates()).toEqual({
      list: 'closed',
      read: 'closed',
      write: 'closed',
      delete: 'closed',
      createFolder: 'closed',
      exists: 'closed',
      siteInfo: 'closed',
    });
  });
});
