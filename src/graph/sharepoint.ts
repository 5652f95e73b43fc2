/**
 * SharePoint document library operations over Microsoft Graph
 * Resolves the site and its document library once, then addresses items by path
 */

import { ResponseType, type Client } from '@microsoft/microsoft-graph-client';
import { z } from 'zod';
import {
  AlreadyExistsError,
  DecodeError,
  InvalidArgumentsError,
  NotFoundError,
  TransportError,
  type ErrorKind,
} from '../errors.js';
import { silentLogger, type Logger } from '../observability/logger.js';
import { createCircuitBreaker, circuitBreakerState } from './circuitBreaker.js';
import { createGraphClient, type GraphClientFactory } from './client.js';
import { graphStatus, toStorageError } from './errors.js';
import {
  childrenUrl,
  contentUrl,
  formatPath,
  itemUrl,
  parseItemPath,
  parsePath,
  siteLookupUrl,
} from './paths.js';

const DriveItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.number().optional(),
  lastModifiedDateTime: z.string().optional(),
  createdDateTime: z.string().optional(),
  file: z.object({ mimeType: z.string().optional() }).optional(),
  folder: z.object({ childCount: z.number().optional() }).optional(),
});

const DriveItemPageSchema = z.object({
  value: z.array(DriveItemSchema),
  '@odata.nextLink': z.string().optional(),
});

const SiteSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  displayName: z.string().optional(),
  webUrl: z.string().optional(),
  description: z.string().optional(),
});

const DrivesSchema = z.object({
  value: z.array(z.object({ id: z.string(), name: z.string().optional() })),
});

type DriveItem = z.infer<typeof DriveItemSchema>;

export interface FileEntry {
  name: string;
  path: string;
  isFolder: boolean;
  size: number;
  modified: string | null;
  created: string | null;
  id: string;
  mimeType?: string;
}

export type FileContent =
  | { kind: 'text'; path: string; encoding: string; text: string }
  | { kind: 'bytes'; path: string; size: number; base64: string };

export type ContentEncoding = 'utf-8' | 'base64';

export interface WriteOptions {
  overwrite: boolean;
  /** How `content` is encoded: text stored as UTF-8, or base64 for binary files. */
  encoding?: ContentEncoding;
}

export interface SiteInfo {
  id: string;
  name: string;
  title: string;
  webUrl: string;
  description: string;
}

export interface ConnectionStatus {
  ok: boolean;
  siteUrl: string;
  siteTitle?: string;
  message: string;
  errorKind?: ErrorKind;
}

/** Anything that can hand out a Graph bearer token, normally the CredentialResolver. */
export interface TokenSource {
  getToken(): Promise<string>;
}

export interface SharePointStorageOptions {
  siteUrl: string;
  credentials: TokenSource;
  /** Document library to use. Defaults to the site's first library. */
  driveName?: string;
  /** Report success when create_folder finds the folder already there. */
  createFolderIdempotent?: boolean;
  createClient?: GraphClientFactory;
  logger?: Logger;
}

interface Location {
  client: Client;
  driveId: string;
}

function toFileEntry(item: DriveItem, parent: readonly string[]): FileEntry {
  const entry: FileEntry = {
    name: item.name,
    path: formatPath([...parent, item.name]),
    isFolder: item.folder !== undefined,
    size: item.size ?? 0,
    modified: item.lastModifiedDateTime ?? null,
    created: item.createdDateTime ?? null,
    id: item.id,
  };
  if (item.file?.mimeType) entry.mimeType = item.file.mimeType;
  return entry;
}

function toBytes(body: unknown): Buffer {
  if (body instanceof ArrayBuffer) return Buffer.from(body);
  if (ArrayBuffer.isView(body)) return Buffer.from(body.buffer, body.byteOffset, body.byteLength);
  if (typeof body === 'string') return Buffer.from(body, 'utf-8');
  if (body === undefined || body === null) return Buffer.alloc(0);
  throw new TransportError('Unexpected content response from Graph');
}

function createDecoder(encoding: string): InstanceType<typeof TextDecoder> {
  try {
    return new TextDecoder(encoding, { fatal: true, ignoreBOM: true });
  } catch {
    throw new InvalidArgumentsError(`Unsupported encoding "${encoding}"`);
  }
}

function encodeContent(content: string, encoding: ContentEncoding): Buffer {
  if (encoding === 'utf-8') return Buffer.from(content, 'utf-8');

  const compact = content.replace(/\s+/g, '');
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(compact) || compact.length % 4 === 1) {
    throw new InvalidArgumentsError('content is not valid base64');
  }
  return Buffer.from(compact, 'base64');
}

export class SharePointStorage {
  private readonly siteUrl: string;
  private readonly credentials: TokenSource;
  private readonly driveName?: string;
  private readonly createFolderIdempotent: boolean;
  private readonly createClient: GraphClientFactory;
  private readonly logger: Logger;

  private siteId: Promise<string> | null = null;
  private driveId: Promise<string> | null = null;

  private readonly breakers;

  constructor(options: SharePointStorageOptions) {
    this.siteUrl = options.siteUrl;
    this.credentials = options.credentials;
    this.driveName = options.driveName;
    this.createFolderIdempotent = options.createFolderIdempotent ?? false;
    this.createClient = options.createClient ?? createGraphClient;
    this.logger = options.logger ?? silentLogger;

    this.breakers = {
      list: createCircuitBreaker('list', (segments: string[]) => this.listItems(segments), this.logger),
      read: createCircuitBreaker('read', (segments: string[]) => this.downloadItem(segments), this.logger),
      write: createCircuitBreaker(
        'write',
        (segments: string[], body: Buffer, overwrite: boolean) => this.uploadItem(segments, body, overwrite),
        this.logger
      ),
      delete: createCircuitBreaker('delete', (segments: string[]) => this.deleteItem(segments), this.logger),
      createFolder: createCircuitBreaker(
        'createFolder',
        (segments: string[]) => this.createFolderItem(segments),
        this.logger
      ),
      exists: createCircuitBreaker('exists', (segments: string[]) => this.itemExists(segments), this.logger),
      siteInfo: createCircuitBreaker('siteInfo', () => this.fetchSiteInfo(), this.logger),
    };
  }

  /**
   * Lists the files and folders directly inside a folder
   */
  async list(folderPath = '/'): Promise<FileEntry[]> {
    const segments = parsePath(folderPath, 'folder_path');
    try {
      return await this.breakers.list.fire(segments);
    } catch (err) {
      throw toStorageError(err, formatPath(segments));
    }
  }

  /**
   * Reads a file, decoded with a WHATWG encoding label or returned as base64 bytes
   */
  async read(filePath: string, encoding = 'utf-8'): Promise<FileContent> {
    const segments = parseItemPath(filePath);
    const path = formatPath(segments);
    const decoder = encoding.toLowerCase() === 'base64' ? null : createDecoder(encoding);

    let bytes: Buffer;
    try {
      bytes = await this.breakers.read.fire(segments);
    } catch (err) {
      throw toStorageError(err, path);
    }

    if (!decoder) {
      return { kind: 'bytes', path, size: bytes.length, base64: bytes.toString('base64') };
    }

    try {
      return { kind: 'text', path, encoding: decoder.encoding, text: decoder.decode(bytes) };
    } catch {
      throw new DecodeError(`${path} cannot be decoded as ${decoder.encoding}`);
    }
  }

  /**
   * Uploads a file. With overwrite=false an existing item is left untouched
   * and AlreadyExists is raised.
   */
  async write(filePath: string, content: string, options: WriteOptions): Promise<FileEntry> {
    const segments = parseItemPath(filePath);
    const body = encodeContent(content, options.encoding ?? 'utf-8');
    try {
      return await this.breakers.write.fire(segments, body, options.overwrite);
    } catch (err) {
      throw toStorageError(err, formatPath(segments));
    }
  }

  /**
   * Deletes a file or folder. Deleting a missing item fails with NotFound.
   */
  async delete(filePath: string): Promise<void> {
    const segments = parseItemPath(filePath);
    try {
      await this.breakers.delete.fire(segments);
    } catch (err) {
      throw toStorageError(err, formatPath(segments));
    }
  }

  async createFolder(folderPath: string): Promise<FileEntry> {
    const segments = parseItemPath(folderPath, 'folder_path');
    try {
      return await this.breakers.createFolder.fire(segments);
    } catch (err) {
      throw toStorageError(err, formatPath(segments));
    }
  }

  /**
   * True when an item exists at the path. A missing item is `false`, never an error.
   */
  async exists(filePath: string): Promise<boolean> {
    const segments = parseItemPath(filePath);
    try {
      return await this.breakers.exists.fire(segments);
    } catch (err) {
      throw toStorageError(err, formatPath(segments));
    }
  }

  async getSiteInfo(): Promise<SiteInfo> {
    try {
      return await this.breakers.siteInfo.fire();
    } catch (err) {
      throw toStorageError(err, this.siteUrl);
    }
  }

  /**
   * Fetches site metadata and reports the outcome instead of throwing
   */
  async testConnection(): Promise<ConnectionStatus> {
    try {
      const site = await this.getSiteInfo();
      return { ok: true, siteUrl: this.siteUrl, siteTitle: site.title, message: 'Connection successful' };
    } catch (err) {
      const error = toStorageError(err);
      this.logger.warn({ kind: error.kind, err: error.message }, '[SharePoint] Connection test failed');
      return { ok: false, siteUrl: this.siteUrl, message: error.message, errorKind: error.kind };
    }
  }

  breakerStates(): Record<string, 'open' | 'half-open' | 'closed'> {
    return Object.fromEntries(
      Object.entries(this.breakers).map(([name, breaker]) => [name, circuitBreakerState(breaker)])
    );
  }

  private async client(): Promise<Client> {
    const token = await this.credentials.getToken();
    return this.createClient(token);
  }

  /**
   * Site and drive ids are looked up once; a failed lookup is retried on the next call
   */
  private async locate(): Promise<Location> {
    const client = await this.client();

    if (!this.driveId) {
      this.driveId = this.lookupDrive(client).catch((err: unknown) => {
        this.driveId = null;
        throw err;
      });
    }

    return { client, driveId: await this.driveId };
  }

  private lookupSite(client: Client): Promise<string> {
    if (!this.siteId) {
      this.siteId = client
        .api(siteLookupUrl(this.siteUrl))
        .get()
        .then((body: unknown) => SiteSchema.parse(body).id)
        .catch((err: unknown) => {
          this.siteId = null;
          throw err;
        });
    }
    return this.siteId;
  }

  private async lookupDrive(client: Client): Promise<string> {
    const siteId = await this.lookupSite(client);
    const drives = DrivesSchema.parse(await client.api(`/sites/${encodeURIComponent(siteId)}/drives`).get());

    const drive = this.driveName
      ? drives.value.find((candidate) => candidate.name?.toLowerCase() === this.driveName?.toLowerCase())
      : drives.value[0];

    if (!drive) {
      throw new NotFoundError(
        this.driveName
          ? `Document library "${this.driveName}" not found on ${this.siteUrl}`
          : `No document libraries found on ${this.siteUrl}`
      );
    }

    this.logger.debug({ siteId, driveId: drive.id, driveName: drive.name }, '[SharePoint] Resolved document library');
    return drive.id;
  }

  private async listItems(segments: string[]): Promise<FileEntry[]> {
    const { client, driveId } = await this.locate();
    const entries: FileEntry[] = [];

    let next: string | undefined = childrenUrl(driveId, segments);
    while (next) {
      const page = DriveItemPageSchema.parse(await client.api(next).get());
      entries.push(...page.value.map((item) => toFileEntry(item, segments)));
      next = page['@odata.nextLink'];
    }

    return entries;
  }

  private async downloadItem(segments: string[]): Promise<Buffer> {
    const { client, driveId } = await this.locate();
    const body: unknown = await client.api(contentUrl(driveId, segments)).responseType(ResponseType.ARRAYBUFFER).get();
    return toBytes(body);
  }

  private async uploadItem(segments: string[], body: Buffer, overwrite: boolean): Promise<FileEntry> {
    const { client, driveId } = await this.locate();

    // Check-then-act: a concurrent writer can still slip in between the two calls.
    if (!overwrite && (await this.hasItem(client, driveId, segments))) {
      throw new AlreadyExistsError(`${formatPath(segments)} already exists and overwrite is false`);
    }

    const item = DriveItemSchema.parse(
      await client.api(contentUrl(driveId, segments)).header('Content-Type', 'application/octet-stream').put(body)
    );
    return toFileEntry(item, segments.slice(0, -1));
  }

  private async deleteItem(segments: string[]): Promise<void> {
    const { client, driveId } = await this.locate();
    await client.api(itemUrl(driveId, segments)).delete();
  }

  private async createFolderItem(segments: string[]): Promise<FileEntry> {
    const { client, driveId } = await this.locate();
    const parent = segments.slice(0, -1);
    const name = segments[segments.length - 1];

    try {
      const created = await client.api(childrenUrl(driveId, parent)).post({
        name,
        folder: {},
        '@microsoft.graph.conflictBehavior': 'fail',
      });
      return toFileEntry(DriveItemSchema.parse(created), parent);
    } catch (err) {
      if (graphStatus(err) !== 409 || !this.createFolderIdempotent) throw err;

      const existing = DriveItemSchema.parse(await client.api(itemUrl(driveId, segments)).get());
      if (existing.folder === undefined) {
        throw new AlreadyExistsError(`${formatPath(segments)} already exists and is not a folder`);
      }
      this.logger.debug({ path: formatPath(segments) }, '[SharePoint] Folder already exists');
      return toFileEntry(existing, parent);
    }
  }

  private async itemExists(segments: string[]): Promise<boolean> {
    const { client, driveId } = await this.locate();
    return this.hasItem(client, driveId, segments);
  }

  private async hasItem(client: Client, driveId: string, segments: readonly string[]): Promise<boolean> {
    try {
      await client.api(itemUrl(driveId, segments)).get();
      return true;
    } catch (err) {
      if (graphStatus(err) === 404) return false;
      throw err;
    }
  }

  private async fetchSiteInfo(): Promise<SiteInfo> {
    const client = await this.client();
    const site = SiteSchema.parse(await client.api(siteLookupUrl(this.siteUrl)).get());
    return {
      id: site.id,
      name: site.name ?? '',
      title: site.displayName ?? site.name ?? '',
      webUrl: site.webUrl ?? this.siteUrl,
      description: site.description ?? '',
    };
  }
}
