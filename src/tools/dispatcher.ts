/**
 * Tool dispatcher: validates tool arguments and routes each call to the storage adapter.
 * dispatch() always resolves; every failure becomes a typed ToolResult.
 */

import { z } from 'zod';
import {
  AuthError,
  InvalidArgumentsError,
  SharePointError,
  errorMessage,
  redact,
  type AuthErrorReason,
  type ErrorKind,
} from '../errors.js';
import type {
  ConnectionStatus,
  FileContent,
  FileEntry,
  SharePointStorage,
  SiteInfo,
} from '../graph/sharepoint.js';
import { silentLogger, type Logger } from '../observability/logger.js';
import { toolDurationHistogram, toolInvocationsCounter } from '../observability/tracing.js';
import type { ToolName } from './definitions.js';

export type FileStorage = Pick<
  SharePointStorage,
  'list' | 'read' | 'write' | 'delete' | 'createFolder' | 'exists' | 'testConnection' | 'getSiteInfo'
>;

export interface ToolRequest {
  name: string;
  arguments?: Record<string, unknown>;
}

export type ToolPayload =
  | { kind: 'listing'; folderPath: string; entries: FileEntry[] }
  | { kind: 'content'; content: FileContent }
  | { kind: 'written'; entry: FileEntry }
  | { kind: 'deleted'; path: string }
  | { kind: 'folder'; entry: FileEntry }
  | { kind: 'exists'; path: string; exists: boolean }
  | { kind: 'connection'; status: ConnectionStatus }
  | { kind: 'site'; site: SiteInfo };

export interface ToolFailure {
  kind: ErrorKind;
  reason?: AuthErrorReason;
  message: string;
}

export type ToolResult = { ok: true; payload: ToolPayload } | { ok: false; error: ToolFailure };

type ToolHandler = (args: Record<string, unknown>, storage: FileStorage) => Promise<ToolPayload>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join('.');
      if (issue.code === 'invalid_type' && issue.received === 'undefined') {
        return `missing required argument "${field}"`;
      }
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function defineTool<S extends z.ZodTypeAny>(
  schema: S,
  run: (args: z.infer<S>, storage: FileStorage) => Promise<ToolPayload>
): ToolHandler {
  return async (args, storage) => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      throw new InvalidArgumentsError(`Invalid arguments: ${describeIssues(parsed.error)}`);
    }
    return run(parsed.data, storage);
  };
}

const handlers: Record<ToolName, ToolHandler> = {
  list_files: defineTool(z.object({ folder_path: z.string().default('/') }), async (args, storage) => ({
    kind: 'listing',
    folderPath: args.folder_path,
    entries: await storage.list(args.folder_path),
  })),

  read_file: defineTool(
    z.object({ file_path: z.string(), encoding: z.string().min(1).default('utf-8') }),
    async (args, storage) => ({
      kind: 'content',
      content: await storage.read(args.file_path, args.encoding),
    })
  ),

  write_file: defineTool(
    z.object({
      file_path: z.string(),
      content: z.string(),
      overwrite: z.boolean().default(true),
      encoding: z.enum(['utf-8', 'base64']).default('utf-8'),
    }),
    async (args, storage) => ({
      kind: 'written',
      entry: await storage.write(args.file_path, args.content, {
        overwrite: args.overwrite,
        encoding: args.encoding,
      }),
    })
  ),

  delete_file: defineTool(z.object({ file_path: z.string() }), async (args, storage) => {
    await storage.delete(args.file_path);
    return { kind: 'deleted', path: args.file_path };
  }),

  create_folder: defineTool(z.object({ folder_path: z.string() }), async (args, storage) => ({
    kind: 'folder',
    entry: await storage.createFolder(args.folder_path),
  })),

  file_exists: defineTool(z.object({ file_path: z.string() }), async (args, storage) => ({
    kind: 'exists',
    path: args.file_path,
    exists: await storage.exists(args.file_path),
  })),

  test_connection: defineTool(z.object({}), async (_args, storage) => ({
    kind: 'connection',
    status: await storage.testConnection(),
  })),

  get_site_info: defineTool(z.object({}), async (_args, storage) => ({
    kind: 'site',
    site: await storage.getSiteInfo(),
  })),
};

const registry = new Map<string, ToolHandler>(Object.entries(handlers));

export interface ToolDispatcherOptions {
  logger?: Logger;
  /** Values scrubbed from failure messages. */
  secrets?: readonly string[];
}

export class ToolDispatcher {
  private readonly logger: Logger;
  private readonly secrets: readonly string[];

  constructor(
    private readonly storage: FileStorage,
    options: ToolDispatcherOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.secrets = options.secrets ?? [];
  }

  async dispatch(request: ToolRequest): Promise<ToolResult> {
    const startTime = Date.now();
    const args = request.arguments ?? {};
    const handler = registry.get(request.name);

    let result: ToolResult;
    try {
      if (!handler) {
        throw new InvalidArgumentsError(`Unknown tool: ${request.name}`);
      }
      result = { ok: true, payload: await handler(args, this.storage) };
    } catch (err) {
      result = { ok: false, error: this.toFailure(err) };
    }

    const durationMs = Date.now() - startTime;
    const outcome = result.ok ? 'success' : result.error.kind;
    const tool = handler ? request.name : 'unknown';

    toolInvocationsCounter.add(1, { tool, outcome });
    toolDurationHistogram.record(durationMs / 1000, { tool });

    const context = { tool: request.name, args: Object.keys(args), outcome, durationMs };
    if (result.ok) {
      this.logger.info(context, 'Tool call completed');
    } else {
      this.logger.warn({ ...context, err: result.error.message }, 'Tool call failed');
    }

    return result;
  }

  private toFailure(err: unknown): ToolFailure {
    if (err instanceof SharePointError) {
      const failure: ToolFailure = { kind: err.kind, message: redact(err.message, this.secrets) };
      if (err instanceof AuthError) failure.reason = err.reason;
      return failure;
    }

    // Uncategorized collaborator failures surface as transport errors, message kept.
    return { kind: 'TransportError', message: redact(errorMessage(err), this.secrets) };
  }
}
