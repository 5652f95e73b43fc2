/**
 * Text rendering of tool results for MCP clients
 */

import type { ToolFailure, ToolPayload } from './dispatcher.js';

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function renderPayload(payload: ToolPayload): string {
  switch (payload.kind) {
    case 'listing':
      return json({ folder_path: payload.folderPath, count: payload.entries.length, items: payload.entries });
    case 'content':
      // Decoded text goes out verbatim; binary content as base64.
      if (payload.content.kind === 'text') return payload.content.text;
      return json({
        path: payload.content.path,
        encoding: 'base64',
        size: payload.content.size,
        content: payload.content.base64,
      });
    case 'written':
      return json({ success: true, item: payload.entry });
    case 'deleted':
      return json({ success: true, message: `File '${payload.path}' deleted` });
    case 'folder':
      return json({ success: true, item: payload.entry });
    case 'exists':
      return json({ exists: payload.exists, file_path: payload.path });
    case 'connection':
      return json({
        connected: payload.status.ok,
        site_url: payload.status.siteUrl,
        site_title: payload.status.siteTitle,
        message: payload.status.message,
        error_kind: payload.status.errorKind,
      });
    case 'site':
      return json(payload.site);
  }
}

export function renderFailure(error: ToolFailure): string {
  return json({ error });
}
