/**
 * MCP tool definitions advertised to clients
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const TOOL_NAMES = [
  'list_files',
  'read_file',
  'write_file',
  'delete_file',
  'create_folder',
  'file_exists',
  'test_connection',
  'get_site_info',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const tools: Tool[] = [
  {
    name: 'list_files',
    description: 'List files and folders in a SharePoint folder',
    inputSchema: {
      type: 'object',
      properties: {
        folder_path: {
          type: 'string',
          description: 'Folder path starting with "/" (default: /, the library root)',
          default: '/',
        },
      },
    },
  },
  {
    name: 'read_file',
    description: 'Read a file from SharePoint',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'File path starting with "/"' },
        encoding: {
          type: 'string',
          description: 'Text encoding such as utf-8, utf-16le or latin1, or "base64" for raw bytes (default: utf-8)',
          default: 'utf-8',
        },
      },
      required: ['file_path'],
    },
  },
  {
    name: 'write_file',
    description: 'Write a file to SharePoint, creating missing parent folders',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'File path starting with "/"' },
        content: { type: 'string', description: 'File content' },
        overwrite: {
          type: 'boolean',
          description: 'Whether to overwrite an existing file (default: true)',
          default: true,
        },
        encoding: {
          type: 'string',
          enum: ['utf-8', 'base64'],
          description: 'How content is encoded: utf-8 text or base64 binary (default: utf-8)',
          default: 'utf-8',
        },
      },
      required: ['file_path', 'content'],
    },
  },
  {
    name: 'delete_file',
    description: 'Delete a file or folder from SharePoint',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'Path of the item to delete' },
      },
      required: ['file_path'],
    },
  },
  {
    name: 'create_folder',
    description: 'Create a folder in SharePoint. Fails if the folder already exists.',
    inputSchema: {
      type: 'object',
      properties: {
        folder_path: { type: 'string', description: 'Path of the folder to create' },
      },
      required: ['folder_path'],
    },
  },
  {
    name: 'file_exists',
    description: 'Check if a file or folder exists in SharePoint',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'Path to check' },
      },
      required: ['file_path'],
    },
  },
  {
    name: 'test_connection',
    description: 'Test the connection to the configured SharePoint site',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'get_site_info',
    description: 'Get SharePoint site information',
    inputSchema: { type: 'object', properties: {} },
  },
];
