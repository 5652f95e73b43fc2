/**
 * Slash-rooted SharePoint paths and the Graph drive URLs they map to
 */

import { InvalidArgumentsError } from '../errors.js';

/**
 * Splits a slash-rooted path into segments, dropping duplicate and trailing slashes.
 */
export function parsePath(path: string, label = 'path'): string[] {
  if (!path.startsWith('/')) {
    throw new InvalidArgumentsError(`${label} must start with "/", got "${path}"`);
  }

  const segments = path.split('/').filter((segment) => segment.length > 0);
  if (segments.some((segment) => segment === '.' || segment === '..')) {
    throw new InvalidArgumentsError(`${label} must not contain "." or ".." segments, got "${path}"`);
  }

  return segments;
}

/**
 * Like parsePath, but the root folder is rejected: the path must name an item
 */
export function parseItemPath(path: string, label = 'file_path'): string[] {
  const segments = parsePath(path, label);
  if (segments.length === 0) {
    throw new InvalidArgumentsError(`${label} must name a file or folder, not the library root`);
  }
  return segments;
}

export function formatPath(segments: readonly string[]): string {
  return `/${segments.join('/')}`;
}

function encodeSegments(segments: readonly string[]): string {
  return segments.map(encodeURIComponent).join('/');
}

function driveRoot(driveId: string): string {
  return `/drives/${encodeURIComponent(driveId)}/root`;
}

/** The drive item itself */
export function itemUrl(driveId: string, segments: readonly string[]): string {
  return segments.length === 0 ? driveRoot(driveId) : `${driveRoot(driveId)}:/${encodeSegments(segments)}`;
}

/** The children collection of a folder */
export function childrenUrl(driveId: string, segments: readonly string[]): string {
  return segments.length === 0
    ? `${driveRoot(driveId)}/children`
    : `${driveRoot(driveId)}:/${encodeSegments(segments)}:/children`;
}

/** The raw content of a file */
export function contentUrl(driveId: string, segments: readonly string[]): string {
  return `${driveRoot(driveId)}:/${encodeSegments(segments)}:/content`;
}

/**
 * Graph site lookup path for a SharePoint site URL, e.g.
 * https://contoso.sharepoint.com/sites/team -> /sites/contoso.sharepoint.com:/sites/team
 */
export function siteLookupUrl(siteUrl: string): string {
  const url = new URL(siteUrl);
  const segments = url.pathname.split('/').filter((segment) => segment.length > 0);

  if (segments.length === 0) {
    return `/sites/${url.hostname}`;
  }

  const serverRelative = segments.map((segment) => encodeURIComponent(decodeURIComponent(segment))).join('/');
  return `/sites/${url.hostname}:/${serverRelative}`;
}
