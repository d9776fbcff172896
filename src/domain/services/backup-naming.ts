import * as path from 'path';
import { formatInTimeZone } from 'date-fns-tz';
import { TimeWindowVO } from '../value-objects/time-window.vo';

export const DEFAULT_ARTIFACT_EXTENSION = '.mp4';
export const PARTIAL_FILE_MARKER = '.partial-';

const STAMP_FORMAT = 'yyyyMMdd-HHmmss';

/**
 * Deterministic backup file name for one camera and window, e.g.
 * `front_door_20251115-000000_20251115-040000.mp4`.
 *
 * The name encodes the full identity of an export, so a rerun of the same
 * job always lands on the same destination.
 */
export function backupFileName(
  camera: string,
  window: TimeWindowVO,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): string {
  const start = formatInTimeZone(window.start, window.timezone, STAMP_FORMAT);
  const end = formatInTimeZone(window.end, window.timezone, STAMP_FORMAT);
  return `${encodeCameraName(camera)}_${start}_${end}${normalizeExtension(extension)}`;
}

export function artifactExtension(artifactPath: string): string {
  return normalizeExtension(path.extname(artifactPath));
}

/**
 * File-safe form of a camera name. Every character outside `[A-Za-z0-9_-]`
 * is percent-escaped as UTF-8, so distinct cameras never share a name.
 */
export function encodeCameraName(camera: string): string {
  return camera.replace(/[^A-Za-z0-9_-]/gu, percentEscape);
}

/**
 * Temp file used while a backup is being written; lives next to its final name.
 */
export function partialFileName(finalName: string, suffix: string): string {
  return `.${finalName}${PARTIAL_FILE_MARKER}${suffix}`;
}

export function isPartialFileName(name: string): boolean {
  return name.startsWith('.') && name.includes(PARTIAL_FILE_MARKER);
}

function percentEscape(char: string): string {
  return Array.from(Buffer.from(char, 'utf8'))
    .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`)
    .join('');
}

function normalizeExtension(extension: string): string {
  if (!extension) {
    return DEFAULT_ARTIFACT_EXTENSION;
  }
  const withDot = extension.startsWith('.') ? extension : `.${extension}`;
  return withDot.toLowerCase();
}
