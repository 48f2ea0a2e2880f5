/**
 * Upload checks and storage naming for source documents
 */

import { extname } from 'path';
import { v4 as uuidv4 } from 'uuid';

export const ALLOWED_EXTENSIONS: readonly string[] = ['.pdf', '.docx', '.doc'];
export const DEFAULT_MAX_FILE_SIZE_MB = 50;
export const DEFAULT_STORAGE_PREFIX = 'memoires';

export interface FileCheck {
  valid: boolean;
  error: string | null;
}

export function getFileExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

export function validateFileType(filename: string): FileCheck {
  const ext = getFileExtension(filename);

  if (!ext) {
    return { valid: false, error: 'File has no extension' };
  }

  if (!ALLOWED_EXTENSIONS.includes(ext)) {
    return {
      valid: false,
      error: `Unsupported file type '${ext}'. Only ${ALLOWED_EXTENSIONS.join(', ')} are allowed.`,
    };
  }

  return { valid: true, error: null };
}

export function validateFileSize(
  sizeBytes: number,
  maxSizeMb: number = DEFAULT_MAX_FILE_SIZE_MB,
): FileCheck {
  if (sizeBytes > maxSizeMb * 1024 * 1024) {
    const sizeMb = round2(sizeBytes / (1024 * 1024));
    return {
      valid: false,
      error: `File size (${sizeMb}MB) exceeds maximum allowed size of ${maxSizeMb}MB`,
    };
  }

  if (sizeBytes === 0) {
    return { valid: false, error: 'File is empty' };
  }

  return { valid: true, error: null };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * ASCII-only name with a local-time suffix, e.g.
 * "Mémoire Lyon (v2).PDF" → "Memoire_Lyon_v2_20240115_093000.pdf"
 */
export function generateSafeFilename(
  originalFilename: string,
  now: Date = new Date(),
  preserveExtension = true,
): string {
  const ext = extname(originalFilename);
  const name = originalFilename.slice(0, originalFilename.length - ext.length);

  let safeName = name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-zA-Z0-9_-]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (!safeName) {
    safeName = `file_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
  }

  safeName = `${safeName}_${formatTimestamp(now)}`;

  return preserveExtension ? `${safeName}${ext.toLowerCase()}` : safeName;
}

export function generateStoragePath(
  filename: string,
  prefix: string = DEFAULT_STORAGE_PREFIX,
  now: Date = new Date(),
): string {
  return `${prefix}/${generateSafeFilename(filename, now)}`;
}

export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes < 1024) {
    return `${sizeBytes} B`;
  }
  if (sizeBytes < 1024 * 1024) {
    return `${round2(sizeBytes / 1024)} KB`;
  }
  return `${round2(sizeBytes / (1024 * 1024))} MB`;
}

/**
 * First 4-digit year between 1900 and 2099 not glued to other digits
 */
export function extractYearFromFilename(filename: string): number | null {
  const match = filename.match(/(?<!\d)(19\d{2}|20\d{2})(?!\d)/);
  return match ? Number(match[1]) : null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
