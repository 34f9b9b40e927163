import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import xxhashFactory, { type XXHashAPI } from 'xxhash-wasm';
import { INDEXING_CONSTANTS } from '../config/constants.js';
import { getErrorMessage } from '../utils/error-utils.js';

let hasherPromise: Promise<XXHashAPI['h64ToString']> | null = null;

async function getHasher(): Promise<XXHashAPI['h64ToString']> {
  if (!hasherPromise) {
    hasherPromise = xxhashFactory().then(factory => (input: string) => factory.h64ToString(input));
  }
  return hasherPromise;
}

/**
 * Content fingerprint stored as `file_hash`. Equal text gives an equal fingerprint.
 */
export async function computeFingerprint(input: string | Buffer): Promise<string> {
  const hasher = await getHasher();
  const normalized = typeof input === 'string' ? input : input.toString('utf8');
  return hasher(normalized).padStart(INDEXING_CONSTANTS.FINGERPRINT_LENGTH, '0');
}

function md5Prefix(value: string): string {
  return crypto.createHash('md5').update(value).digest('hex').slice(0, INDEXING_CONSTANTS.DIGEST_LENGTH);
}

/**
 * `<digest(relativePath)>_<ordinal>`
 */
export function chunkId(relativePath: string, ordinal: number): string {
  return `${md5Prefix(relativePath)}_${ordinal}`;
}

/**
 * One collection per project: sanitized directory name plus a digest of the absolute path
 */
export function collectionName(projectPath: string): string {
  const absolute = path.resolve(projectPath);
  const base = path
    .basename(absolute)
    .replace(/\s+/g, '_')
    .slice(0, INDEXING_CONSTANTS.COLLECTION_BASENAME_LENGTH);
  return `${base}_${md5Prefix(absolute)}`;
}

export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

function escapesBase(relative: string): boolean {
  return relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}

export type PathSafety =
  | { safe: true; normalized: string }
  | { safe: false; reason: string };

export function validatePathSafety(basePath: string, targetPath: string): PathSafety {
  let absBase: string;
  try {
    absBase = fs.realpathSync(basePath);
  } catch (error) {
    return { safe: false, reason: getErrorMessage(error) };
  }

  const absTarget = path.resolve(absBase, path.isAbsolute(targetPath) ? resolveThroughBase(basePath, absBase, targetPath) : targetPath);
  const relative = path.relative(absBase, absTarget);

  if (relative === '') {
    return { safe: true, normalized: '' };
  }
  if (escapesBase(relative)) {
    return { safe: false, reason: 'path_outside_base' };
  }

  let realTarget: string;
  try {
    realTarget = fs.realpathSync(absTarget);
  } catch {
    // Target may not exist any more (deleted files); keep the lexical path
    return { safe: true, normalized: toPosixPath(relative) };
  }

  const realRelative = path.relative(absBase, realTarget);
  if (escapesBase(realRelative)) {
    return { safe: false, reason: 'symlink_escape' };
  }
  return { safe: true, normalized: toPosixPath(realRelative) };
}

/**
 * Absolute paths given against a symlinked project root are rebased onto its real path
 */
function resolveThroughBase(basePath: string, absBase: string, targetPath: string): string {
  const lexicalBase = path.resolve(basePath);
  const relative = path.relative(lexicalBase, targetPath);
  if (lexicalBase !== absBase && !escapesBase(relative)) {
    return path.join(absBase, relative);
  }
  return targetPath;
}

/**
 * Project-relative POSIX path, or null when the path lies outside the project
 */
export function normalizeToProjectPath(basePath: string, filePath: string): string | null {
  if (filePath.length === 0) {
    return null;
  }
  const result = validatePathSafety(basePath, filePath);
  return result.safe && result.normalized !== '' ? result.normalized : null;
}
