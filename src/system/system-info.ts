import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { format } from 'date-fns';

export interface SystemInfo {
  platform: string;
  platformRelease: string;
  platformVersion: string;
  architecture: string;
  hostname: string;
  processor: string;
  runtimeVersion: string;
  runtimeName: string;
}

export interface SavedSystemInfo extends SystemInfo {
  timestamp: string;
  scriptPath: string;
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];
const HASH_CHUNK_SIZE = 4096;

export function getSystemInfo(): SystemInfo {
  const [cpu] = os.cpus();
  return {
    platform: os.type(),
    platformRelease: os.release(),
    platformVersion: os.version(),
    architecture: os.machine(),
    hostname: os.hostname(),
    processor: cpu ? cpu.model : '',
    runtimeVersion: process.versions.node,
    runtimeName: process.release.name,
  };
}

/**
 * Local time as `yyyy-MM-dd HH:mm:ss`.
 */
export function formatTimestamp(timestamp: Date = new Date()): string {
  return format(timestamp, 'yyyy-MM-dd HH:mm:ss');
}

export async function calculateFileHash(filePath: string, algorithm = 'md5'): Promise<string> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const hash = crypto.createHash(algorithm);
  const stream = fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export async function saveSystemInfo(filePath = 'system_info.json'): Promise<SavedSystemInfo> {
  const info: SavedSystemInfo = {
    ...getSystemInfo(),
    timestamp: formatTimestamp(),
    scriptPath: fileURLToPath(import.meta.url),
  };

  await fs.promises.writeFile(filePath, JSON.stringify(info, null, 2));
  return info;
}

function versionParts(version: string): number[] {
  return version.replace(/^v/, '').split('.').map((part) => parseInt(part, 10) || 0);
}

/**
 * True when `current` is at least `minVersion`, compared on the components `minVersion` names.
 */
export function validateRuntimeVersion(minVersion = '20', current: string = process.versions.node): boolean {
  const required = versionParts(minVersion);
  const actual = versionParts(current);

  for (let i = 0; i < required.length; i++) {
    const have = actual[i] ?? 0;
    if (have !== required[i]) {
      return have > required[i];
    }
  }
  return true;
}

const SKIPPED_ERROR_CODES = new Set(['ENOENT', 'EACCES']);

// gone since it was listed, or not readable by this process
function isSkippable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && SKIPPED_ERROR_CODES.has(error.code);
}

/**
 * Total size in bytes of the regular files below `directory`. Symlinked directories are not followed,
 * and entries that vanish or cannot be read while walking count as empty.
 */
export async function getDirectorySize(directory: string): Promise<number> {
  let total = 0;
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isSkippable(error)) {
      return 0;
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      total += await getDirectorySize(entryPath);
      continue;
    }
    if (!entry.isFile() && !entry.isSymbolicLink()) {
      continue;
    }

    try {
      const stats = await fs.promises.stat(entryPath);
      if (stats.isFile()) {
        total += stats.size;
      }
    } catch (error) {
      // also covers a dangling link
      if (!isSkippable(error)) {
        throw error;
      }
    }
  }

  return total;
}

export function formatBytes(size: number): string {
  let value = size;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}
