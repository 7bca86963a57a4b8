/**
 * Archive Downloader
 * Fetches http(s) arguments into the working directory before they are
 * classified. Follows redirects and removes partial files on failure.
 */

import * as fs from 'fs';
import * as http from 'http';
import * as https from 'https';
import * as path from 'path';
import { CancelledError, ExtractionError } from '../errors';
import type { Logger } from '../utils/logger';
import { claimName } from '../placement/name-checker';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 10;

export interface FetchOptions {
  logger: Logger;
  signal: AbortSignal;
  /** Timeout in milliseconds per request */
  timeout?: number;
  maxRetries?: number;
}

/** Arguments that name something to download rather than a local path */
export function isRemoteArchive(argument: string): boolean {
  return /^(https?|ftp):\/\//i.test(argument);
}

/** Local file name for a URL: the last segment of its path */
export function localNameForUrl(url: string): string {
  const name = path.posix.basename(decodeURIComponent(new URL(url).pathname));
  return name === '' || name === '/' ? 'download' : name;
}

/** Retry dropped connections, timeouts and 5xx/429 responses */
export function isRetryableError(error: Error): boolean {
  const msg = error.message.toLowerCase();
  if (msg.includes('socket hang up') || msg.includes('econnreset') || msg.includes('timeout')) {
    return true;
  }
  return error.message.includes('HTTP 5') || error.message.includes('HTTP 429');
}

export function downloadFile(
  url: string,
  destPath: string,
  options: FetchOptions,
  redirects = 0
): Promise<void> {
  const timeout = options.timeout ?? 120000;

  return new Promise((resolve, reject) => {
    let settled = false;

    const cleanup = (err: Error): void => {
      if (settled) return;
      settled = true;
      fs.promises.rm(destPath, { force: true }).then(
        () => reject(err),
        () => reject(err)
      );
    };

    const handleResponse = (res: http.IncomingMessage): void => {
      if (res.statusCode !== undefined && REDIRECT_STATUSES.has(res.statusCode)) {
        res.resume();
        const location = res.headers.location;
        if (!location) {
          cleanup(new Error('Redirect without location header'));
          return;
        }
        if (redirects >= MAX_REDIRECTS) {
          cleanup(new Error('Too many redirects'));
          return;
        }
        const next = new URL(location, url).toString();
        options.logger.debug(`following redirect: ${next}`);
        settled = true;
        downloadFile(next, destPath, options, redirects + 1).then(resolve, reject);
        return;
      }

      if (res.statusCode !== 200) {
        res.resume();
        cleanup(new Error(`HTTP ${res.statusCode ?? 0}: ${res.statusMessage ?? ''}`));
        return;
      }

      const fileStream = fs.createWriteStream(destPath);
      res.pipe(fileStream);

      fileStream.on('finish', () => {
        if (settled) return;
        settled = true;
        resolve();
      });
      fileStream.on('error', cleanup);
      res.on('error', cleanup);
    };

    const protocol = url.startsWith('https:') ? https : http;
    // No connection pooling, so the process can exit as soon as we are done
    const req = protocol.get(url, { agent: false, signal: options.signal }, handleResponse);

    req.on('error', cleanup);
    req.setTimeout(timeout, () => {
      req.destroy();
      cleanup(new Error(`Download timeout (${timeout / 1000}s)`));
    });
  });
}

/**
 * Download `url` into `directory` under a collision-free name.
 * Resolves with the local file name (relative to `directory`).
 */
export async function fetchArchive(url: string, directory: string, options: FetchOptions): Promise<string> {
  if (/^ftp:/i.test(url)) {
    throw new ExtractionError('ftp downloads are not supported', 'FILESYSTEM');
  }

  const destPath = await claimName(path.join(directory, localNameForUrl(url)), 'file');
  const maxRetries = options.maxRetries ?? 3;
  options.logger.info(`downloading ${url}`);

  for (let attempt = 1; ; attempt++) {
    try {
      await downloadFile(url, destPath, options);
      return path.basename(destPath);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (options.signal.aborted) {
        await fs.promises.rm(destPath, { force: true });
        throw new CancelledError();
      }
      if (!isRetryableError(err) || attempt >= maxRetries) {
        await fs.promises.rm(destPath, { force: true });
        throw new ExtractionError(`download failed: ${err.message}`, 'FILESYSTEM');
      }
      const delay = Math.pow(2, attempt - 1) * 1000;
      options.logger.debug(`download retry ${attempt}/${maxRetries}: ${err.message}`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
