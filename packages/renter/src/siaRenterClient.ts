/**
 * Sia Renter Client
 * 
 * Remote store implementation backed by the HTTP API of a Sia renter node.
 * Thin wrapper around undici; responses are validated before use.
 * 
 * Endpoints used:
 * - POST /renter/upload/<path>   upload a local file with erasure coding params
 * - POST /renter/delete/<path>   delete a file
 * - POST /renter/rename/<path>   rename a file or directory
 * - GET  /renter/files           list every file known to the renter
 * - GET  /renter/file/<path>     file metadata (existence check)
 * - GET  /renter/dir/<path>      directory tree with redundancy aggregates
 * - GET  /daemon/version         reachability check
 */

import { request, type Dispatcher } from 'undici';
import type { z } from 'zod';
import {
  RemoteError,
  type DirectoryHealth,
  type RedundancyConfig,
  type RemoteCallOptions,
  type RemoteFile,
  type RemoteStore,
} from '@tiersync/core';
import { encodeRemotePath, isBelowRemotePath, normalizeRemotePath } from './remotePath.js';
import {
  apiErrorSchema,
  daemonVersionSchema,
  renterDirSchema,
  renterFilesSchema,
} from './schemas.js';

export interface SiaRenterConfig {
  // host:port or a full URL
  address: string;
  password?: string;
  agent?: string;
  timeoutMs?: number;
  // Custom undici dispatcher (connection pool, proxy, mock agent)
  dispatcher?: Dispatcher;
}

const NO_FILE_KNOWN = 'no file known';

type HttpMethod = 'GET' | 'POST';

export class SiaRenterClient implements RemoteStore {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(config: SiaRenterConfig) {
    const address = /^https?:\/\//i.test(config.address) ? config.address : `http://${config.address}`;
    this.baseUrl = address.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.dispatcher = config.dispatcher;

    this.headers = {
      'user-agent': config.agent ?? 'Sia-Agent',
    };
    if (config.password) {
      // The renter API uses basic auth with an empty user name
      this.headers['authorization'] = `Basic ${Buffer.from(`:${config.password}`).toString('base64')}`;
    }
  }

  async uploadFile(
    localAbsPath: string,
    remotePath: string,
    redundancy: RedundancyConfig,
    options?: RemoteCallOptions
  ): Promise<void> {
    await this.send('POST', `/renter/upload/${encodeRemotePath(remotePath)}`, options, {
      source: localAbsPath,
      datapieces: String(redundancy.dataPieces),
      paritypieces: String(redundancy.parityPieces),
    });
  }

  async deleteFile(remotePath: string, options?: RemoteCallOptions): Promise<void> {
    await this.send('POST', `/renter/delete/${encodeRemotePath(remotePath)}`, options);
  }

  async listFiles(prefixes: readonly string[], options?: RemoteCallOptions): Promise<RemoteFile[]> {
    const data = await this.get('/renter/files?cached=true', renterFilesSchema, options);
    const roots = prefixes.map(normalizeRemotePath);

    return data.files
      .filter(file => roots.some(root => file.siapath !== root && isBelowRemotePath(file.siapath, root)))
      .map(file => ({ remotePath: file.siapath, size: file.filesize }));
  }

  async getDirectoryHealth(remotePath: string, options?: RemoteCallOptions): Promise<DirectoryHealth> {
    const data = await this.get(`/renter/dir/${encodeRemotePath(remotePath)}`, renterDirSchema, options);

    return {
      children: data.directories.map(dir => ({
        remotePath: dir.siapath,
        aggregateMinRedundancy: dir.aggregateminredundancy,
      })),
    };
  }

  async renamePath(oldRemotePath: string, newRemotePath: string, options?: RemoteCallOptions): Promise<void> {
    await this.send('POST', `/renter/rename/${encodeRemotePath(oldRemotePath)}`, options, {
      newsiapath: normalizeRemotePath(newRemotePath),
    });
  }

  async fileExists(remotePath: string, options?: RemoteCallOptions): Promise<boolean> {
    try {
      await this.send('GET', `/renter/file/${encodeRemotePath(remotePath)}`, options);
      return true;
    } catch (error) {
      if (error instanceof RemoteError && (error.statusCode === 404 || error.message.includes(NO_FILE_KNOWN))) {
        return false;
      }
      throw error;
    }
  }

  async ping(options?: RemoteCallOptions): Promise<string> {
    const data = await this.get('/daemon/version', daemonVersionSchema, options);
    return data.version;
  }

  private async get<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: RemoteCallOptions
  ): Promise<T> {
    const payload = await this.send('GET', path, options);
    const parsed = schema.safeParse(payload);

    if (!parsed.success) {
      throw new RemoteError(`Unexpected response from ${path}: ${parsed.error.message}`, path);
    }
    return parsed.data;
  }

  private async send(
    method: HttpMethod,
    path: string,
    options?: RemoteCallOptions,
    form?: Record<string, string>
  ): Promise<unknown> {
    const headers = { ...this.headers };
    let body: string | undefined;

    if (form) {
      body = new URLSearchParams(form).toString();
      headers['content-type'] = 'application/x-www-form-urlencoded';
    }

    let statusCode: number;
    let text: string;
    try {
      const response = await request(`${this.baseUrl}${path}`, {
        method,
        headers,
        body,
        signal: options?.signal,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteError(`${method} ${path} failed: ${reason}`, path, undefined, error);
    }

    const payload = text.length > 0 ? parseBody(text) : undefined;

    if (statusCode >= 400) {
      const apiError = apiErrorSchema.safeParse(payload);
      const message = apiError.success ? apiError.data.message : `Request failed with status ${statusCode}`;
      throw new RemoteError(message, path, statusCode);
    }

    return payload;
  }
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
