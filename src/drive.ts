import { lookup as mimeLookup } from "mime-types";

import { GatewayError, NotFoundError, errorMessage } from "./errors.js";
import type { StorageGateway } from "./gateway.js";
import type { DriveItem } from "./types.js";

const API_BASE = "https://www.googleapis.com/drive/v3";
const UPLOAD_BASE = "https://www.googleapis.com/upload/drive/v3";

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

// Fields to request for file metadata (keeps responses small)
const FILE_FIELDS = "id,name,mimeType,modifiedTime,trashed";

const RATE_LIMIT_REASONS = new Set(["rateLimitExceeded", "userRateLimitExceeded"]);

export interface TokenProvider {
  getAccessToken(): Promise<string>;
  refreshAfterUnauthorized(): Promise<string>;
}

export interface DriveGatewayOptions {
  fetchImpl?: typeof fetch;
  /** Extra attempts for network failures and 429, 5xx and rate-limit 403 responses. */
  maxRetries?: number;
  retryBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface DriveFileMetadata {
  id: string;
  name: string;
  mimeType: string;
  modifiedTime?: string;
  trashed?: boolean;
}

interface DriveErrorBody {
  error?: { message?: string; errors?: Array<{ reason?: string; message?: string }> };
}

interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: RequestInit["body"];
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function toItem(meta: DriveFileMetadata): DriveItem {
  return {
    id: meta.id,
    name: meta.name,
    kind: meta.mimeType === FOLDER_MIME_TYPE ? "container" : "file",
    modifiedTime: meta.modifiedTime ?? "",
  };
}

export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

function parseErrorBody(text: string): { reason?: string; message: string } {
  try {
    const data = JSON.parse(text) as DriveErrorBody;
    const first = data.error?.errors?.[0];
    return { reason: first?.reason, message: first?.message ?? data.error?.message ?? text };
  } catch {
    return { message: text };
  }
}

function buildMultipartBody(
  metadata: Record<string, unknown>,
  content: Uint8Array,
  mimeType: string,
  boundary: string,
): Uint8Array {
  const encoder = new TextEncoder();
  const parts: Uint8Array[] = [
    encoder.encode(`--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n`),
    encoder.encode(JSON.stringify(metadata)),
    encoder.encode(`\r\n--${boundary}\r\nContent-Type: ${mimeType}\r\n\r\n`),
    content,
    encoder.encode(`\r\n--${boundary}--`),
  ];
  const body = new Uint8Array(parts.reduce((sum, part) => sum + part.byteLength, 0));
  let offset = 0;
  for (const part of parts) {
    body.set(part, offset);
    offset += part.byteLength;
  }
  return body;
}

/**
 * Storage gateway backed by the Google Drive v3 REST API. Shared drives are
 * included in every call.
 */
export class DriveGateway implements StorageGateway {
  private readonly auth: TokenProvider;
  private readonly fetchImpl: typeof fetch;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(auth: TokenProvider, options: DriveGatewayOptions = {}) {
    this.auth = auth;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxRetries = Math.max(0, options.maxRetries ?? 4);
    this.retryBaseMs = Math.max(0, options.retryBaseMs ?? 1000);
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getItem(id: string): Promise<DriveItem | null> {
    const params = new URLSearchParams({ fields: FILE_FIELDS, supportsAllDrives: "true" });
    const response = await this.send(`${API_BASE}/files/${encodeURIComponent(id)}?${params.toString()}`);
    if (response.status === 404) return null;
    await this.assertOk(response, `get ${id}`);

    const meta = (await response.json()) as DriveFileMetadata;
    return meta.trashed ? null : toItem(meta);
  }

  async getParents(id: string): Promise<string[]> {
    const params = new URLSearchParams({ fields: "parents", supportsAllDrives: "true" });
    const response = await this.send(`${API_BASE}/files/${encodeURIComponent(id)}?${params.toString()}`);
    await this.assertOk(response, `get parents of ${id}`);
    return ((await response.json()) as { parents?: string[] }).parents ?? [];
  }

  async listChildren(containerId: string): Promise<DriveItem[]> {
    const results: DriveItem[] = [];
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams({
        q: `'${escapeQueryValue(containerId)}' in parents and trashed=false`,
        fields: `nextPageToken,files(${FILE_FIELDS})`,
        pageSize: "1000",
        orderBy: "name",
        supportsAllDrives: "true",
        includeItemsFromAllDrives: "true",
      });
      if (pageToken) params.set("pageToken", pageToken);

      const response = await this.send(`${API_BASE}/files?${params.toString()}`);
      await this.assertOk(response, `list ${containerId}`);

      const data = (await response.json()) as { files?: DriveFileMetadata[]; nextPageToken?: string };
      results.push(...(data.files ?? []).map(toItem));
      pageToken = data.nextPageToken;
    } while (pageToken);

    return results;
  }

  async createContainer(parentId: string, name: string): Promise<string> {
    const response = await this.send(`${API_BASE}/files?fields=id&supportsAllDrives=true`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] }),
    });
    await this.assertOk(response, `create folder ${name}`);
    return ((await response.json()) as { id: string }).id;
  }

  async duplicateFile(fileId: string, destinationParentId: string, name?: string): Promise<string> {
    const body: Record<string, unknown> = { parents: [destinationParentId] };
    if (name !== undefined) body.name = name;

    const response = await this.send(
      `${API_BASE}/files/${encodeURIComponent(fileId)}/copy?fields=id&supportsAllDrives=true`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      },
    );
    await this.assertOk(response, `copy ${fileId}`);
    return ((await response.json()) as { id: string }).id;
  }

  async readObject(objectId: string): Promise<Uint8Array | null> {
    const response = await this.send(
      `${API_BASE}/files/${encodeURIComponent(objectId)}?alt=media&supportsAllDrives=true`,
    );
    if (response.status === 404) return null;
    await this.assertOk(response, `download ${objectId}`);
    return new Uint8Array(await response.arrayBuffer());
  }

  async writeObject(parentContainerId: string, name: string, bytes: Uint8Array): Promise<string> {
    const mimeType = mimeLookup(name) || "application/octet-stream";
    const existingId = await this.resolveByName(parentContainerId, name);

    if (existingId) {
      const response = await this.send(
        `${UPLOAD_BASE}/files/${encodeURIComponent(existingId)}?uploadType=media&fields=id&supportsAllDrives=true`,
        { method: "PATCH", headers: { "Content-Type": mimeType }, body: bytes },
      );
      await this.assertOk(response, `overwrite ${name}`);
      return existingId;
    }

    const boundary = `boundary_${Date.now().toString(36)}`;
    const response = await this.send(`${UPLOAD_BASE}/files?uploadType=multipart&fields=id&supportsAllDrives=true`, {
      method: "POST",
      headers: { "Content-Type": `multipart/related; boundary=${boundary}` },
      body: buildMultipartBody({ name, parents: [parentContainerId] }, bytes, mimeType, boundary),
    });
    await this.assertOk(response, `upload ${name}`);
    return ((await response.json()) as { id: string }).id;
  }

  async resolveByName(containerId: string, name: string): Promise<string | null> {
    const params = new URLSearchParams({
      q: `name='${escapeQueryValue(name)}' and '${escapeQueryValue(containerId)}' in parents and trashed=false`,
      fields: "files(id)",
      pageSize: "10",
      supportsAllDrives: "true",
      includeItemsFromAllDrives: "true",
    });
    const response = await this.send(`${API_BASE}/files?${params.toString()}`);
    await this.assertOk(response, `find ${name} in ${containerId}`);

    const files = ((await response.json()) as { files?: Array<{ id: string }> }).files ?? [];
    return files[0]?.id ?? null;
  }

  private async isRetryable(response: Response): Promise<boolean> {
    if (response.status === 429 || response.status >= 500) return true;
    if (response.status !== 403) return false;
    const { reason } = parseErrorBody(await response.clone().text());
    return reason !== undefined && RATE_LIMIT_REASONS.has(reason);
  }

  private async send(url: string, options: RequestOptions = {}): Promise<Response> {
    let token = await this.auth.getAccessToken();
    let refreshed = false;
    let attempt = 0;

    for (;;) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: options.method ?? "GET",
          headers: { ...options.headers, Authorization: `Bearer ${token}` },
          body: options.body,
        });
      } catch (error) {
        if (attempt >= this.maxRetries) {
          throw new GatewayError(`Google Drive request failed: ${errorMessage(error)}`);
        }
        await this.sleep(this.retryBaseMs * 2 ** attempt);
        attempt += 1;
        continue;
      }

      if (response.status === 401 && !refreshed) {
        refreshed = true;
        token = await this.auth.refreshAfterUnauthorized();
        continue;
      }

      if (attempt < this.maxRetries && (await this.isRetryable(response))) {
        await this.sleep(this.retryBaseMs * 2 ** attempt);
        attempt += 1;
        continue;
      }

      return response;
    }
  }

  private async assertOk(response: Response, action: string): Promise<void> {
    if (response.ok) return;

    const { reason, message } = parseErrorBody(await response.text());
    if (response.status === 404) {
      throw new NotFoundError(`${action}: ${message}`);
    }
    throw new GatewayError(`Google Drive API error (${String(response.status)}) during ${action}: ${message}`, response.status, reason);
  }
}
