import type { StorageGateway } from "./gateway.js";
import { AlreadyManagedError, DuplicateOriginMappingError, ManifestCorruptError } from "./errors.js";
import type { ManifestDocument, ManifestEntry } from "./types.js";

export const MANIFEST_VERSION = 1;

// Reserved child of every managed destination folder. The leading dot sorts it
// first in Drive listings.
export const SYSTEM_FOLDER_NAME = ".drive-duplicate";
export const MANIFEST_OBJECT_NAME = "manifest.json";

function utcNow(): string {
  return new Date().toISOString();
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isIsoDate(value: unknown): value is string {
  if (typeof value !== "string") return false;
  return !Number.isNaN(Date.parse(value));
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

/**
 * Provenance record of one destination folder: where it was duplicated from
 * and which destination child each source child became. Values are immutable;
 * `withChild` returns a new manifest with one more entry.
 */
export class Manifest {
  public readonly originId: string;
  public readonly originName: string;
  public readonly createdAt: string;
  public readonly updatedAt: string;
  private readonly entries: readonly ManifestEntry[];
  private readonly index: ReadonlyMap<string, string>;

  constructor(input: {
    originId: string;
    originName: string;
    createdAt: string;
    updatedAt?: string;
    entries?: readonly ManifestEntry[];
  }) {
    this.originId = input.originId;
    this.originName = input.originName;
    this.createdAt = input.createdAt;
    this.updatedAt = input.updatedAt ?? input.createdAt;
    this.entries = input.entries ?? [];
    this.index = new Map(this.entries.map((entry) => [entry.source_id, entry.destination_id]));
  }

  static empty(originId: string, originName: string, now: string): Manifest {
    return new Manifest({ originId, originName, createdAt: now });
  }

  static fromDocument(doc: ManifestDocument): Manifest {
    return new Manifest({
      originId: doc.origin_id,
      originName: doc.origin_name,
      createdAt: doc.created_at,
      updatedAt: doc.updated_at,
      entries: doc.children.map((entry) => ({ ...entry })),
    });
  }

  get size(): number {
    return this.entries.length;
  }

  has(sourceId: string): boolean {
    return this.index.has(sourceId);
  }

  destinationOf(sourceId: string): string | undefined {
    return this.index.get(sourceId);
  }

  /** Source child id -> destination child id, in the order entries were recorded. */
  get childOriginMap(): ReadonlyMap<string, string> {
    return this.index;
  }

  listEntries(): ManifestEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  withChild(sourceId: string, destinationId: string, now: string): Manifest {
    if (this.index.has(sourceId)) {
      throw new DuplicateOriginMappingError(sourceId);
    }
    return new Manifest({
      originId: this.originId,
      originName: this.originName,
      createdAt: this.createdAt,
      updatedAt: now,
      entries: [...this.entries, { source_id: sourceId, destination_id: destinationId }],
    });
  }

  toDocument(): ManifestDocument {
    return {
      version: MANIFEST_VERSION,
      origin_id: this.originId,
      origin_name: this.originName,
      created_at: this.createdAt,
      updated_at: this.updatedAt,
      children: this.listEntries(),
    };
  }
}

export interface ManifestValidationResult {
  ok: boolean;
  errors: string[];
  warnings: string[];
  entry_count: number;
}

function validateEntryShape(value: unknown, index: number, errors: string[]): value is ManifestEntry {
  if (!isObject(value)) {
    errors.push(`children[${index}] must be an object`);
    return false;
  }

  let ok = true;
  for (const field of ["source_id", "destination_id"] as const) {
    if (!isNonEmptyString(value[field])) {
      errors.push(`children[${index}].${field} must be a non-empty string`);
      ok = false;
    }
  }
  return ok;
}

export function validateManifestDocument(raw: unknown): ManifestValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isObject(raw)) {
    return { ok: false, errors: ["manifest root must be an object"], warnings, entry_count: 0 };
  }

  if (raw.version !== MANIFEST_VERSION) {
    errors.push(`version must be ${String(MANIFEST_VERSION)}`);
  }
  if (!isNonEmptyString(raw.origin_id)) {
    errors.push("origin_id must be a non-empty string");
  }
  if (typeof raw.origin_name !== "string") {
    errors.push("origin_name must be a string");
  }
  if (!isIsoDate(raw.created_at)) {
    errors.push("created_at must be an ISO timestamp");
  }
  if (!isIsoDate(raw.updated_at)) {
    errors.push("updated_at must be an ISO timestamp");
  }
  if (!Array.isArray(raw.children)) {
    errors.push("children must be an array");
  }

  const children: unknown[] = Array.isArray(raw.children) ? raw.children : [];
  const seenSources = new Set<string>();
  const seenDestinations = new Set<string>();

  for (let index = 0; index < children.length; index += 1) {
    const entry = children[index];
    if (!validateEntryShape(entry, index, errors)) continue;

    if (seenSources.has(entry.source_id)) errors.push(`duplicate source_id: ${entry.source_id}`);
    seenSources.add(entry.source_id);

    if (seenDestinations.has(entry.destination_id)) {
      warnings.push(`destination_id ${entry.destination_id} is mapped more than once`);
    }
    seenDestinations.add(entry.destination_id);
  }

  return { ok: errors.length === 0, errors, warnings, entry_count: children.length };
}

export function isManifestDocument(value: unknown): value is ManifestDocument {
  return (
    isObject(value) &&
    value.version === MANIFEST_VERSION &&
    isNonEmptyString(value.origin_id) &&
    typeof value.origin_name === "string" &&
    typeof value.created_at === "string" &&
    typeof value.updated_at === "string" &&
    Array.isArray(value.children) &&
    value.children.every(
      (entry: unknown) => isObject(entry) && isNonEmptyString(entry.source_id) && isNonEmptyString(entry.destination_id),
    )
  );
}

export function serializeManifest(manifest: Manifest): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(manifest.toDocument(), null, 2));
}

export function parseManifest(bytes: Uint8Array, containerId: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes)) as unknown;
  } catch (error) {
    throw new ManifestCorruptError(containerId, [`manifest read/parse failed: ${String(error)}`]);
  }

  const result = validateManifestDocument(raw);
  if (!result.ok || !isManifestDocument(raw)) {
    throw new ManifestCorruptError(containerId, result.errors);
  }
  return Manifest.fromDocument(raw);
}

/**
 * Reads and writes manifests through the storage gateway. The append-only
 * contract lives in `recordChild`; `persist` simply overwrites the object.
 */
export class ManifestStore {
  private readonly gateway: StorageGateway;
  private readonly now: () => string;
  private readonly systemFolders = new Map<string, string>();

  constructor(gateway: StorageGateway, now: () => string = utcNow) {
    this.gateway = gateway;
    this.now = now;
  }

  public async load(destinationContainerId: string): Promise<Manifest | null> {
    const raw = await this.loadRaw(destinationContainerId);
    if (!raw) return null;
    return parseManifest(raw, destinationContainerId);
  }

  /**
   * Origin id of the manifest in a container, or null when it has none. A
   * corrupt manifest also yields null here; `load` reports it when the
   * container is synced.
   */
  public async originOf(destinationContainerId: string): Promise<string | null> {
    try {
      return (await this.load(destinationContainerId))?.originId ?? null;
    } catch (error) {
      if (error instanceof ManifestCorruptError) return null;
      throw error;
    }
  }

  /** Raw manifest bytes, for diagnostics that want to report rather than throw. */
  public async loadRaw(destinationContainerId: string): Promise<Uint8Array | null> {
    const systemId = await this.findSystemFolder(destinationContainerId);
    if (!systemId) return null;

    const objectId = await this.gateway.resolveByName(systemId, MANIFEST_OBJECT_NAME);
    if (!objectId) return null;

    return await this.gateway.readObject(objectId);
  }

  public async create(destinationContainerId: string, originId: string, originName: string): Promise<Manifest> {
    const existing = await this.load(destinationContainerId);
    if (existing) {
      throw new AlreadyManagedError(destinationContainerId);
    }

    const manifest = Manifest.empty(originId, originName, this.now());
    await this.persist(destinationContainerId, manifest);
    return manifest;
  }

  public recordChild(manifest: Manifest, sourceChildId: string, destinationChildId: string): Manifest {
    return manifest.withChild(sourceChildId, destinationChildId, this.now());
  }

  public async persist(destinationContainerId: string, manifest: Manifest): Promise<void> {
    const systemId = await this.ensureSystemFolder(destinationContainerId);
    await this.gateway.writeObject(systemId, MANIFEST_OBJECT_NAME, serializeManifest(manifest));
  }

  private async findSystemFolder(containerId: string): Promise<string | null> {
    const cached = this.systemFolders.get(containerId);
    if (cached) return cached;

    const found = await this.gateway.resolveByName(containerId, SYSTEM_FOLDER_NAME);
    if (found) this.systemFolders.set(containerId, found);
    return found;
  }

  private async ensureSystemFolder(containerId: string): Promise<string> {
    const existing = await this.findSystemFolder(containerId);
    if (existing) return existing;

    const created = await this.gateway.createContainer(containerId, SYSTEM_FOLDER_NAME);
    this.systemFolders.set(containerId, created);
    return created;
  }
}
