export type ItemKind = "container" | "file";

// A node as listed by the storage service, on either side of a duplication.
export interface DriveItem {
  id: string;
  name: string;
  kind: ItemKind;
  modifiedTime: string; // ISO 8601
}

export interface ManifestEntry {
  source_id: string;
  destination_id: string;
}

// On-disk (on-drive) shape of a manifest.
export interface ManifestDocument {
  version: number;
  origin_id: string;
  origin_name: string;
  created_at: string;
  updated_at: string;
  children: ManifestEntry[];
}

export interface DescendTarget {
  source: DriveItem;
  destinationId: string;
}

export interface MergePlan {
  toCreate: DriveItem[];
  toDescend: DescendTarget[];
  toSkip: DriveItem[];
}

export type SyncState = "uninitialized" | "managed" | "synced";

export interface SyncFailure {
  source_id: string;
  source_name: string;
  code: string;
  message: string;
}

export interface SyncReport {
  state: SyncState;
  containers: number;
  created: number;
  skipped: number;
  descended: number;
  errors: SyncFailure[];
}

export type SyncEvent =
  | { type: "container"; source: DriveItem; destinationId: string; depth: number }
  | { type: "created"; source: DriveItem; destinationId: string; depth: number }
  | { type: "skipped"; source: DriveItem; depth: number }
  | { type: "failed"; source: DriveItem; error: SyncFailure; depth: number };
