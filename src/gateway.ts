import type { DriveItem } from "./types.js";

/**
 * Narrow view of the remote storage service. Implementations own retries and
 * authentication; callers only see results or a thrown `GatewayError`.
 */
export interface StorageGateway {
  /** Metadata for one item, or null when the id does not resolve. */
  getItem(id: string): Promise<DriveItem | null>;
  /** Ids of the containers holding `id`; empty at the top of a drive. */
  getParents(id: string): Promise<string[]>;
  /** Every child of a container, read fully. */
  listChildren(containerId: string): Promise<DriveItem[]>;
  createContainer(parentId: string, name: string): Promise<string>;
  duplicateFile(fileId: string, destinationParentId: string, name?: string): Promise<string>;
  readObject(objectId: string): Promise<Uint8Array | null>;
  /** Create-or-overwrite a small object by name inside a container. */
  writeObject(parentContainerId: string, name: string, bytes: Uint8Array): Promise<string>;
  resolveByName(containerId: string, name: string): Promise<string | null>;
}
