import { DRIVE_ROOT_ALIAS, type BatchConfig } from "./config.js";
import { ConfigError, DestinationParentNotFoundError, SourceNotFoundError } from "./errors.js";
import type { StorageGateway } from "./gateway.js";
import { ManifestStore } from "./manifest.js";
import { TreeSynchronizer, type SyncOptions } from "./sync.js";
import type { DriveItem, SyncReport } from "./types.js";

/**
 * Where the top-level copy goes: a folder by name under a parent (the source
 * folder's name by default), or an existing folder.
 */
export type DestinationTarget = { parentId?: string; name?: string } | { id: string };

export interface DuplicateFolderRequest {
  sourceId: string;
  target: DestinationTarget;
}

export interface DestinationResult {
  parent_id: string | null;
  root_id: string;
  created_root: boolean;
  report: SyncReport;
}

export interface BatchResult {
  source_parent_id: string;
  found: Record<string, string>;
  missing: string[];
  destinations: DestinationResult[];
}

interface ResolvedRoot {
  parentId: string | null;
  rootId: string;
  createdRoot: boolean;
}

export class DuplicationDriver {
  private readonly gateway: StorageGateway;
  private readonly store: ManifestStore;
  private readonly synchronizer: TreeSynchronizer;

  constructor(gateway: StorageGateway, options: SyncOptions = {}, store = new ManifestStore(gateway)) {
    this.gateway = gateway;
    this.store = store;
    this.synchronizer = new TreeSynchronizer(gateway, store, options);
  }

  /** Duplicate or merge one source folder. Resolution failures are thrown before anything is written. */
  public async duplicateFolder(request: DuplicateFolderRequest): Promise<DestinationResult> {
    const source = await this.requireSourceFolder(request.sourceId);
    const root = await this.resolveRoot(request.target, source.name, source.id);
    if (root.rootId === source.id) {
      throw new ConfigError(`Destination resolves to the source folder ${source.id}; choose another name or parent`);
    }
    const report = await this.synchronizer.sync(source, root.rootId);
    return { parent_id: root.parentId, root_id: root.rootId, created_root: root.createdRoot, report };
  }

  /**
   * Duplicate the named folders of one source parent into a batch folder under
   * each destination parent. Names that do not resolve are reported in
   * `missing`; if none resolves the run fails.
   */
  public async duplicateBatch(batch: BatchConfig): Promise<BatchResult> {
    const sourceParent = await this.requireSourceFolder(batch.sourceParentId);

    const wanted = new Set(batch.folderNames);
    const found = new Map<string, string>();
    for (const child of await this.gateway.listChildren(sourceParent.id)) {
      if (child.kind !== "container" || !wanted.has(child.name) || found.has(child.name)) continue;
      found.set(child.name, child.id);
    }

    const missing = batch.folderNames.filter((name) => !found.has(name));
    if (found.size === 0) {
      throw new SourceNotFoundError(
        `None of the folders to copy exist under ${sourceParent.id}: ${batch.folderNames.join(", ")}`,
      );
    }

    for (const parentId of batch.destinationParentIds) {
      const parent = await this.requireDestinationFolder(parentId);
      await this.assertOutsideSource(parent.id, sourceParent.id);
    }
    const roots: ResolvedRoot[] = [];
    for (const parentId of batch.destinationParentIds) {
      const root = await this.resolveRoot({ parentId }, batch.batchFolderName, sourceParent.id);
      if (root.rootId === sourceParent.id) {
        throw new ConfigError(`Batch folder under ${parentId} is the source parent itself`);
      }
      roots.push(root);
    }

    const only = new Set(found.values());
    const destinations: DestinationResult[] = [];
    for (const root of roots) {
      const report = await this.synchronizer.sync(sourceParent, root.rootId, { only });
      destinations.push({ parent_id: root.parentId, root_id: root.rootId, created_root: root.createdRoot, report });
    }

    return {
      source_parent_id: sourceParent.id,
      found: Object.fromEntries(found),
      missing,
      destinations,
    };
  }

  private async requireSourceFolder(id: string): Promise<DriveItem> {
    const source = await this.gateway.getItem(id);
    if (!source || source.kind !== "container") {
      throw new SourceNotFoundError(`Source folder not found: ${id}`);
    }
    return source;
  }

  private async requireDestinationFolder(id: string): Promise<DriveItem> {
    const folder = await this.gateway.getItem(id);
    if (!folder || folder.kind !== "container") {
      throw new DestinationParentNotFoundError(`Destination folder not found: ${id}`);
    }
    return folder;
  }

  /** Rejects a destination folder that is the source or lies anywhere below it. */
  private async assertOutsideSource(folderId: string, sourceId: string): Promise<void> {
    const seen = new Set<string>();
    const pending = [folderId];
    for (let id = pending.pop(); id !== undefined; id = pending.pop()) {
      if (id === sourceId) {
        throw new ConfigError(`Destination ${folderId} is inside the source folder ${sourceId}; choose a folder outside it`);
      }
      if (seen.has(id)) continue;
      seen.add(id);
      pending.push(...(await this.gateway.getParents(id)));
    }
  }

  /**
   * Finds the copy made by an earlier run by its manifest, so a renamed copy
   * is still found and a same-named file or foreign folder is never taken.
   * A same-named folder without a manifest comes next; otherwise a new one is
   * created.
   */
  private async resolveRoot(target: DestinationTarget, defaultName: string, originId: string): Promise<ResolvedRoot> {
    if ("id" in target) {
      const folder = await this.requireDestinationFolder(target.id);
      await this.assertOutsideSource(folder.id, originId);
      return { parentId: null, rootId: folder.id, createdRoot: false };
    }

    const parent = await this.requireDestinationFolder(target.parentId ?? DRIVE_ROOT_ALIAS);
    await this.assertOutsideSource(parent.id, originId);
    const name = target.name ?? defaultName;

    const folders = (await this.gateway.listChildren(parent.id)).filter((child) => child.kind === "container");
    const candidates = [...folders.filter((folder) => folder.name === name), ...folders.filter((folder) => folder.name !== name)];
    let unmanaged: DriveItem | null = null;
    for (const folder of candidates) {
      const folderOrigin = await this.store.originOf(folder.id);
      if (folderOrigin === originId) {
        return { parentId: parent.id, rootId: folder.id, createdRoot: false };
      }
      if (folderOrigin === null && folder.name === name && !unmanaged) unmanaged = folder;
    }
    if (unmanaged) {
      return { parentId: parent.id, rootId: unmanaged.id, createdRoot: false };
    }

    const rootId = await this.gateway.createContainer(parent.id, name);
    return { parentId: parent.id, rootId, createdRoot: true };
  }
}
