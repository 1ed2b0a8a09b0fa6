import { SerialQueue, runWithConcurrencyLimit } from "./concurrency.js";
import { DuplicateOriginMappingError, OriginMismatchError, errorCode, errorMessage } from "./errors.js";
import type { StorageGateway } from "./gateway.js";
import { SYSTEM_FOLDER_NAME, type Manifest, type ManifestStore } from "./manifest.js";
import { planMerge } from "./planner.js";
import type { DescendTarget, DriveItem, SyncEvent, SyncReport, SyncState } from "./types.js";

export interface SyncOptions {
  /** Child operations issued at once within one folder. */
  concurrency?: number;
  onEvent?: (event: SyncEvent) => void;
  /** Aborting stops the walk before the next child operation; progress so far stays recorded. */
  signal?: AbortSignal;
}

export interface SyncRootOptions {
  /** Restrict the top-level source children to these ids. */
  only?: ReadonlySet<string>;
}

function isSystemFolder(item: DriveItem): boolean {
  return item.kind === "container" && item.name === SYSTEM_FOLDER_NAME;
}

function emptyReport(): SyncReport {
  return { state: "uninitialized", containers: 0, created: 0, skipped: 0, descended: 0, errors: [] };
}

// State of one `sync` call. `produced` holds the destination root and every
// item created since; a destination inside the source must not be copied into itself.
interface Walk {
  report: SyncReport;
  produced: Set<string>;
}

/**
 * Holds the live manifest of one destination folder. Every recorded child is
 * written through immediately; writes for the folder go out one at a time.
 */
class ManifestWriter {
  private current: Manifest;
  private persisted: Manifest;
  private readonly queue = new SerialQueue();

  constructor(
    private readonly store: ManifestStore,
    private readonly containerId: string,
    manifest: Manifest,
  ) {
    this.current = manifest;
    this.persisted = manifest;
  }

  async record(sourceId: string, destinationId: string): Promise<void> {
    this.current = this.store.recordChild(this.current, sourceId, destinationId);
    await this.flush();
  }

  async flush(): Promise<void> {
    await this.queue.run(async () => {
      const snapshot = this.current;
      if (snapshot === this.persisted) return;
      await this.store.persist(this.containerId, snapshot);
      this.persisted = snapshot;
    });
  }
}

export class TreeSynchronizer {
  private readonly gateway: StorageGateway;
  private readonly store: ManifestStore;
  private readonly concurrency: number;
  private readonly onEvent?: (event: SyncEvent) => void;
  private readonly signal?: AbortSignal;

  constructor(gateway: StorageGateway, store: ManifestStore, options: SyncOptions = {}) {
    this.gateway = gateway;
    this.store = store;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.onEvent = options.onEvent;
    this.signal = options.signal;
  }

  /**
   * Merge `source` into the existing destination folder `destinationId`.
   * Failures below the root are collected in the report; an abort or a broken
   * manifest invariant is rethrown.
   */
  public async sync(source: DriveItem, destinationId: string, options: SyncRootOptions = {}): Promise<SyncReport> {
    const walk: Walk = { report: emptyReport(), produced: new Set([destinationId]) };
    try {
      await this.syncContainer(source, destinationId, 0, walk, options.only);
    } catch (error) {
      this.fail(walk.report, source, error, 0);
    }
    return walk.report;
  }

  private async syncContainer(
    source: DriveItem,
    destinationId: string,
    depth: number,
    walk: Walk,
    only?: ReadonlySet<string>,
  ): Promise<void> {
    const { report, produced } = walk;
    const transition = (state: SyncState): void => {
      if (depth === 0) report.state = state;
    };

    this.signal?.throwIfAborted();
    report.containers += 1;
    this.emit({ type: "container", source, destinationId, depth });

    const existing = await this.store.load(destinationId);
    if (existing && existing.originId !== source.id) {
      throw new OriginMismatchError(destinationId, source.id, existing.originId);
    }
    const manifest = existing ?? (await this.store.create(destinationId, source.id, source.name));
    transition("managed");

    const children = (await this.gateway.listChildren(source.id)).filter(
      (child) => !isSystemFolder(child) && !produced.has(child.id) && (!only || only.has(child.id)),
    );
    const plan = planMerge(children, manifest);
    const writer = new ManifestWriter(this.store, destinationId, manifest);

    for (const item of plan.toSkip) {
      report.skipped += 1;
      this.emit({ type: "skipped", source: item, depth: depth + 1 });
    }

    const createdFolders: Array<{ source: DriveItem; destinationId: string } | undefined> = [];
    await runWithConcurrencyLimit(plan.toCreate, this.concurrency, async (item, index) => {
      try {
        this.signal?.throwIfAborted();
        const createdId =
          item.kind === "container"
            ? await this.gateway.createContainer(destinationId, item.name)
            : await this.gateway.duplicateFile(item.id, destinationId, item.name);
        produced.add(createdId);
        await writer.record(item.id, createdId);
        report.created += 1;
        this.emit({ type: "created", source: item, destinationId: createdId, depth: depth + 1 });
        if (item.kind === "container") {
          createdFolders[index] = { source: item, destinationId: createdId };
        }
      } catch (error) {
        this.fail(report, item, error, depth + 1);
      }
    });

    // New folders are filled after their siblings exist, in listing order.
    for (const folder of createdFolders) {
      if (!folder) continue;
      await this.descend(folder.source, folder.destinationId, depth + 1, walk);
    }

    for (const target of plan.toDescend) {
      await this.descendMapped(target, depth + 1, walk);
    }

    await writer.flush();
    transition("synced");
  }

  private async descend(source: DriveItem, destinationId: string, depth: number, walk: Walk): Promise<void> {
    try {
      await this.syncContainer(source, destinationId, depth, walk);
    } catch (error) {
      this.fail(walk.report, source, error, depth);
    }
  }

  private async descendMapped(target: DescendTarget, depth: number, walk: Walk): Promise<void> {
    const { report } = walk;
    try {
      const copy = await this.gateway.getItem(target.destinationId);
      if (!copy || copy.kind !== "container") {
        // Removed at the destination: the mapping stays and nothing is recreated.
        report.skipped += 1;
        this.emit({ type: "skipped", source: target.source, depth });
        return;
      }
      report.descended += 1;
      await this.syncContainer(target.source, copy.id, depth, walk);
    } catch (error) {
      this.fail(report, target.source, error, depth);
    }
  }

  private fail(report: SyncReport, source: DriveItem, error: unknown, depth: number): void {
    if (error instanceof DuplicateOriginMappingError || this.signal?.aborted) {
      throw error;
    }
    const failure = {
      source_id: source.id,
      source_name: source.name,
      code: errorCode(error),
      message: errorMessage(error),
    };
    report.errors.push(failure);
    this.emit({ type: "failed", source, error: failure, depth });
  }

  private emit(event: SyncEvent): void {
    this.onEvent?.(event);
  }
}
