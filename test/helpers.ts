import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { GatewayError, NotFoundError } from "../src/errors.js";
import type { StorageGateway } from "../src/gateway.js";
import { MANIFEST_OBJECT_NAME, SYSTEM_FOLDER_NAME } from "../src/manifest.js";
import type { DriveItem, ItemKind, ManifestDocument } from "../src/types.js";

type GatewayMethod = keyof StorageGateway;

interface StoredNode {
  id: string;
  name: string;
  kind: ItemKind;
  parentId: string | null;
  modifiedTime: string;
  content: Uint8Array;
  trashed: boolean;
}

interface FailureRule {
  method: GatewayMethod;
  match: (target: string) => boolean;
  error: () => Error;
}

export interface TreeNode {
  [name: string]: TreeNode | string;
}

/**
 * In-process Drive stand-in. Ids given by a test are kept; ids the gateway
 * mints are `d1`, `d2`, ... in creation order. Listings follow insertion order.
 */
export class MemoryDrive implements StorageGateway {
  readonly calls: Record<GatewayMethod, number> = {
    getItem: 0,
    getParents: 0,
    listChildren: 0,
    createContainer: 0,
    duplicateFile: 0,
    readObject: 0,
    writeObject: 0,
    resolveByName: 0,
  };

  private readonly nodes = new Map<string, StoredNode>();
  private readonly failures: FailureRule[] = [];
  private counter = 0;

  constructor() {
    this.put({ id: "root", name: "My Drive", kind: "container", parentId: null });
  }

  addFolder(parentId: string | null, name: string, id?: string): string {
    return this.put({ id: id ?? this.mint(), name, kind: "container", parentId });
  }

  addFile(parentId: string, name: string, content = "", id?: string): string {
    return this.put({ id: id ?? this.mint(), name, kind: "file", parentId, content: new TextEncoder().encode(content) });
  }

  rename(id: string, name: string): void {
    this.require(id).name = name;
  }

  trash(id: string): void {
    this.require(id).trashed = true;
  }

  remove(id: string): void {
    for (const child of this.childNodes(id)) this.remove(child.id);
    this.nodes.delete(id);
  }

  /**
   * Make `method` throw whenever `match` accepts its target: the new item's
   * name for createContainer, duplicateFile and writeObject, the id argument
   * for the rest.
   */
  failWhen(
    method: GatewayMethod,
    match: (target: string) => boolean,
    error: () => Error = () => new GatewayError(`injected ${method} failure`, 500),
  ): void {
    this.failures.push({ method, match, error });
  }

  clearFailures(): void {
    this.failures.length = 0;
  }

  child(parentId: string, name: string): DriveItem | undefined {
    const node = this.childNodes(parentId).find((candidate) => candidate.name === name);
    return node ? this.toItem(node) : undefined;
  }

  childNames(parentId: string): string[] {
    return this.childNodes(parentId).map((node) => node.name);
  }

  text(id: string): string {
    return new TextDecoder().decode(this.require(id).content);
  }

  /** Nested names below `id`; files map to their text. System folders are left out. */
  tree(id: string): TreeNode {
    const result: TreeNode = {};
    for (const node of this.childNodes(id)) {
      if (node.name === SYSTEM_FOLDER_NAME) continue;
      result[node.name] = node.kind === "container" ? this.tree(node.id) : new TextDecoder().decode(node.content);
    }
    return result;
  }

  manifestOf(containerId: string): ManifestDocument | null {
    const system = this.child(containerId, SYSTEM_FOLDER_NAME);
    if (!system) return null;
    const object = this.child(system.id, MANIFEST_OBJECT_NAME);
    if (!object) return null;
    return JSON.parse(this.text(object.id)) as ManifestDocument;
  }

  overwriteManifest(containerId: string, text: string): void {
    const system = this.child(containerId, SYSTEM_FOLDER_NAME);
    const object = system ? this.child(system.id, MANIFEST_OBJECT_NAME) : undefined;
    if (!object) throw new Error(`no manifest in ${containerId}`);
    this.require(object.id).content = new TextEncoder().encode(text);
  }

  async getItem(id: string): Promise<DriveItem | null> {
    this.enter("getItem", id);
    const node = this.nodes.get(id);
    return node && !node.trashed ? this.toItem(node) : null;
  }

  async getParents(id: string): Promise<string[]> {
    this.enter("getParents", id);
    const node = this.nodes.get(id);
    if (!node) throw new NotFoundError(`Item not found: ${id}`);
    return node.parentId ? [node.parentId] : [];
  }

  async listChildren(containerId: string): Promise<DriveItem[]> {
    this.enter("listChildren", containerId);
    this.requireContainer(containerId);
    return this.childNodes(containerId).map((node) => this.toItem(node));
  }

  async createContainer(parentId: string, name: string): Promise<string> {
    this.enter("createContainer", name);
    this.requireContainer(parentId);
    return this.addFolder(parentId, name);
  }

  async duplicateFile(fileId: string, destinationParentId: string, name?: string): Promise<string> {
    const source = this.nodes.get(fileId);
    this.enter("duplicateFile", name ?? source?.name ?? fileId);
    if (!source || source.trashed) throw new NotFoundError(`File not found: ${fileId}`);
    this.requireContainer(destinationParentId);
    return this.put({
      id: this.mint(),
      name: name ?? source.name,
      kind: "file",
      parentId: destinationParentId,
      content: source.content.slice(),
    });
  }

  async readObject(objectId: string): Promise<Uint8Array | null> {
    this.enter("readObject", objectId);
    const node = this.nodes.get(objectId);
    return node && !node.trashed ? node.content.slice() : null;
  }

  async writeObject(parentContainerId: string, name: string, bytes: Uint8Array): Promise<string> {
    this.enter("writeObject", name);
    this.requireContainer(parentContainerId);
    const existing = this.childNodes(parentContainerId).find((node) => node.name === name);
    if (existing) {
      existing.content = bytes.slice();
      return existing.id;
    }
    return this.put({ id: this.mint(), name, kind: "file", parentId: parentContainerId, content: bytes.slice() });
  }

  async resolveByName(containerId: string, name: string): Promise<string | null> {
    this.enter("resolveByName", containerId);
    return this.childNodes(containerId).find((node) => node.name === name)?.id ?? null;
  }

  private enter(method: GatewayMethod, target: string): void {
    this.calls[method] += 1;
    const rule = this.failures.find((candidate) => candidate.method === method && candidate.match(target));
    if (rule) throw rule.error();
  }

  private mint(): string {
    this.counter += 1;
    return `d${String(this.counter)}`;
  }

  private put(input: {
    id: string;
    name: string;
    kind: ItemKind;
    parentId: string | null;
    content?: Uint8Array;
  }): string {
    if (this.nodes.has(input.id)) throw new Error(`duplicate test id ${input.id}`);
    this.nodes.set(input.id, {
      ...input,
      content: input.content ?? new Uint8Array(),
      modifiedTime: "2024-01-01T00:00:00.000Z",
      trashed: false,
    });
    return input.id;
  }

  private childNodes(parentId: string): StoredNode[] {
    return [...this.nodes.values()].filter((node) => node.parentId === parentId && !node.trashed);
  }

  private require(id: string): StoredNode {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`unknown test id ${id}`);
    return node;
  }

  private requireContainer(id: string): void {
    const node = this.nodes.get(id);
    if (!node || node.trashed || node.kind !== "container") {
      throw new NotFoundError(`Folder not found: ${id}`);
    }
  }

  private toItem(node: StoredNode): DriveItem {
    return { id: node.id, name: node.name, kind: node.kind, modifiedTime: node.modifiedTime };
  }
}

/** Deterministic timestamps one second apart, starting at 2024-01-01T00:00:00Z. */
export function clock(): () => string {
  let tick = 0;
  return () => {
    const value = new Date(Date.UTC(2024, 0, 1, 0, 0, tick)).toISOString();
    tick += 1;
    return value;
  };
}

export async function createTempDir(prefix = "drive-duplicate-"): Promise<string> {
  return await mkdtemp(path.join(os.tmpdir(), prefix));
}
