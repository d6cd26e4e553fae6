import { getSnapshot, isStateTreeNode } from "mobx-state-tree";
import { createStorage, type Storage, type StorageValue } from "unstorage";
import fsLiteDriver from "unstorage/drivers/fs-lite";
import memoryDriver from "unstorage/drivers/memory";
import { config } from "./config";
import { errorMessage, HealthSimError, NotFoundError } from "./errors";
import { createLogger } from "./logger";
import { PharmacySession, type PharmacySessionInstance, type PharmacySessionSnapshot } from "./session";

const log = createLogger("storage");

export type OutputStore = Storage<StorageValue>;

export interface OutputStoreOptions {
  driver?: "fs" | "memory";
  /** Directory for the fs driver. */
  base?: string;
}

export function createOutputStore(options: OutputStoreOptions = {}): OutputStore {
  const driver = options.driver ?? "fs";
  if (driver === "memory") return createStorage({ driver: memoryDriver() });
  return createStorage({ driver: fsLiteDriver({ base: options.base ?? config.OUTPUT_DIR }) });
}

// ── Generated output ──

export async function saveOutput(store: OutputStore, key: string, value: string | object): Promise<void> {
  try {
    await store.setItem(key, value);
    log.debug(`Saved ${key}`);
  } catch (e) {
    log.error(`Failed to write ${key}: ${errorMessage(e)}`);
    throw new HealthSimError(`Failed to write ${key}: ${errorMessage(e)}`, "storage");
  }
}

export async function loadOutput<T extends StorageValue>(store: OutputStore, key: string): Promise<T | null> {
  try {
    return await store.getItem<T>(key);
  } catch (e) {
    log.error(`Failed to read ${key}: ${errorMessage(e)}`);
    throw new HealthSimError(`Failed to read ${key}: ${errorMessage(e)}`, "storage");
  }
}

export async function listOutputs(store: OutputStore, prefix = ""): Promise<string[]> {
  try {
    return await store.getKeys(prefix);
  } catch (e) {
    log.error(`Failed to list ${prefix || "outputs"}: ${errorMessage(e)}`);
    throw new HealthSimError(`Failed to list ${prefix || "outputs"}: ${errorMessage(e)}`, "storage");
  }
}

// ── Session snapshots ──

export const sessionKey = (id: string): string => `sessions:${id}`;

function isSessionSnapshot(value: unknown): value is PharmacySessionSnapshot {
  return !isStateTreeNode(value) && PharmacySession.is(value);
}

export async function saveSessionSnapshot(store: OutputStore, session: PharmacySessionInstance): Promise<string> {
  const key = sessionKey(session.id);
  await saveOutput(store, key, getSnapshot(session));
  log.info(`Saved session ${session.id} (${session.members.size} members, ${session.claims.length} claims)`);
  return key;
}

export async function loadSessionSnapshot(store: OutputStore, id: string): Promise<PharmacySessionInstance> {
  const raw = await loadOutput(store, sessionKey(id));
  if (raw === null) throw new NotFoundError(`Session ${id} not found`);
  if (!isSessionSnapshot(raw)) throw new HealthSimError(`Stored session ${id} is not a valid snapshot`, "storage");
  return PharmacySession.create(raw);
}
