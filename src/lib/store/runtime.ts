import { eq, sql } from "drizzle-orm";
import { getDb } from "@/db/client";
import { appRuntimeState } from "@/db/schema";
import { LocalEncryptor } from "@/lib/collaborators/local-encryptor";
import { LocalDecryptionGateway } from "@/lib/collaborators/local-gateway";
import { LocalTreasury } from "@/lib/collaborators/local-treasury";
import { decryptionTimeoutMs, getRuntimeSecrets, getStateBackendMode, minReviewFee } from "@/lib/config";
import { MemoryStore } from "@/lib/store/memory";
import type { AppState } from "@/lib/types";
import { nowIso } from "@/lib/utils";

const RUNTIME_STATE_ROW_ID = "singleton";

export interface RuntimeContext {
  store: MemoryStore;
  encryptor: LocalEncryptor;
  gateway: LocalDecryptionGateway;
  treasury: LocalTreasury;
}

let runtime: RuntimeContext | null = null;
let initPromise: Promise<RuntimeContext> | null = null;
let persistQueue: Promise<void> = Promise.resolve();

async function ensureRuntimeStateTable() {
  const db = getDb();
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS app_runtime_state (
      id varchar(64) PRIMARY KEY,
      state_json jsonb NOT NULL,
      updated_at timestamptz NOT NULL
    )
  `);
}

function isAppState(value: unknown): value is AppState {
  if (!value || typeof value !== "object") return false;
  return "owner" in value && "documents" in value && "events" in value && "platformFunds" in value;
}

async function loadStateFromPostgres(): Promise<AppState | null> {
  await ensureRuntimeStateTable();
  const db = getDb();
  const rows = await db.select().from(appRuntimeState).where(eq(appRuntimeState.id, RUNTIME_STATE_ROW_ID)).limit(1);
  const row = rows[0];
  if (!row) return null;
  if (!isAppState(row.stateJson)) {
    throw new Error("Stored ledger snapshot is not a recognizable state document");
  }
  return row.stateJson;
}

async function saveStateToPostgres(state: AppState): Promise<void> {
  await ensureRuntimeStateTable();
  const db = getDb();
  const updatedAt = new Date();
  await db
    .insert(appRuntimeState)
    .values({ id: RUNTIME_STATE_ROW_ID, stateJson: state, updatedAt })
    .onConflictDoUpdate({
      target: appRuntimeState.id,
      set: {
        stateJson: state,
        updatedAt
      }
    });
}

export function createRuntimeContext(initialState?: AppState): RuntimeContext {
  const secrets = getRuntimeSecrets();
  const encryptor = new LocalEncryptor(secrets.encryptorKey);
  const gateway = new LocalDecryptionGateway(encryptor, secrets.gatewaySeed);
  const treasury = new LocalTreasury();
  const store = new MemoryStore(
    {
      owner: secrets.ownerAddress,
      collaborators: { encryptor, gateway, treasury },
      decryptionTimeoutMs: decryptionTimeoutMs(),
      minReviewFee: minReviewFee()
    },
    initialState
  );
  for (const pending of store.listPendingDecryptions()) {
    gateway.resume(pending.requestId, pending.handles, store);
  }
  return { store, encryptor, gateway, treasury };
}

async function initializeRuntime(): Promise<RuntimeContext> {
  if (getStateBackendMode() === "memory") {
    runtime = createRuntimeContext();
    return runtime;
  }

  const loadedState = await loadStateFromPostgres();
  const context = createRuntimeContext(loadedState ?? undefined);
  runtime = context;
  if (!loadedState) {
    await saveStateToPostgres(context.store.snapshotState());
  }
  return context;
}

export async function getRuntime(): Promise<RuntimeContext> {
  if (runtime) return runtime;
  if (!initPromise) {
    initPromise = initializeRuntime().finally(() => {
      initPromise = null;
    });
  }
  return initPromise;
}

export async function getRuntimeStore(): Promise<MemoryStore> {
  return (await getRuntime()).store;
}

export async function persistRuntimeStore(store?: MemoryStore): Promise<void> {
  if (getStateBackendMode() !== "postgres") return;
  const instance = store ?? (await getRuntimeStore());
  const state = instance.snapshotState();
  // A failed write is reported to its own caller; later writes still run.
  const write = persistQueue.catch(() => undefined).then(() => saveStateToPostgres(state));
  persistQueue = write;
  await write;
}

export async function clearRuntimeStateForTests() {
  runtime = null;
  initPromise = null;
  if (getStateBackendMode() === "postgres") {
    await ensureRuntimeStateTable();
    const db = getDb();
    await db.delete(appRuntimeState).where(eq(appRuntimeState.id, RUNTIME_STATE_ROW_ID));
  }
}

export function getRuntimeBackendInfo() {
  return {
    backend: getStateBackendMode(),
    timestamp: nowIso()
  };
}
