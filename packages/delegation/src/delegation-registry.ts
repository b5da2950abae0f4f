/**
 * @ubistream/delegation: Delegation registry.
 *
 * Stores live delegation records, tombstones for removed ones, and two
 * unordered indices: outgoing ids per sender, incoming ids per
 * recipient. Removal from an index is swap-with-last-and-pop.
 *
 * Rules:
 * - Ids come from a monotonic counter and are never reused
 * - Every id in an index refers to a live record of that party
 * - A removed id always leaves a tombstone
 */

import type { Address, DelegationId, SettlementReason, UnixSeconds } from "@ubistream/types";
import { parseBaseUnits } from "@ubistream/accrual";
import type {
  DelegationRecord,
  DelegationSnapshotRecord,
  DelegationState,
  IndexEntry,
  NewDelegation,
  RegistrySnapshot,
  Tombstone,
} from "./types.js";
import { DelegationError } from "./types.js";

export class DelegationRegistry {
  private readonly _records = new Map<DelegationId, DelegationRecord>();
  private readonly _tombstones = new Map<DelegationId, Tombstone>();
  private readonly _outgoing = new Map<Address, DelegationId[]>();
  private readonly _incoming = new Map<Address, DelegationId[]>();
  private _lastId: DelegationId = 0;

  /** Highest id allocated so far (0 before the first delegation). */
  get lastId(): DelegationId {
    return this._lastId;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Store a new delegation under the next id.
   */
  add(fields: NewDelegation): DelegationRecord {
    const record: DelegationRecord = {
      ...fields,
      id: this._lastId + 1,
      settledAccrued: 0n,
      withdrawn: 0n,
    };
    this._lastId = record.id;
    this._records.set(record.id, record);
    this._push(this._outgoing, record.sender, record.id);
    this._push(this._incoming, record.recipient, record.id);
    return record;
  }

  /**
   * Replace a live record. Parties and id are fixed for life.
   */
  update(record: DelegationRecord): void {
    const current = this.require(record.id);
    if (current.sender !== record.sender || current.recipient !== record.recipient) {
      throw new Error(`Delegation ${String(record.id)} cannot change parties`);
    }
    this._records.set(record.id, record);
  }

  /**
   * Remove a delegation from the active set, leaving a tombstone.
   */
  settle(id: DelegationId, reason: SettlementReason, at: UnixSeconds): Tombstone {
    const record = this.require(id);
    this._remove(this._outgoing, record.sender, id);
    this._remove(this._incoming, record.recipient, id);
    this._records.delete(id);

    const tombstone: Tombstone = { id, reason, settledAt: at };
    this._tombstones.set(id, tombstone);
    return tombstone;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get(id: DelegationId): DelegationRecord | undefined {
    return this._records.get(id);
  }

  /**
   * Get a live record or throw NOT_FOUND.
   */
  require(id: DelegationId): DelegationRecord {
    const record = this._records.get(id);
    if (record === undefined) {
      const state = this.state(id);
      const detail = state.status === "settled" ? ` (${state.reason})` : "";
      throw new DelegationError("NOT_FOUND", `Delegation ${String(id)} does not exist${detail}`);
    }
    return record;
  }

  state(id: DelegationId): DelegationState {
    const record = this._records.get(id);
    if (record !== undefined) {
      return { status: "active", delegation: record };
    }
    const tombstone = this._tombstones.get(id);
    if (tombstone !== undefined) {
      return { status: "settled", ...tombstone };
    }
    return { status: "unknown", id };
  }

  outgoingIdsOf(sender: Address): readonly DelegationId[] {
    return [...(this._outgoing.get(sender) ?? [])];
  }

  incomingIdsOf(recipient: Address): readonly DelegationId[] {
    return [...(this._incoming.get(recipient) ?? [])];
  }

  outgoingOf(sender: Address): readonly DelegationRecord[] {
    return this.outgoingIdsOf(sender).map((id) => this.require(id));
  }

  incomingOf(recipient: Address): readonly DelegationRecord[] {
    return this.incomingIdsOf(recipient).map((id) => this.require(id));
  }

  activeCount(sender: Address): number {
    return this._outgoing.get(sender)?.length ?? 0;
  }

  // ─── Serialization ───────────────────────────────────────────────────

  export(): RegistrySnapshot {
    return {
      lastId: this._lastId,
      delegations: [...this._records.values()].map(toSnapshotRecord),
      tombstones: [...this._tombstones.values()],
      outgoing: exportIndex(this._outgoing),
      incoming: exportIndex(this._incoming),
    };
  }

  static fromSnapshot(snap: RegistrySnapshot): DelegationRegistry {
    const registry = new DelegationRegistry();
    for (const raw of snap.delegations) {
      if (raw.id > snap.lastId) {
        throw new Error(`Delegation ${String(raw.id)} is above lastId ${String(snap.lastId)}`);
      }
      registry._records.set(raw.id, fromSnapshotRecord(raw));
    }
    for (const tombstone of snap.tombstones) {
      registry._tombstones.set(tombstone.id, tombstone);
    }
    registry._importIndex(registry._outgoing, snap.outgoing, (r) => r.sender);
    registry._importIndex(registry._incoming, snap.incoming, (r) => r.recipient);
    registry._lastId = snap.lastId;
    return registry;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _push(index: Map<Address, DelegationId[]>, address: Address, id: DelegationId): void {
    const ids = index.get(address);
    if (ids === undefined) {
      index.set(address, [id]);
    } else {
      ids.push(id);
    }
  }

  private _remove(index: Map<Address, DelegationId[]>, address: Address, id: DelegationId): void {
    const ids = index.get(address);
    const position = ids?.indexOf(id) ?? -1;
    if (ids === undefined || position === -1) {
      throw new Error(`Delegation ${String(id)} missing from index of "${address}"`);
    }
    const last = ids.pop();
    if (position < ids.length && last !== undefined) {
      ids[position] = last;
    }
    if (ids.length === 0) {
      index.delete(address);
    }
  }

  private _importIndex(
    index: Map<Address, DelegationId[]>,
    entries: readonly IndexEntry[],
    partyOf: (record: DelegationRecord) => Address,
  ): void {
    for (const entry of entries) {
      for (const id of entry.ids) {
        const record = this._records.get(id);
        if (record === undefined || partyOf(record) !== entry.address) {
          throw new Error(`Index entry ${String(id)} for "${entry.address}" has no matching delegation`);
        }
      }
      if (entry.ids.length > 0) {
        index.set(entry.address, [...entry.ids]);
      }
    }
  }
}

function exportIndex(index: Map<Address, DelegationId[]>): IndexEntry[] {
  return [...index.entries()].map(([address, ids]) => ({ address, ids: [...ids] }));
}

function toSnapshotRecord(record: DelegationRecord): DelegationSnapshotRecord {
  return {
    ...record,
    ratePerSecond: record.ratePerSecond.toString(),
    settledAccrued: record.settledAccrued.toString(),
    withdrawn: record.withdrawn.toString(),
  };
}

function fromSnapshotRecord(raw: DelegationSnapshotRecord): DelegationRecord {
  return {
    ...raw,
    ratePerSecond: parseBaseUnits(raw.ratePerSecond),
    settledAccrued: parseBaseUnits(raw.settledAccrued),
    withdrawn: parseBaseUnits(raw.withdrawn),
  };
}
