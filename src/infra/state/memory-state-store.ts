import type { StateStore, SymbolStateRecord } from "../../core/ledger/state-store";
import { decodeStateRecord, encodeStateRecord, type PersistedState } from "./state-codec";

/**
 * 内存状态存储，用于回测。按落盘格式保存副本，读写语义与文件存储一致。
 */
export class MemoryStateStore implements StateStore {
  public readonly kind = "memory";
  private readonly records = new Map<string, PersistedState>();

  public async load(symbol: string): Promise<SymbolStateRecord | null> {
    const stored = this.records.get(symbol);
    return stored ? decodeStateRecord(stored) : null;
  }

  public async save(record: SymbolStateRecord): Promise<void> {
    this.records.set(record.symbol, encodeStateRecord(record));
  }
}
