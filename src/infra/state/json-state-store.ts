import { randomBytes } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import path from "node:path";
import { PersistenceError } from "../../core/errors";
import type { StateStore, SymbolStateRecord } from "../../core/ledger/state-store";
import { decodeStateRecord, encodeStateRecord } from "./state-codec";

/**
 * JSON 文件状态存储：每个交易对一个文件，便于人工查看。
 * 写入流程为 临时文件 → fsync → rename，重启读取时不会看到写了一半的记录。
 */
export class JsonFileStateStore implements StateStore {
  public readonly kind = "json";
  private readonly dir: string;
  private dirReady: Promise<void> | null = null;

  constructor(dir: string) {
    this.dir = path.resolve(process.cwd(), dir);
  }

  /**
   * 交易对对应的状态文件路径。
   */
  public filePathFor(symbol: string): string {
    const safe = symbol.replace(/[^A-Za-z0-9_-]/g, "_");
    return path.join(this.dir, `${safe}.json`);
  }

  public async load(symbol: string): Promise<SymbolStateRecord | null> {
    const filePath = this.filePathFor(symbol);
    let content: string;
    try {
      content = await readFile(filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new PersistenceError(`读取状态文件失败: ${filePath}`, { cause: error });
    }
    try {
      const record = decodeStateRecord(JSON.parse(content));
      if (record.symbol !== symbol) {
        throw new Error(`文件内交易对 ${record.symbol} 与预期 ${symbol} 不一致`);
      }
      return record;
    } catch (error) {
      throw new PersistenceError(`状态文件损坏: ${filePath}`, { cause: error });
    }
  }

  public async save(record: SymbolStateRecord): Promise<void> {
    const filePath = this.filePathFor(record.symbol);
    const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
    const content = `${JSON.stringify(encodeStateRecord(record), null, 2)}\n`;
    try {
      await this.ensureDir();
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(content, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, filePath);
      await this.syncDir();
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new PersistenceError(`写入状态文件失败: ${filePath}`, { cause: error });
    }
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.dirReady;
  }

  /**
   * rename 之后同步目录项，保证掉电后文件名指向新内容。Windows 不支持打开目录。
   */
  private async syncDir(): Promise<void> {
    if (process.platform === "win32") {
      return;
    }
    const handle = await open(this.dir, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
