import assert from "node:assert/strict";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { describe, it } from "node:test";
import { z } from "zod";

const ROOT = path.resolve(__dirname, "..");

const packageSchema = z.object({
  scripts: z.object({ test: z.string() }),
});

async function findTestFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        return findTestFiles(fullPath);
      }
      return entry.name.endsWith(".test.ts") ? [fullPath] : [];
    })
  );
  return nested.flat();
}

describe("npm test 脚本", () => {
  it("逐个列出 src 下的全部测试文件", async () => {
    const raw: unknown = JSON.parse(await readFile(path.join(ROOT, "package.json"), "utf8"));
    const script = packageSchema.parse(raw).scripts.test;
    const listed = script
      .split(/\s+/)
      .filter((token) => token.endsWith(".test.ts"))
      .sort();
    const found = (await findTestFiles(path.join(ROOT, "src")))
      .map((file) => path.relative(ROOT, file).split(path.sep).join("/"))
      .sort();

    assert.deepEqual(listed, found);
  });
});
