import { describe, it } from "node:test";
import assert from "node:assert";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

const ROOT = path.join(__dirname, "..", "..");

// Shell-style: `*` matches within one path segment.
function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join("[^/]*");
  return new RegExp(`^${source}$`);
}

async function testScriptPatterns(): Promise<RegExp[]> {
  const manifest: { scripts?: Record<string, string> } = JSON.parse(
    await readFile(path.join(ROOT, "package.json"), "utf8"),
  );
  const script = manifest.scripts?.test ?? "";
  return script
    .split(/\s+/)
    .filter((arg) => arg.startsWith("test/"))
    .map(globToRegExp);
}

describe("test suites", () => {
  it("the test script selects suites by pattern", async () => {
    const patterns = await testScriptPatterns();
    assert.deepStrictEqual(
      patterns.map((pattern) => pattern.test("test/encode/test-codes.ts")),
      [true, false],
    );
    assert.ok(!patterns.some((pattern) => pattern.test("test/common/utils.ts")));
  });

  it("every suite file is picked up by the test script", async () => {
    const patterns = await testScriptPatterns();
    const testDir = path.join(ROOT, "test");
    for (const entry of await readdir(testDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || entry.name == "common") {
        continue;
      }
      for (const file of await readdir(path.join(testDir, entry.name))) {
        if (!file.endsWith(".ts")) {
          continue;
        }
        const relative = `test/${entry.name}/${file}`;
        assert.ok(
          patterns.some((pattern) => pattern.test(relative)),
          `${relative} is not matched by the test script`,
        );
      }
    }
  });
});
