import { describe, it } from "node:test";
import assert from "node:assert";

import {
  SortOrder,
  SymbolList,
  analyzeFrequencies,
  buildCodes,
  buildTree,
  countSymbols,
  createCodeTable,
  isPrefixFree,
} from "../../src/index";
import type { SymbolCode } from "../../src/index";
import { bytes, codeMap, fibonacciBytes, pseudoRandomBytes } from "../common/utils";

function codesOf(input: Uint8Array): SymbolCode[] {
  const { list } = analyzeFrequencies(input);
  list.sort(SortOrder.FREQUENCY);
  return buildCodes(buildTree(list));
}

function skewedText(): Uint8Array {
  const parts: string[] = [];
  "etaoinshrdlu".split("").forEach((ch, i) => parts.push(ch.repeat(3 * (12 - i) + (i % 3))));
  return bytes(parts.join(""));
}

describe("Code generator", () => {
  it("assigns AAAAABBBCC one 1-bit and two 2-bit codes", () => {
    const codes = codesOf(bytes("AAAAABBBCC"));
    assert.deepStrictEqual(
      codes.map((code) => code.symbol),
      [0x43, 0x42, 0x41],
    );
    assert.deepStrictEqual(codeMap(codes), { A: "1", B: "01", C: "00" });
    assert.deepStrictEqual(
      codes.map((code) => code.length),
      [2, 2, 1],
    );
  });

  it("gives a single symbol an empty code", () => {
    const codes = buildCodes(buildTree(SymbolList.fromFrequencies([{ symbol: 0x5a, frequency: 5 }])));
    assert.strictEqual(codes.length, 1);
    assert.strictEqual(codes[0].symbol, 0x5a);
    assert.strictEqual(codes[0].length, 0);
    assert.strictEqual(codes[0].bits.length, 0);
  });

  it("follows the tie-broken merge order for {a:5, b:5, c:2}", () => {
    assert.deepStrictEqual(codeMap(codesOf(bytes("aaaaabbbbbcc"))), { a: "11", b: "0", c: "10" });
  });

  it("produces prefix-free tables", () => {
    for (const input of [pseudoRandomBytes(10000, 11), pseudoRandomBytes(777, 5, 9), fibonacciBytes(16), skewedText()]) {
      const codes = codesOf(input);
      assert.strictEqual(codes.length, new Set(input).size);
      assert.ok(isPrefixFree(codes));
    }
  });

  it("isPrefixFree spots a code that prefixes another", () => {
    const codes: SymbolCode[] = [
      { symbol: 1, bits: Uint8Array.from([0]), length: 1 },
      { symbol: 2, bits: Uint8Array.from([0, 1]), length: 2 },
    ];
    assert.strictEqual(isPrefixFree(codes), false);
  });

  it("never gives a rarer symbol a shorter code", () => {
    for (const input of [skewedText(), fibonacciBytes(14), pseudoRandomBytes(5000, 21, 30)]) {
      const counts = countSymbols(input);
      const codes = codesOf(input);
      for (const x of codes) {
        for (const y of codes) {
          if (counts[x.symbol] < counts[y.symbol]) {
            assert.ok(x.length >= y.length, `symbol ${x.symbol} shorter than more frequent ${y.symbol}`);
          }
        }
      }
    }
  });

  it("indexes codes by symbol", () => {
    const codes = codesOf(bytes("AAAAABBBCC"));
    const table = createCodeTable(codes);
    assert.strictEqual(table.length, 256);
    assert.strictEqual(table[0x41], codes[2]);
    assert.strictEqual(table[0x43], codes[0]);
    assert.strictEqual(table[0x44], undefined);
  });
});
