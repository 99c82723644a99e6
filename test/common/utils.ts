import assert from "node:assert";

import type { SymbolCode } from "../../src/index";
import { HuffmanError, codeToString, symbolLabel } from "../../src/index";

export function assertArraysEqual(a: Uint8Array, b: Uint8Array, msg = "Arrays differ"): void {
  if (a.length !== b.length) {
    throw new Error(`${msg}: length ${a.length} !== ${b.length}`);
  }
  for (let i = 0; i < a.length; ++i) {
    if (a[i] !== b[i]) {
      throw new Error(`${msg} at byte ${i}: ${a[i]} !== ${b[i]}`);
    }
  }
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

// Deterministic LCG so failures reproduce.
export function pseudoRandomBytes(length: number, seed = 1, alphabet = 256): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed >>> 0;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out[i] = (state >>> 24) % alphabet;
  }
  return out;
}

// Symbol i occurs fib(i + 1) times, which builds a tree with one leaf per level.
export function fibonacciBytes(symbols: number): Uint8Array {
  const parts: number[] = [];
  let a = 1;
  let b = 1;
  for (let symbol = 0; symbol < symbols; symbol++) {
    for (let i = 0; i < a; i++) {
      parts.push(symbol);
    }
    [a, b] = [b, a + b];
  }
  return Uint8Array.from(parts);
}

export function codeMap(codes: ReadonlyArray<SymbolCode>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const code of codes) {
    out[symbolLabel(code.symbol)] = codeToString(code);
  }
  return out;
}

export function isHuffmanError(code: number, pattern?: RegExp): (error: unknown) => boolean {
  return (error: unknown): boolean => {
    assert.ok(error instanceof HuffmanError, `expected HuffmanError, got ${String(error)}`);
    assert.strictEqual(error.code, code);
    if (pattern) {
      assert.match(error.message, pattern);
    }
    return true;
  };
}
