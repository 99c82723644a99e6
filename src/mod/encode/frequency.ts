import { NUM_SYMBOLS } from "../common/constants";
import { SymbolList } from "../common/symbol-list";

export interface FrequencyAnalysis {
  list: SymbolList;
  counts: Uint32Array;
  length: number;
}

export function countSymbols(input: Uint8Array): Uint32Array {
  const counts = new Uint32Array(NUM_SYMBOLS);
  for (let i = 0; i < input.length; i++) {
    counts[input[i]]++;
  }
  return counts;
}

/**
 * One pass over `input`. The returned list holds one leaf per distinct byte in
 * ascending symbol order and is not yet sorted by frequency.
 */
export function analyzeFrequencies(input: Uint8Array): FrequencyAnalysis {
  const counts = countSymbols(input);
  const list = new SymbolList();
  for (let symbol = 0; symbol < NUM_SYMBOLS; symbol++) {
    if (counts[symbol] != 0) {
      list.append(symbol, counts[symbol]);
    }
  }
  return { list, counts, length: input.length };
}
