/**
 * Per-category {safe, unsafe} tallies.
 */

export const COUNTER_CATEGORIES = ["functions", "exprs", "itemImpls", "itemTraits", "methods"] as const;
export type CounterCategory = (typeof COUNTER_CATEGORIES)[number];

export interface Count {
  safe: number;
  unsafe: number;
}

export type CounterBlock = Record<CounterCategory, Count>;

export function emptyCounters(): CounterBlock {
  return {
    functions: { safe: 0, unsafe: 0 },
    exprs: { safe: 0, unsafe: 0 },
    itemImpls: { safe: 0, unsafe: 0 },
    itemTraits: { safe: 0, unsafe: 0 },
    methods: { safe: 0, unsafe: 0 },
  };
}

/** Record one occurrence. Mutates `block`. */
export function countInto(block: CounterBlock, category: CounterCategory, isUnsafe: boolean): void {
  if (isUnsafe) block[category].unsafe += 1;
  else block[category].safe += 1;
}

/** Sum of two blocks; neither input is modified. */
export function addCounters(a: CounterBlock, b: CounterBlock): CounterBlock {
  const out = emptyCounters();
  for (const cat of COUNTER_CATEGORIES) {
    out[cat].safe = a[cat].safe + b[cat].safe;
    out[cat].unsafe = a[cat].unsafe + b[cat].unsafe;
  }
  return out;
}

export function sumCounters(blocks: Iterable<CounterBlock>): CounterBlock {
  let total = emptyCounters();
  for (const b of blocks) total = addCounters(total, b);
  return total;
}

export function totals(block: CounterBlock): Count {
  let safe = 0;
  let unsafe = 0;
  for (const cat of COUNTER_CATEGORIES) {
    safe += block[cat].safe;
    unsafe += block[cat].unsafe;
  }
  return { safe, unsafe };
}

/** unsafe / (safe + unsafe) over every category; 0 for an empty block. */
export function unsafeRatio(block: CounterBlock): number {
  const { safe, unsafe } = totals(block);
  const all = safe + unsafe;
  return all === 0 ? 0 : unsafe / all;
}
