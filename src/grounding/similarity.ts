// ============================================
// Gestalt (Ratcliff/Obershelp) string similarity
// ratio = 2 * matched / (len(a) + len(b)), in [0, 1]
// ============================================

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

/** Longest common substring of a[aLo..aHi) and b[bLo..bHi); earliest on ties. */
function longestMatch(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  // lengths[j] = length of the common suffix ending at a[i-1], b[j-1]
  let prev = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const next = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = (prev[j - bLo] ?? 0) + 1;
      next[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    prev = next;
  }

  return best;
}

function matchedCharacters(a: string, b: string): number {
  let total = 0;
  const stack: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (stack.length > 0) {
    const range = stack.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    total += block.size;
    stack.push([aLo, block.aStart, bLo, block.bStart]);
    stack.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
  }

  return total;
}

export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchedCharacters(a, b)) / length;
}
