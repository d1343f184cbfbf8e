/**
 * Sequence similarity - ratio of matching characters to total length
 *
 * Matching blocks are found by repeatedly taking the longest common run
 * (earliest in `a`, then earliest in `b` on ties) and recursing on both sides.
 * No junk heuristics: inputs here are single words.
 */

interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j]);
    if (list) {
      list.push(j);
    } else {
      positions.set(b[j], [j]);
    }
  }
  return positions;
}

function findLongestMatch(
  a: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): MatchingBlock {
  let best: MatchingBlock = { a: aLo, b: bLo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, size);
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }
    runs = nextRuns;
  }

  return best;
}

/**
 * Total number of characters in matching blocks
 */
export function countMatches(a: string, b: string): number {
  const positions = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matches = 0;

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    const block = findLongestMatch(a, positions, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    matches += block.size;
    if (aLo < block.a && bLo < block.b) {
      queue.push([aLo, block.a, bLo, block.b]);
    }
    if (block.a + block.size < aHi && block.b + block.size < bHi) {
      queue.push([block.a + block.size, aHi, block.b + block.size, bHi]);
    }
  }

  return matches;
}

/**
 * Similarity in [0, 1]: 2 * matches / (len(a) + len(b)). Two empty strings score 1.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatches(a, b)) / total;
}
