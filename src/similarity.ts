interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

type PositionMap = Map<string, number[]>;

function indexPositions(text: string): PositionMap {
  const positions: PositionMap = new Map();

  for (let j = 0; j < text.length; j++) {
    const char = text[j];
    const list = positions.get(char);

    if (list) {
      list.push(j);
    } else {
      positions.set(char, [j]);
    }
  }

  return positions;
}

function findLongestMatch(
  a: string,
  positionsInB: PositionMap,
  aLow: number,
  aHigh: number,
  bLow: number,
  bHigh: number
): MatchingBlock {
  let best: MatchingBlock = { a: aLow, b: bLow, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = aLow; i < aHigh; i++) {
    const next = new Map<number, number>();

    for (const j of positionsInB.get(a[i]) ?? []) {
      if (j < bLow) {
        continue;
      }

      if (j >= bHigh) {
        break;
      }

      const size = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);

      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }

    runLengths = next;
  }

  return best;
}

/**
 * Total length of the contiguous blocks shared by `a` and `b`, found the
 * Ratcliff/Obershelp way: take the longest common block, then recurse on
 * the unmatched text to its left and to its right.
 */
export function countMatchingCharacters(a: string, b: string): number {
  const positionsInB = indexPositions(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (pending.length > 0) {
    const range = pending.pop();

    if (!range) {
      break;
    }

    const [aLow, aHigh, bLow, bHigh] = range;
    const block = findLongestMatch(a, positionsInB, aLow, aHigh, bLow, bHigh);

    if (block.size === 0) {
      continue;
    }

    matched += block.size;

    if (aLow < block.a && bLow < block.b) {
      pending.push([aLow, block.a, bLow, block.b]);
    }

    if (block.a + block.size < aHigh && block.b + block.size < bHigh) {
      pending.push([block.a + block.size, aHigh, block.b + block.size, bHigh]);
    }
  }

  return matched;
}

/**
 * Similarity of two fingerprints in [0, 1]: twice the matched characters
 * over the combined length. Inputs are put in a canonical order first so
 * the score does not depend on argument order.
 */
export function similarity(fpA: string, fpB: string): number {
  if (fpA.length === 0 || fpB.length === 0) {
    return 0;
  }

  if (fpA === fpB) {
    return 1;
  }

  const [first, second] = fpA <= fpB ? [fpA, fpB] : [fpB, fpA];
  const matched = countMatchingCharacters(first, second);

  return (2 * matched) / (first.length + second.length);
}
