type DiffMark = " " | "-" | "+";

interface DiffOp {
  mark: DiffMark;
  line: string;
  /** Position in the old text where this op applies. */
  a: number;
  /** Position in the new text where this op applies. */
  b: number;
}

const diffOps = (before: string[], after: string[]): DiffOp[] => {
  const rows = before.length + 1;
  const cols = after.length + 1;
  // lcs[i * cols + j] = length of the longest common subsequence of before[i..] and after[j..]
  const lcs = new Uint32Array(rows * cols);
  for (let i = before.length - 1; i >= 0; i -= 1) {
    for (let j = after.length - 1; j >= 0; j -= 1) {
      lcs[i * cols + j] =
        before[i] === after[j]
          ? lcs[(i + 1) * cols + j + 1] + 1
          : Math.max(lcs[(i + 1) * cols + j], lcs[i * cols + j + 1]);
    }
  }
  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;
  while (i < before.length || j < after.length) {
    if (i < before.length && j < after.length && before[i] === after[j]) {
      ops.push({ mark: " ", line: before[i], a: i, b: j });
      i += 1;
      j += 1;
    } else if (j >= after.length || (i < before.length && lcs[(i + 1) * cols + j] >= lcs[i * cols + j + 1])) {
      ops.push({ mark: "-", line: before[i], a: i, b: j });
      i += 1;
    } else {
      ops.push({ mark: "+", line: after[j], a: i, b: j });
      j += 1;
    }
  }
  return ops;
};

const formatRange = (start: number, length: number): string => {
  if (length === 1) return `${start + 1}`;
  if (length === 0) return `${start},0`;
  return `${start + 1},${length}`;
};

/**
 * Unified diff of two line lists with `context` lines around each change. Identical input
 * yields no lines at all.
 */
export const unifiedDiff = (
  before: string[],
  after: string[],
  fromLabel: string,
  toLabel: string,
  context = 3,
): string[] => {
  const ops = diffOps(before, after);
  const changes = ops.flatMap((op, index) => (op.mark === " " ? [] : [index]));
  if (changes.length === 0) return [];

  const hunks: Array<[number, number]> = [];
  let start = Math.max(0, changes[0] - context);
  let last = changes[0];
  for (const index of changes.slice(1)) {
    if (index - last - 1 > context * 2) {
      hunks.push([start, Math.min(ops.length, last + context + 1)]);
      start = index - context;
    }
    last = index;
  }
  hunks.push([start, Math.min(ops.length, last + context + 1)]);

  const lines = [`--- ${fromLabel}`, `+++ ${toLabel}`];
  for (const [from, to] of hunks) {
    const slice = ops.slice(from, to);
    const oldLength = slice.filter((op) => op.mark !== "+").length;
    const newLength = slice.filter((op) => op.mark !== "-").length;
    lines.push(`@@ -${formatRange(slice[0].a, oldLength)} +${formatRange(slice[0].b, newLength)} @@`);
    for (const op of slice) {
      lines.push(`${op.mark}${op.line}`);
    }
  }
  return lines;
};
