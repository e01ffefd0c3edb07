import { hashPrefix, PrefixIndex, strideFor } from "./prefix-index.js";
import type { EditOperation } from "./types.js";

export interface DifferOptions {
  /** Bytes searched on either side of each anchor position */
  searchWindow?: number;
  /** Shortest copy worth emitting; shorter matches stay literal */
  minMatch?: number;
  /** Shortest repeated-byte run worth emitting */
  minRun?: number;
  /** Candidate positions examined per anchor */
  maxCandidates?: number;
  /** Look for back-references into already produced target bytes */
  targetCopies?: boolean;
  /** Most positions indexed per buffer; larger inputs index every n-th position */
  indexLimit?: number;
}

export const DEFAULT_DIFFER_OPTIONS: Readonly<Required<DifferOptions>> = {
  searchWindow: 4096,
  minMatch: 4,
  minRun: 4,
  maxCandidates: 64,
  targetCopies: true,
  indexLimit: 1 << 20,
};

type Candidate =
  | { type: "run"; len: number }
  | { type: "source-copy"; start: number; len: number }
  | { type: "target-copy"; start: number; len: number };

function matchLength(
  a: Uint8Array,
  aPos: number,
  b: Uint8Array,
  bPos: number,
  limit: number,
): number {
  let len = 0;
  while (len < limit && a[aPos + len] === b[bPos + len]) {
    len++;
  }
  return len;
}

function longer(current: Candidate | undefined, candidate: Candidate): Candidate {
  return !current || candidate.len > current.len ? candidate : current;
}

function resolveOptions(options: DifferOptions): Required<DifferOptions> {
  const resolved = { ...DEFAULT_DIFFER_OPTIONS, ...options };
  for (const key of ["searchWindow", "minMatch", "minRun", "maxCandidates", "indexLimit"] as const) {
    const value = resolved[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(`${key} must be a positive integer, got ${value}`);
    }
  }
  return resolved;
}

/**
 * Compute the edit operations that turn `source` into `target`.
 *
 * Greedy left-to-right scan. At each target position the longest of these wins:
 * the unchanged bytes at the same offset, a run of one repeated byte, a source
 * match near the same offset or near the end of the previous source copy, and
 * a match in the target bytes already scanned. Ties go to the candidate listed
 * first. When nothing reaches the minimum length the byte joins the pending
 * literal.
 *
 * Inputs longer than `indexLimit` are indexed at block-aligned positions only.
 * A match found from an aligned position is then extended backward over the
 * pending literal, so shifted content is still picked up whole.
 *
 * The search is bounded by `searchWindow` and `maxCandidates`, so the output is
 * a good delta rather than a minimal one. Identical inputs always produce
 * identical operations.
 */
export function* diffBinary(
  source: Uint8Array,
  target: Uint8Array,
  options: DifferOptions = {},
): Generator<EditOperation> {
  const { searchWindow, minMatch, minRun, maxCandidates, targetCopies, indexLimit } =
    resolveOptions(options);
  const targetLen = target.length;

  const sourceIndex = new PrefixIndex(
    source,
    minMatch,
    strideFor(source.length, indexLimit),
  ).addAll();
  const targetIndex = targetCopies
    ? new PrefixIndex(target, minMatch, strideFor(targetLen, indexLimit)).addAll()
    : undefined;

  let sourceCursor = 0;
  let targetCursor = 0;
  let literalStart = -1;
  let t = 0;

  function* flushLiteral(end: number): Generator<EditOperation> {
    if (literalStart >= 0) {
      yield { type: "literal", offset: literalStart, data: target.subarray(literalStart, end) };
      literalStart = -1;
    }
  }

  while (t < targetLen) {
    const remaining = targetLen - t;
    let best: Candidate | undefined;

    // Unchanged bytes in place
    if (t < source.length) {
      const len = matchLength(source, t, target, t, Math.min(source.length - t, remaining));
      if (len >= minMatch) {
        best = longer(best, { type: "source-copy", start: t, len });
      }
    }

    const value = target[t];
    let runLen = 1;
    while (runLen < remaining && target[t + runLen] === value) {
      runLen++;
    }
    if (runLen >= minRun) {
      best = longer(best, { type: "run", len: runLen });
    }

    if (remaining >= minMatch) {
      const key = hashPrefix(target, t, minMatch);

      for (const anchor of [t, sourceCursor]) {
        for (const s of sourceIndex.window(
          key,
          anchor - searchWindow,
          anchor + searchWindow,
          maxCandidates,
        )) {
          if (s === t) continue;
          const len = matchLength(source, s, target, t, Math.min(source.length - s, remaining));
          if (len >= minMatch) {
            best = longer(best, { type: "source-copy", start: s, len });
          }
        }
      }

      if (targetIndex) {
        for (const anchor of [t, targetCursor]) {
          for (const p of targetIndex.window(
            key,
            anchor - searchWindow,
            Math.min(anchor + searchWindow, t - 1),
            maxCandidates,
          )) {
            const len = matchLength(target, p, target, t, remaining);
            if (len >= minMatch) {
              best = longer(best, { type: "target-copy", start: p, len });
            }
          }
        }
      }
    }

    if (!best) {
      if (literalStart < 0) {
        literalStart = t;
      }
      t++;
      continue;
    }

    if (best.type === "run") {
      yield* flushLiteral(t);
      yield { type: "run", offset: t, value, len: best.len };
      t += best.len;
      continue;
    }

    // Take back literal bytes that precede the match in its own buffer
    const from = best.type === "source-copy" ? source : target;
    let back = 0;
    while (
      literalStart >= 0 &&
      back < t - literalStart &&
      back < best.start &&
      from[best.start - back - 1] === target[t - back - 1]
    ) {
      back++;
    }
    const start = best.start - back;
    const len = best.len + back;
    if (literalStart === t - back) {
      literalStart = -1;
    }
    yield* flushLiteral(t - back);

    if (best.type === "source-copy") {
      yield { type: "source-copy", start, len };
      sourceCursor = start + len;
    } else {
      yield { type: "target-copy", start, len };
      targetCursor = start + len;
    }
    t += best.len;
  }

  yield* flushLiteral(targetLen);
}
