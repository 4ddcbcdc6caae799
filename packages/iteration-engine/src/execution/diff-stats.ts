/**
 * Line-level diff between file versions, for change reporting.
 * Pure implementation, no external dependencies.
 */

type DiffOp = { op: '+' | '-' | ' '; line: string };

function splitLines(text: string): string[] {
  if (!text) {
    return [];
  }
  const lines = text.split('\n');
  // Drop the empty element produced by a trailing newline
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * LCS-based line diff.
 */
export function lineDiff(oldText: string, newText: string): DiffOp[] {
  const a = splitLines(oldText);
  const b = splitLines(newText);
  const m = a.length;
  const n = b.length;

  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let i = 1; i <= m; i++) {
    const row = dp[i] ?? [];
    const prev = dp[i - 1] ?? [];
    for (let j = 1; j <= n; j++) {
      row[j] = a[i - 1] === b[j - 1] ? (prev[j - 1] ?? 0) + 1 : Math.max(prev[j] ?? 0, row[j - 1] ?? 0);
    }
  }

  const ops: DiffOp[] = [];
  let i = m;
  let j = n;
  while (i > 0 || j > 0) {
    const oldLine = a[i - 1];
    const newLine = b[j - 1];
    if (i > 0 && j > 0 && oldLine === newLine && oldLine !== undefined) {
      ops.push({ op: ' ', line: oldLine });
      i--;
      j--;
    } else if (j > 0 && newLine !== undefined && (i === 0 || (dp[i]?.[j - 1] ?? 0) >= (dp[i - 1]?.[j] ?? 0))) {
      ops.push({ op: '+', line: newLine });
      j--;
    } else if (oldLine !== undefined) {
      ops.push({ op: '-', line: oldLine });
      i--;
    } else {
      break;
    }
  }

  return ops.reverse();
}

export interface LineStats {
  added: number;
  removed: number;
}

export function diffLineStats(oldText: string, newText: string): LineStats {
  let added = 0;
  let removed = 0;
  for (const { op } of lineDiff(oldText, newText)) {
    if (op === '+') {
      added++;
    } else if (op === '-') {
      removed++;
    }
  }
  return { added, removed };
}

/**
 * Unified diff of the whole file as a single hunk, for debug logs.
 */
export function generateUnifiedDiff(filePath: string, oldText: string, newText: string): string {
  const ops = lineDiff(oldText, newText);
  const oldCount = ops.filter((o) => o.op !== '+').length;
  const newCount = ops.filter((o) => o.op !== '-').length;
  const header = `--- ${filePath}\t(before)\n+++ ${filePath}\t(after)\n`;
  const hunk = `@@ -${oldCount === 0 ? 0 : 1},${oldCount} +${newCount === 0 ? 0 : 1},${newCount} @@\n`;
  return header + hunk + ops.map((o) => `${o.op}${o.line}\n`).join('');
}
