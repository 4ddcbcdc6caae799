/**
 * Diffs aggregated per file, in production order.
 */

export class ChangeSet {
  private readonly byFile = new Map<string, string[]>();

  add(relPath: string, diff: string): void {
    const diffs = this.byFile.get(relPath);
    if (diffs) {
      diffs.push(diff);
    } else {
      this.byFile.set(relPath, [diff]);
    }
  }

  get size(): number {
    return this.byFile.size;
  }

  /**
   * Files in first-touched order, each with its diffs in the order produced.
   */
  entries(): Array<[string, string[]]> {
    return [...this.byFile.entries()].map(([relPath, diffs]) => [relPath, [...diffs]]);
  }

  clear(): void {
    this.byFile.clear();
  }
}
