import path from 'path';
import { withCounter } from './path';

/**
 * Hands out destination paths that collide neither with files already on
 * disk nor with destinations claimed earlier in the same plan. Claims are
 * deterministic: the same occupied set and the same claim order always
 * produce the same paths.
 */
export class PathAllocator {
  private readonly occupied: Set<string>;

  constructor(
    occupied: Iterable<string>,
    private readonly separator: string,
  ) {
    this.occupied = new Set(Array.from(occupied, (entry) => path.resolve(entry)));
  }

  isOccupied(targetPath: string) {
    return this.occupied.has(path.resolve(targetPath));
  }

  /** Claims `targetPath` itself when free, otherwise the first free variant of it. */
  claimPath(targetPath: string): string {
    return this.claim(path.dirname(targetPath), path.basename(targetPath));
  }

  /**
   * Claims `<dir>/<name>`, or the first free `<dir>/<stem><sep><n><ext>` when
   * that is taken.
   */
  claim(dir: string, name: string): string {
    let candidate = path.resolve(dir, name);
    let counter = 1;
    while (this.occupied.has(candidate)) {
      candidate = path.resolve(dir, withCounter(name, counter, this.separator));
      counter += 1;
    }
    this.occupied.add(candidate);
    return candidate;
  }
}
