import { type IncRange, Pos2, rangeOverlaps } from "./common";
import {
  ORIENTATIONS,
  Orientation,
  isBoundary,
  orientationName,
} from "./edges";
import type { Region } from "./garden";

function isHorizontal(o: Orientation): boolean {
  return o === Orientation.Up || o === Orientation.Down;
}

// Where a cell sits along a fence of orientation `o`.
function along(p: Pos2, o: Orientation): number {
  return isHorizontal(o) ? p.x : p.y;
}

// The line (row or column) a fence of orientation `o` runs on.
function across(p: Pos2, o: Orientation): number {
  return isHorizontal(o) ? p.y : p.x;
}

function cellOnLine(o: Orientation, line: number, offset: number): Pos2 {
  return isHorizontal(o) ? new Pos2(offset, line) : new Pos2(line, offset);
}

function lineKey(o: Orientation, line: number): string {
  return `${o}:${line}`;
}

/**
 * A straight run of fence facing one way, from the edge of `start` to the edge
 * of `end`.
 */
export class Side {
  constructor(
    public readonly orientation: Orientation,
    public readonly start: Pos2,
    public readonly end: Pos2
  ) {}

  public get line(): number {
    return across(this.start, this.orientation);
  }

  public span(): IncRange {
    return {
      lo: along(this.start, this.orientation),
      hi: along(this.end, this.orientation),
    };
  }

  public length(): number {
    const { lo, hi } = this.span();
    return hi - lo + 1;
  }

  /**
   * Two sides are the same side when they face the same way on the same line
   * and their spans overlap. A gap between them is not bridged.
   */
  public sameSideAs(other: Side): boolean {
    if (other.orientation !== this.orientation) {
      return false;
    }
    if (other.start === this.start && other.end === this.end) {
      return true;
    }
    if (other.line !== this.line) {
      return false;
    }
    return rangeOverlaps(this.span(), other.span());
  }

  public toString(): string {
    return `${orientationName(this.orientation)} ${this.start}..${this.end}`;
  }
}

/**
 * Merges the boundary edges of `region` into sides.
 *
 * Every boundary edge proposes a side running from its own cell as far as the
 * fence continues in the same direction. Proposals that overlap a side already
 * found on the same line are dropped, so each run is counted once however many
 * of its cells propose it.
 */
export function regionSides(region: Region): Side[] {
  const fences = new Map<string, Set<number>>();
  for (const cell of region.cells) {
    for (const o of ORIENTATIONS) {
      if (!isBoundary(cell.edge(o))) {
        continue;
      }
      const key = lineKey(o, across(cell.at, o));
      const offsets = fences.get(key) ?? new Set<number>();
      offsets.add(along(cell.at, o));
      fences.set(key, offsets);
    }
  }

  const kept = new Map<string, Side[]>();
  const sides: Side[] = [];
  for (const cell of region.cells) {
    for (const o of ORIENTATIONS) {
      if (!isBoundary(cell.edge(o))) {
        continue;
      }
      const line = across(cell.at, o);
      const key = lineKey(o, line);
      const offsets = fences.get(key) ?? new Set<number>();
      let end = along(cell.at, o);
      while (offsets.has(end + 1)) {
        end++;
      }
      const candidate = new Side(o, cell.at, cellOnLine(o, line, end));

      const onLine = kept.get(key) ?? [];
      if (onLine.some((side) => side.sameSideAs(candidate))) {
        continue;
      }
      onLine.push(candidate);
      kept.set(key, onLine);
      sides.push(candidate);
    }
  }
  return sides;
}

export function countSides(region: Region): number {
  return regionSides(region).length;
}
