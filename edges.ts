import { type Grid, Pos2, cellAt, inGrid } from "./common";

/**
 * The four edges of a cell. The numbering is used to index `EdgeStatuses`.
 */
export const Orientation = {
  Up: 0,
  Down: 1,
  Left: 2,
  Right: 3,
} as const;
export type Orientation = (typeof Orientation)[keyof typeof Orientation];

export const ORIENTATIONS: readonly Orientation[] = [
  Orientation.Up,
  Orientation.Down,
  Orientation.Left,
  Orientation.Right,
];

// Unit steps, in `Orientation` order.
const STEPS: readonly Pos2[] = [
  new Pos2(0, -1),
  new Pos2(0, 1),
  new Pos2(-1, 0),
  new Pos2(1, 0),
];

export function orientationName(o: Orientation): string {
  return ["up", "down", "left", "right"][o];
}

export function neighbor(p: Pos2, o: Orientation): Pos2 {
  return p.add(STEPS[o]);
}

export type EdgeStatus =
  | "out-of-bounds"
  | "different-type"
  | "available"
  | "visited";

export type EdgeStatuses = readonly [
  EdgeStatus,
  EdgeStatus,
  EdgeStatus,
  EdgeStatus
];

/**
 * Edges which need a fence: the neighbor is off the map or holds another plant.
 */
export function isBoundary(status: EdgeStatus): boolean {
  return status === "out-of-bounds" || status === "different-type";
}

/**
 * Classifies each edge of `at` as seen from a region growing `plant`.
 */
export function classifyEdges(
  at: Pos2,
  plant: string,
  grid: Grid,
  isVisited: (p: Pos2) => boolean
): EdgeStatuses {
  const classify = (o: Orientation): EdgeStatus => {
    const n = neighbor(at, o);
    if (!inGrid(grid, n)) {
      return "out-of-bounds";
    }
    if (cellAt(grid, n) !== plant) {
      return "different-type";
    }
    return isVisited(n) ? "visited" : "available";
  };
  return [
    classify(Orientation.Up),
    classify(Orientation.Down),
    classify(Orientation.Left),
    classify(Orientation.Right),
  ];
}
