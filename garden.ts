import {
  type Grid,
  Pos2,
  assert,
  cellAt,
  gridHeight,
  gridWidth,
  iota,
  printGrid,
  sum,
  validateGrid,
} from "./common";
import {
  type EdgeStatus,
  type EdgeStatuses,
  ORIENTATIONS,
  type Orientation,
  classifyEdges,
  isBoundary,
  neighbor,
} from "./edges";
import { countSides } from "./sides";

export class VisitedCell {
  constructor(
    public readonly at: Pos2,
    public readonly plant: string,
    public readonly edges: EdgeStatuses
  ) {}

  public edge(o: Orientation): EdgeStatus {
    return this.edges[o];
  }

  public boundaryCount(): number {
    return this.edges.filter(isBoundary).length;
  }
}

export type PriceMode = "perimeter" | "sides";

/**
 * A maximal 4-connected set of cells holding the same plant.
 */
export class Region {
  private readonly byPos: ReadonlyMap<Pos2, VisitedCell>;

  constructor(
    public readonly plant: string,
    public readonly cells: readonly VisitedCell[]
  ) {
    this.byPos = new Map(cells.map((cell) => [cell.at, cell] as const));
  }

  public cellAt(p: Pos2): VisitedCell | undefined {
    return this.byPos.get(p);
  }

  public area(): number {
    return this.cells.length;
  }

  public perimeter(): number {
    return sum(this.cells.map((cell) => cell.boundaryCount()));
  }

  public numberOfSides(): number {
    return countSides(this);
  }

  public price(mode: PriceMode): number {
    return (
      this.area() *
      (mode === "perimeter" ? this.perimeter() : this.numberOfSides())
    );
  }

  public toString(): string {
    return printGrid(
      new Map(this.cells.map((cell) => [cell.at, cell.plant] as const))
    );
  }
}

/**
 * One flag per cell, shared by every region built during a partition.
 */
export class VisitedGrid {
  private readonly flags: boolean[][];

  constructor(grid: Grid) {
    this.flags = iota(gridHeight(grid)).map(() =>
      iota(gridWidth(grid)).map(() => false)
    );
  }

  public has(p: Pos2): boolean {
    return this.flags[p.y][p.x];
  }

  public mark(p: Pos2): void {
    this.flags[p.y][p.x] = true;
  }
}

// Flood fill over a grid that has already been validated.
function fillRegion(seed: Pos2, grid: Grid, visited: VisitedGrid): Region {
  const plant = cellAt(grid, seed);
  assert(
    !visited.has(seed),
    "seed already belongs to a region:",
    seed.toString()
  );

  const cells: VisitedCell[] = [];
  const pending: Pos2[] = [seed];
  visited.mark(seed);

  for (let at = pending.pop(); at !== undefined; at = pending.pop()) {
    const edges: [EdgeStatus, EdgeStatus, EdgeStatus, EdgeStatus] = [
      ...classifyEdges(at, plant, grid, (p) => visited.has(p)),
    ];
    for (const o of ORIENTATIONS) {
      if (edges[o] !== "available") {
        continue;
      }
      const next = neighbor(at, o);
      visited.mark(next);
      pending.push(next);
      edges[o] = "visited";
    }
    cells.push(new VisitedCell(at, plant, edges));
  }

  return new Region(plant, cells);
}

/**
 * Flood-fills the region containing `seed`.
 *
 * Cells are marked visited as soon as they are pushed onto the work stack, so
 * each one is entered once. Edge statuses are computed when a cell is entered;
 * the edge used to reach a newly found neighbor is recorded as "visited", and
 * the neighbor sees the reciprocal edge as "visited" when its own turn comes.
 * Once the stack is empty no edge is left "available".
 */
export function buildRegion(
  seed: Pos2,
  rows: Grid,
  visited?: VisitedGrid
): Region {
  const grid = validateGrid(rows);
  return fillRegion(seed, grid, visited ?? new VisitedGrid(grid));
}

/**
 * Splits the whole map into regions, in row-major order of their first cell.
 */
export function partitionGarden(rows: Grid): Region[] {
  const grid = validateGrid(rows);
  const visited = new VisitedGrid(grid);
  const regions: Region[] = [];
  for (let y = 0; y < gridHeight(grid); y++) {
    for (let x = 0; x < gridWidth(grid); x++) {
      const p = new Pos2(x, y);
      if (visited.has(p)) {
        continue;
      }
      regions.push(fillRegion(p, grid, visited));
    }
  }
  return regions;
}

export function totalFencePrice(
  regions: readonly Region[],
  usesSides: boolean
): number {
  const mode: PriceMode = usesSides ? "sides" : "perimeter";
  return sum(regions.map((region) => region.price(mode)));
}

/**
 * All the regions growing one kind of plant.
 */
export class GardenGroup {
  private readonly members: Region[] = [];

  constructor(public readonly plant: string) {}

  public get regions(): readonly Region[] {
    return this.members;
  }

  public add(region: Region): void {
    assert(
      region.plant === this.plant,
      "wrong plant for group:",
      region.plant
    );
    this.members.push(region);
  }

  public price(mode: PriceMode): number {
    return sum(this.members.map((region) => region.price(mode)));
  }
}

export function groupByPlant(
  regions: readonly Region[]
): Map<string, GardenGroup> {
  const groups = new Map<string, GardenGroup>();
  for (const region of regions) {
    let group = groups.get(region.plant);
    if (!group) {
      group = new GardenGroup(region.plant);
      groups.set(region.plant, group);
    }
    group.add(region);
  }
  return groups;
}
