import { existsSync, readFileSync } from "fs";
import { z } from "zod";

/**
 * This file contains various utilities for reading input and processing them.
 */

export const processArgs = process.argv.slice(2);

// Read the input (synchronously) from "in.txt", or from wherever `path` says.
export function readInput(path = "in.txt"): string {
  if (!existsSync(path)) {
    throw new Error(`The file ${path} does not exist.`);
  }
  return readFileSync(path, { encoding: "utf8" })
    .replaceAll("\r\n", "\n")
    .trim();
}

// You can disable debug prints to speed things up.
export let debugOn = true;

export function debug<T>(item: T, ...args: readonly unknown[]) {
  if (debugOn) {
    console.info(item, ...args);
  }
  return item;
}

export function disableDebug(): void {
  debugOn = false;
}

export function enableDebug(): void {
  debugOn = true;
}

/**
 * Adds up any iterable of numbers.
 */
export function sum(xs: Iterable<number>): number {
  let s = 0;
  for (const x of xs) {
    s += x;
  }
  return s;
}

type AnyMapNode<V> = {
  children: Map<unknown, AnyMapNode<V>>;
  value?: { stored: V };
};

/**
 * An `AnyMap<V>` is sorta like a `Map<unknown[], V>`, except that the array is
 * treated "by value" so each key element is used as a key.
 */
export class AnyMap<V> {
  private root: AnyMapNode<V> = { children: new Map() };

  private find(key: readonly unknown[]): AnyMapNode<V> | undefined {
    let m: AnyMapNode<V> | undefined = this.root;
    for (const k of key) {
      m = m.children.get(k);
      if (!m) {
        return undefined;
      }
    }
    return m;
  }
  public get(key: readonly unknown[]): V | undefined {
    return this.find(key)?.value?.stored;
  }
  public set(key: readonly unknown[], v: V): void {
    let m = this.root;
    for (const k of key) {
      let next = m.children.get(k);
      if (!next) {
        next = { children: new Map() };
        m.children.set(k, next);
      }
      m = next;
    }
    m.value = { stored: v };
  }
  public has(key: readonly unknown[]): boolean {
    return this.find(key)?.value !== undefined;
  }
  public clear(): void {
    this.root = { children: new Map() };
  }
}

export const valueTypeCache = new AnyMap<ValueType>();

/**
 * A `ValueType` uses an obscure JavaScript hack: the `constructor` of a class
 * may `return` a value. If that value is not `undefined`, then this object is
 * used as the newly-constructed object instead.
 *
 * The `ValueType` class uses `this.constructor` and any additional `keys` to
 * store the instance (permanently) inside of an `AnyMap`.
 *
 * @example
 * class Pos extends ValueType {
 *   constructor(public readonly x: number, public readonly y: number) {
 *     super([x, y]);
 *   }
 * }
 *
 * console.info(new Pos(1, 2) === new Pos(1, 2)); // true
 * console.info(new Pos(1, 2) === new Pos(3, 4)); // false
 */
export class ValueType {
  constructor(keys: readonly unknown[]) {
    const existing = valueTypeCache.get([this.constructor, ...keys]);
    if (existing !== undefined) {
      return existing;
    }
    valueTypeCache.set([this.constructor, ...keys], this);
  }
}

/**
 * A 2-dimensional point: `x` is the column, `y` is the row.
 * It has add/shift as vector operations.
 */
export class Pos2 extends ValueType {
  constructor(public readonly x: number, public readonly y: number) {
    if (x === 0) {
      x = 0; // normalize neg 0
    }
    if (y === 0) {
      y = 0; // normalize neg 0
    }
    super([x, y]);
    this.x = x;
    this.y = y;
  }
  public toString(): string {
    return `${this.x};${this.y}`;
  }
  public shift(dx: number, dy: number): Pos2 {
    return new Pos2(this.x + dx, this.y + dy);
  }
  public add(other: Pos2): Pos2 {
    return this.shift(other.x, other.y);
  }
}

/**
 * A garden map: one row per line, one plant label per cell.
 */
export type Grid = readonly (readonly string[])[];

export const GridSchema = z
  .array(
    z.array(
      z.string().regex(/^\S$/u, { message: "invalid plant label" })
    )
  )
  .refine((rows) => rows.every((row) => row.length === rows[0].length), {
    message: "invalid grid shape",
  });

/**
 * Checks that `rows` is a rectangular grid of single-character labels.
 * Throws a `ZodError` otherwise.
 */
export function validateGrid(rows: unknown): Grid {
  return GridSchema.parse(rows);
}

/**
 * Parses a grid (from a multiline string). Blank lines are skipped, but the
 * other lines are kept as they are, so stray spaces are rejected as labels.
 */
export function parseGrid(src: string): Grid {
  const rows = src
    .replaceAll("\r\n", "\n")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => [...line]);
  return validateGrid(rows);
}

/**
 * Reads and parses a garden map. A file without any rows is an error.
 */
export function readGarden(path = "in.txt"): Grid {
  const grid = parseGrid(readInput(path));
  if (grid.length === 0) {
    throw new Error(`The file ${path} is empty.`);
  }
  return grid;
}

export function gridHeight(grid: Grid): number {
  return grid.length;
}

export function gridWidth(grid: Grid): number {
  return grid.length === 0 ? 0 : grid[0].length;
}

export function inGrid(grid: Grid, p: Pos2): boolean {
  return (
    p.x >= 0 && p.y >= 0 && p.y < gridHeight(grid) && p.x < gridWidth(grid)
  );
}

export function cellAt(grid: Grid, p: Pos2): string {
  assert(inGrid(grid, p), "outside of grid:", p.toString());
  return grid[p.y][p.x];
}

/**
 * Prints a grid (for debugging, mostly).
 */
export function printGrid(grid: ReadonlyMap<Pos2, string>): string {
  let min: Pos2 | null = null;
  let max: Pos2 | null = null;
  for (const p of grid.keys()) {
    if (min === null || max === null) {
      min = p;
      max = p;
    } else {
      min = new Pos2(Math.min(min.x, p.x), Math.min(min.y, p.y));
      max = new Pos2(Math.max(max.x, p.x), Math.max(max.y, p.y));
    }
  }
  if (!min || !max) {
    return "(empty)";
  }
  let sTotal = "";
  for (let y = min.y; y <= max.y; y++) {
    for (let x = min.x; x <= max.x; x++) {
      sTotal += grid.get(new Pos2(x, y)) ?? ".";
    }
    sTotal += "\n";
  }
  return sTotal;
}

/**
 * Counts from 0 to n-1.
 */
export function iota(n: number): number[] {
  const r: number[] = [];
  for (let i = 0; i < n; i++) {
    r.push(i);
  }
  return r;
}

export function assert(b: boolean, ...args: unknown[]): void {
  if (!b) {
    console.error("assert failed:", ...args);
    throw new Error("assert failed");
  }
}

export type IncRange = { lo: number; hi: number };

export function rangeContains(r: IncRange | null, x: number): boolean {
  if (!r) {
    return false;
  }
  return x >= r.lo && x <= r.hi;
}

export function rangeOverlaps(a: IncRange | null, b: IncRange | null): boolean {
  if (a === null || b === null) {
    return false;
  }
  return (
    rangeContains(a, b.lo) ||
    rangeContains(a, b.hi) ||
    rangeContains(b, a.lo) ||
    rangeContains(b, a.hi)
  );
}
