/**
 * Bounded queries over a synthetic street grid.
 *
 * Usage: npx tsx scripts/nearest-places.ts [--k=3] [--within=400] [--kind=cafe] [--debug]
 *
 * Options:
 *   --k        How many of the nearest places to list (default 3)
 *   --within   Radius in meters for the "all places within" query (default 400)
 *   --kind     Place kind to look for: cafe, pharmacy or fuel (default cafe)
 *   --debug    Log every finalized intersection
 *
 * The grid is generated on the fly and never fully built: neighbors are
 * computed only for the intersections the search actually reaches.
 */

import { shortestPathsFrom, type Neighbor, type SearchOptions } from "../src/index.js";

interface Coordinate {
  lat: number;
  lng: number;
}

interface Intersection {
  row: number;
  col: number;
}

type PlaceKind = "cafe" | "pharmacy" | "fuel";

const PLACE_KINDS: readonly PlaceKind[] = ["cafe", "pharmacy", "fuel"];
const ORIGIN: Coordinate = { lat: 51.5007, lng: -0.1246 };
/** Block size in degrees, roughly 110 m north-south */
const BLOCK_DEGREES = 0.001;
const EARTH_RADIUS_METERS = 6_371_000;

const args = process.argv.slice(2);

function flag(name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

const k = Number(flag("k") ?? 3);
const within = Number(flag("within") ?? 400);
const kindArg = flag("kind") ?? "cafe";
const debug = args.includes("--debug");

function haversineDistance(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}

function coordinateOf(node: Intersection): Coordinate {
  return {
    lat: ORIGIN.lat + node.row * BLOCK_DEGREES,
    lng: ORIGIN.lng + node.col * BLOCK_DEGREES,
  };
}

/** Deterministic scatter of places over the grid */
function placeAt(node: Intersection): PlaceKind | undefined {
  const hash = Math.abs(node.row * 7 + node.col * 13) % 17;
  return hash < PLACE_KINDS.length ? PLACE_KINDS[hash] : undefined;
}

function* streetsFrom(node: Intersection): Generator<Neighbor<Intersection>> {
  const here = coordinateOf(node);
  for (const [dRow, dCol] of [[1, 0], [-1, 0], [0, 1], [0, -1]] as const) {
    const next = { row: node.row + dRow, col: node.col + dCol };
    yield [next, haversineDistance(here, coordinateOf(next))];
  }
}

function isPlaceKind(value: string): value is PlaceKind {
  return PLACE_KINDS.some((kind) => kind === value);
}

function main(): void {
  if (!isPlaceKind(kindArg)) {
    throw new Error(`Unknown place kind: "${kindArg}". Available: ${PLACE_KINDS.join(", ")}`);
  }
  const kind = kindArg;
  const start: Intersection = { row: 0, col: 0 };
  const options: SearchOptions<Intersection> = {
    keyOf: (node) => `${node.row}:${node.col}`,
    debug,
  };

  console.log(`Nearest ${k} ${kind} place(s):`);
  const nearest = shortestPathsFrom(start, streetsFrom, options)
    .filter((path) => placeAt(path.to) === kind)
    .take(k)
    .toArray();
  for (const path of nearest) {
    console.log(`  (${path.to.row}, ${path.to.col}) ${path.distance.toFixed(0)}m, ${path.length} blocks`);
  }

  let explored = 0;
  const inRange = shortestPathsFrom(start, streetsFrom, options)
    .takeWhile((path) => {
      explored++;
      return path.distance <= within;
    })
    .filter((path) => placeAt(path.to) === kind)
    .toArray();
  console.log(
    `${inRange.length} ${kind} place(s) within ${within}m (${explored} intersections explored)`,
  );
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
