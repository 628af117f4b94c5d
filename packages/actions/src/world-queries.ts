import { GameState, readInteger } from "@goapbot/schemas";
import type { Character, MapContentType, MapTile, WorldSnapshot, WorldState } from "@goapbot/schemas";
import type { Position } from "@goapbot/planner";

export function positionOf(state: WorldState): Position | undefined {
  const x = readInteger(state, GameState.CURRENT_X);
  const y = readInteger(state, GameState.CURRENT_Y);
  return x === undefined || y === undefined ? undefined : { x, y };
}

export function isAt(character: Pick<Character, "x" | "y">, tile: Position): boolean {
  return character.x === tile.x && character.y === tile.y;
}

export function contentTiles(snapshot: WorldSnapshot, type: MapContentType, code?: string): MapTile[] {
  return snapshot.maps.filter(
    (t) => t.content?.type === type && (code === undefined || t.content.code === code) && t.walkable !== false,
  );
}

/** Closest matching tile by Manhattan distance; map order breaks ties. */
export function nearestContentTile(
  snapshot: WorldSnapshot,
  type: MapContentType,
  code: string | undefined,
  from: Position | undefined,
): MapTile | undefined {
  let best: MapTile | undefined;
  let bestDistance = Infinity;
  for (const tile of contentTiles(snapshot, type, code)) {
    const distance = from ? Math.abs(tile.x - from.x) + Math.abs(tile.y - from.y) : 0;
    if (distance < bestDistance) {
      best = tile;
      bestDistance = distance;
    }
  }
  return best;
}
