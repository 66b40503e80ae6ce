import { DEFAULT_LOCATION_ID, DEFAULT_LOCATION_NAME } from "../constants.js";
import { fail, ok, type OpResult } from "../result.js";
import type { AgentPosition } from "../types.js";
import type { MapGraph } from "./map.js";

function pathKey(path: readonly string[]): string {
  return path.join(">");
}

/**
 * The agent's position. Moves only along paths the planner issued the same
 * day; snaps back to the dormitory at each day boundary.
 */
export class LocationTracker {
  private position: AgentPosition;
  private readonly issuedPaths = new Set<string>();

  constructor(private readonly map: MapGraph) {
    this.position = this.homePosition();
  }

  private homePosition(): AgentPosition {
    return {
      location_id: DEFAULT_LOCATION_ID,
      location_name: this.map.get(DEFAULT_LOCATION_ID)?.name ?? DEFAULT_LOCATION_NAME,
      walk_history: [],
    };
  }

  current(): AgentPosition {
    return {
      ...this.position,
      walk_history: this.position.walk_history.map(p => [...p]),
    };
  }

  recordIssuedPath(path: readonly string[]): void {
    this.issuedPaths.add(pathKey(path));
  }

  getCurrentLocation(): OpResult<{ building_id: string; building_name: string }> {
    const { location_id, location_name } = this.position;
    return ok(`You are currently at ${location_name} (ID: ${location_id}).`, {
      building_id: location_id,
      building_name: location_name,
    });
  }

  walkTo(path: readonly string[]): OpResult<{ new_location_id: string; new_location_name: string; path_taken: string[] }> {
    if (path.length < 2) {
      return fail("INVALID_PATH", "Invalid path. Must be a list with at least 2 locations.");
    }
    const first = path[0];
    const destination = path[path.length - 1];
    if (first === undefined || destination === undefined) {
      return fail("INVALID_PATH", "Invalid path. Must be a list with at least 2 locations.");
    }
    if (!this.issuedPaths.has(pathKey(path))) {
      return fail("INVALID_PATH", "This path was not produced by find_optimal_path. Plan a route before walking.");
    }
    if (first !== this.position.location_id) {
      return fail(
        "INVALID_PATH",
        `Path starting location '${first}' does not match current location '${this.position.location_id}'.`,
      );
    }
    for (let i = 1; i < path.length; i++) {
      const from = path[i - 1];
      const to = path[i];
      if (from === undefined || to === undefined || !this.map.isLinked(from, to)) {
        return fail("INVALID_PATH", `No walkable connection from '${from}' to '${to}'.`);
      }
    }

    const name = this.map.nameOf(destination);
    this.position = {
      location_id: destination,
      location_name: name,
      walk_history: [...this.position.walk_history, [...path]],
    };
    return ok(`Successfully walked to ${name}. You are now at ${name}.`, {
      new_location_id: destination,
      new_location_name: name,
      path_taken: [...path],
    });
  }

  /** Places the agent directly, for tasks that begin away from the dormitory. */
  setLocation(buildingId: string): OpResult<{ building_id: string; building_name: string }> {
    const loc = this.map.get(buildingId);
    if (!loc) return fail("NOT_FOUND", `Cannot set location to unknown building '${buildingId}'.`);
    this.position = { ...this.position, location_id: loc.id, location_name: loc.name };
    return ok(`You are now located at ${loc.name}.`, { building_id: loc.id, building_name: loc.name });
  }

  dailyReset(): void {
    this.position = this.homePosition();
    this.issuedPaths.clear();
  }

  issued(): string[][] {
    return [...this.issuedPaths].map(k => k.split(">"));
  }

  restore(position: AgentPosition, issued: string[][]): void {
    this.position = {
      ...position,
      walk_history: position.walk_history.map(p => [...p]),
    };
    this.issuedPaths.clear();
    for (const p of issued) this.issuedPaths.add(pathKey(p));
  }
}
