import { fail, ok, type OpResult } from "../result.js";
import type {
  BuildingComplex, CampusMap, Location, PathConstraints, PlannedPath, SubRoom,
} from "../types.js";
import { shortestPath, type Link } from "./pathfinding.js";

export interface RoomMatch {
  building_id: string;
  building_name: string;
  floor: string;
  room_name: string;
}

export interface LocationSummary {
  id: string;
  name: string;
  type: string;
  zone: string;
}

function summarize(loc: Location): LocationSummary {
  return { id: loc.id, name: loc.name, type: loc.type, zone: loc.zone };
}

function formatRoom(room: RoomMatch): string {
  return `${room.room_name} on ${room.floor} of ${room.building_name} (ID: ${room.building_id})`;
}

/**
 * Static campus graph. Built once from validated map data and never mutated;
 * every method here is a pure query.
 */
export class MapGraph {
  private readonly locations = new Map<string, Location>();
  private readonly adjacency = new Map<string, Link[]>();
  private readonly complexes: BuildingComplex[];

  constructor(map: CampusMap) {
    for (const loc of map.locations) {
      this.locations.set(loc.id, loc);
      this.adjacency.set(loc.id, []);
    }

    for (const edge of map.edges) {
      const forward = this.adjacency.get(edge.source);
      const backward = this.adjacency.get(edge.target);
      if (!forward || !backward) continue;
      forward.push({ to: edge.target, cost: edge.time_cost, properties: edge.properties, internal: false });
      if (!edge.one_way) {
        backward.push({ to: edge.source, cost: edge.time_cost, properties: edge.properties, internal: false });
      }
    }

    this.complexes = map.complexes.map(c => ({
      name: c.name,
      member_ids: c.member_ids.filter(id => this.locations.has(id)),
    }));
    for (const complex of this.complexes) {
      for (const u of complex.member_ids) {
        for (const v of complex.member_ids) {
          if (u === v) continue;
          this.adjacency.get(u)?.push({ to: v, cost: 0, properties: {}, internal: true });
        }
      }
    }
  }

  get(id: string): Location | undefined {
    return this.locations.get(id);
  }

  has(id: string): boolean {
    return this.locations.has(id);
  }

  nameOf(id: string): string {
    return this.locations.get(id)?.name ?? id;
  }

  /** True when a single walkable link joins `from` to `to`. */
  isLinked(from: string, to: string): boolean {
    return (this.adjacency.get(from) ?? []).some(l => l.to === to);
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  findBuildingId(buildingName: string): OpResult<{ building_id: string; building_name: string }> {
    const wanted = buildingName.trim().toLowerCase();
    if (!wanted) return fail("VALIDATION", "Building name is required.");

    for (const loc of this.locations.values()) {
      if (loc.name.toLowerCase() === wanted) {
        return ok(`Found building '${loc.name}' with ID '${loc.id}'.`, {
          building_id: loc.id, building_name: loc.name,
        });
      }
    }
    for (const loc of this.locations.values()) {
      const alias = loc.aliases.find(a => a.toLowerCase() === wanted);
      if (alias) {
        return ok(`Found building '${loc.name}' with ID '${loc.id}' (matched alias '${alias}').`, {
          building_id: loc.id, building_name: loc.name,
        });
      }
    }
    return fail("NOT_FOUND", `Building '${buildingName}' not found.`);
  }

  getBuildingDetails(buildingId: string): OpResult<Location> {
    if (!buildingId) return fail("VALIDATION", "Building ID is required.");
    const loc = this.locations.get(buildingId);
    if (!loc) return fail("NOT_FOUND", `Building with ID '${buildingId}' not found.`);

    const lines = [
      `Building Details for ${loc.name} (ID: ${loc.id}):`,
      `- Type: ${loc.type}`,
      `- Zone: ${loc.zone}`,
      `- Aliases: ${loc.aliases.join(", ")}`,
    ];
    if (loc.amenities.length > 0) lines.push(`- Amenities: ${loc.amenities.join(", ")}`);
    if (loc.sub_rooms.length > 0) {
      lines.push("- Internal Amenities:");
      for (const [floor, rooms] of groupByFloor(loc.sub_rooms)) {
        lines.push(`  ${floor}: ${rooms.join(", ")}`);
      }
    }
    return ok(lines.join("\n"), loc);
  }

  findRoomLocation(roomQuery: string, buildingId?: string, zone?: string): OpResult<{ rooms: RoomMatch[] }> {
    const query = roomQuery.trim().toLowerCase();
    if (!query) return fail("VALIDATION", "Room query is required.");

    const rooms: RoomMatch[] = [];
    for (const loc of this.locations.values()) {
      if (buildingId && loc.id !== buildingId) continue;
      if (zone && loc.zone !== zone) continue;
      for (const room of loc.sub_rooms) {
        if (room.name.toLowerCase().includes(query)) {
          rooms.push({ building_id: loc.id, building_name: loc.name, floor: room.floor, room_name: room.name });
        }
      }
    }

    const [only] = rooms;
    if (!only) return fail("NOT_FOUND", `No rooms found matching '${roomQuery}'.`);
    if (rooms.length === 1) return ok(`Found room ${formatRoom(only)}.`, { rooms });
    const lines = [`Found ${rooms.length} rooms matching '${roomQuery}':`, ...rooms.map(r => `- ${formatRoom(r)}`)];
    return ok(lines.join("\n"), { rooms });
  }

  queryBuildingsByProperty(
    filters: { zone?: string; building_type?: string; amenity?: string },
  ): OpResult<{ buildings: LocationSummary[] }> {
    const amenity = filters.amenity?.toLowerCase();
    const buildings: LocationSummary[] = [];
    for (const loc of this.locations.values()) {
      if (filters.zone && loc.zone !== filters.zone) continue;
      if (filters.building_type && loc.type !== filters.building_type) continue;
      if (amenity) {
        const tagged = loc.amenities.some(a => a.toLowerCase().includes(amenity));
        const inRoom = loc.sub_rooms.some(r => r.name.toLowerCase().includes(amenity));
        if (!tagged && !inRoom) continue;
      }
      buildings.push(summarize(loc));
    }

    if (buildings.length === 0) return fail("NOT_FOUND", "No buildings found matching the specified criteria.");
    const lines = [
      `Found ${buildings.length} building(s) matching criteria:`,
      ...buildings.map(b => `- ${b.name} (ID: ${b.id}, Type: ${b.type}, Zone: ${b.zone})`),
    ];
    return ok(lines.join("\n"), { buildings });
  }

  getBuildingComplexInfo(buildingId: string): OpResult<BuildingComplex | { is_complex_member: false }> {
    if (!buildingId) return fail("VALIDATION", "Building ID is required.");
    if (!this.locations.has(buildingId)) return fail("NOT_FOUND", `Building with ID '${buildingId}' not found.`);

    const complex = this.complexes.find(c => c.member_ids.includes(buildingId));
    if (!complex) {
      return ok(`Building ${buildingId} is not part of any building complex.`, { is_complex_member: false });
    }
    return ok(
      `Building ${buildingId} is part of the '${complex.name}' complex. Complex members: ${complex.member_ids.join(", ")}.`,
      complex,
    );
  }

  listValidQueryProperties(): OpResult<{ zones: string[]; building_types: string[]; amenities: string[] }> {
    const zones = new Set<string>();
    const types = new Set<string>();
    const amenities = new Set<string>();
    for (const loc of this.locations.values()) {
      zones.add(loc.zone);
      types.add(loc.type);
      for (const a of loc.amenities) amenities.add(a);
    }
    const data = {
      zones: [...zones].sort(),
      building_types: [...types].sort(),
      amenities: [...amenities].sort(),
    };
    const message = [
      "Available query properties:",
      `- Zones: ${data.zones.join(", ")}`,
      `- Building Types: ${data.building_types.join(", ")}`,
      `- Amenities: ${data.amenities.join(", ")}`,
    ].join("\n");
    return ok(message, data);
  }

  // -------------------------------------------------------------------------
  // Planning
  // -------------------------------------------------------------------------

  planPath(source: string, target: string, constraints: PathConstraints = {}): OpResult<PlannedPath> {
    if (!source || !target) return fail("VALIDATION", "Both source and target building IDs are required.");
    if (!this.locations.has(source)) return fail("NOT_FOUND", `Building with ID '${source}' not found.`);
    if (!this.locations.has(target)) return fail("NOT_FOUND", `Building with ID '${target}' not found.`);

    const found = shortestPath(this.adjacency, source, target, constraints);
    if (!found) {
      const suffix = Object.keys(constraints).length > 0 ? " satisfying the given constraints" : "";
      return fail("NOT_FOUND", `No path could be found from ${source} to ${target}${suffix}.`);
    }

    const pathNames = found.path.map(id => this.nameOf(id));
    return ok(`Optimal path found: ${pathNames.join(" -> ")}.`, {
      path: found.path,
      path_names: pathNames,
      total_cost: found.cost,
    });
  }
}

function groupByFloor(rooms: SubRoom[]): Map<string, string[]> {
  const floors = new Map<string, string[]>();
  for (const room of rooms) {
    const list = floors.get(room.floor) ?? [];
    list.push(room.name);
    floors.set(room.floor, list);
  }
  return floors;
}
