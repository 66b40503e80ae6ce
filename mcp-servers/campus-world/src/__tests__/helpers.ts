import { loadCampusData } from "../data/loader.js";
import { CampusWorldState } from "../world/state.js";

export async function makeWorld(seed = "test-seed"): Promise<CampusWorldState> {
  const data = await loadCampusData();
  return new CampusWorldState({ map: data.map, courses: data.courses, information: data.information, seed });
}
