import villageData from "../../../data/bihar-villages.json" with { type: "json" };
import type { Coordinates, LocationDirectory } from "../../modules/alerting/types.js";
import { LocationNotFoundError } from "../../modules/shared/errors.js";
import { normalizeKey, parseVillageTable } from "./schema.js";
import type { DistrictEntry, StateEntry, VillageTable } from "./types.js";

export const VILLAGE_TABLE: VillageTable = parseVillageTable(villageData);

/**
 * Village and district lookups over the bundled village table. Names are
 * matched case-insensitively; geocoding prefers a village with its own
 * coordinates and falls back to a district of the same name.
 */
export class StaticVillageDirectory implements LocationDirectory {
  constructor(private readonly table: VillageTable = VILLAGE_TABLE) {}

  async listStates(): Promise<string[]> {
    return Array.from(this.table.values(), (state) => state.name);
  }

  async resolveStateName(state: string): Promise<string> {
    return this.getState(state).name;
  }

  async resolveDistrictName(state: string, district: string): Promise<string> {
    return this.getDistrict(state, district).name;
  }

  async listDistricts(state: string): Promise<string[]> {
    return Array.from(this.getState(state).districts.values(), (district) => district.name);
  }

  async listVillages(state: string, district: string): Promise<string[]> {
    return this.getDistrict(state, district).villages.map((village) => village.name);
  }

  async reverseGeocode(name: string): Promise<Coordinates> {
    const key = normalizeKey(name);
    let districtMatch: Coordinates | undefined;

    for (const state of this.table.values()) {
      for (const district of state.districts.values()) {
        const village = district.villages.find(
          (entry) => normalizeKey(entry.name) === key && entry.coordinates !== undefined
        );
        if (village?.coordinates) {
          return village.coordinates;
        }
        if (!districtMatch && district.key === key) {
          districtMatch = district.coordinates;
        }
      }
    }

    if (districtMatch) {
      return districtMatch;
    }
    throw new LocationNotFoundError(`No coordinates known for "${name}"`);
  }

  private getState(state: string): StateEntry {
    const entry = this.table.get(normalizeKey(state));
    if (!entry) {
      throw new LocationNotFoundError(`Unknown state "${state}"`);
    }
    return entry;
  }

  private getDistrict(state: string, district: string): DistrictEntry {
    const entry = this.getState(state).districts.get(normalizeKey(district));
    if (!entry) {
      throw new LocationNotFoundError(`Unknown district "${district}" in state "${state}"`);
    }
    return entry;
  }
}
