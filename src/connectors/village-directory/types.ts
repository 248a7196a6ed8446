import type { Coordinates } from "../../modules/alerting/types.js";

export interface VillageEntry {
  readonly name: string;
  readonly coordinates: Coordinates | undefined;
}

export interface DistrictEntry {
  readonly key: string;
  readonly name: string;
  readonly coordinates: Coordinates | undefined;
  readonly villages: readonly VillageEntry[];
}

export interface StateEntry {
  readonly key: string;
  readonly name: string;
  readonly districts: ReadonlyMap<string, DistrictEntry>;
}

export type VillageTable = ReadonlyMap<string, StateEntry>;
