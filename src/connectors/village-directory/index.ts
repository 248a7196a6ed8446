export { StaticVillageDirectory, VILLAGE_TABLE } from "./directory.js";
export { normalizeKey, parseVillageTable } from "./schema.js";
export type { DistrictEntry, StateEntry, VillageEntry, VillageTable } from "./types.js";
