import type { AlertRecord } from "../alerting/types.js";
import { capitalize, humanizeCode } from "./text.js";

export const USSD_INVALID_CHOICE = "Invalid choice. Please try again.";

export function formatUssdMenu(record: AlertRecord): string {
  return [
    "Mausam ki jankari:",
    `1. ${capitalize(record.crop.name)} ki chetavani`,
    "2. Salah",
    "3. Exit"
  ].join("\n");
}

export function ussdSubmenu(record: AlertRecord, choice: number): string {
  if (choice === 1) {
    return `Chetavani: ${record.alert.message}\n0. Back`;
  }
  if (choice === 2) {
    const actions = record.alert.actionItems
      .map((action) => `- ${capitalize(humanizeCode(action))}`)
      .join("\n");
    return `Salah:\n${actions}\n0. Back`;
  }
  return USSD_INVALID_CHOICE;
}
