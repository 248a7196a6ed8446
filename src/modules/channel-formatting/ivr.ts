import type { AlertRecord } from "../alerting/types.js";
import { humanizeCode } from "./text.js";
import type { IvrLine } from "./types.js";

export function formatIvrScript(record: AlertRecord): IvrLine[] {
  return [
    {
      text: `Namaste. Mausam ki chetavani ${record.location.district} ke liye.`,
      delayAfterSeconds: 1
    },
    { text: `Fasal: ${record.crop.name}.`, delayAfterSeconds: 1 },
    { text: `Chetavani: ${record.alert.message}`, delayAfterSeconds: 2 },
    { text: "Salah ke liye, ek dabaye.", delayAfterSeconds: 0 }
  ];
}

export function ivrSubmenuScript(record: AlertRecord): IvrLine[] {
  const actions = record.alert.actionItems.map(humanizeCode).join(". ");
  return [
    { text: `Salah: ${actions}`, delayAfterSeconds: 2 },
    { text: "Dhanyavad.", delayAfterSeconds: 0 }
  ];
}
