import type { AlertRecord } from "../alerting/types.js";
import { capitalize, humanizeCode } from "./text.js";
import type { WhatsAppMessage } from "./types.js";

export type WhatsAppButtonAction = "ack" | "info";

export interface WhatsAppButtonPayload {
  action: WhatsAppButtonAction;
  alertId: string;
}

export function formatWhatsApp(record: AlertRecord): WhatsAppMessage {
  const { location, crop, alert } = record;
  let text =
    "🚨 *Weather Alert* 🚨\n\n" +
    `📍 *Location:* ${location.village}, ${location.district}\n` +
    `🌾 *Crop:* ${capitalize(crop.name)} (${crop.stage})\n` +
    `⚠️ *Urgency:* ${alert.urgency.toUpperCase()}\n\n` +
    `📝 *Details:* ${alert.message}\n\n` +
    "✅ *Recommended Actions:*\n";
  for (const action of alert.actionItems) {
    text += `- ${capitalize(humanizeCode(action))}\n`;
  }

  return {
    text,
    buttons: [
      { title: "Acknowledge", payload: `ack_${record.alertId}` },
      { title: "More Info", payload: `info_${record.alertId}` }
    ]
  };
}

export function parseWhatsAppButtonPayload(payload: string): WhatsAppButtonPayload | undefined {
  const match = /^(ack|info)_(.+)$/.exec(payload.trim());
  if (!match?.[2]) {
    return undefined;
  }
  return { action: match[1] === "ack" ? "ack" : "info", alertId: match[2] };
}
