import type { AlertRecord } from "../alerting/types.js";
import { capitalize, humanizeCode } from "./text.js";
import type { TelegramMessage } from "./types.js";

export type TelegramCallbackAction = "ack" | "advice";

export interface TelegramCallback {
  action: TelegramCallbackAction;
  alertId: string;
}

/** Escapes the characters legacy Telegram Markdown treats as markup. */
export function escapeTelegramMarkdown(value: string): string {
  return value.replace(/([_*`[])/g, "\\$1");
}

export function formatTelegram(record: AlertRecord): TelegramMessage {
  const { location, crop, alert } = record;
  const lines = [
    `⚠️ *${escapeTelegramMarkdown(capitalize(humanizeCode(alert.type)))}*`,
    `📍 ${escapeTelegramMarkdown(`${location.village}, ${location.district}, ${location.state}`)}`,
    `🌾 ${escapeTelegramMarkdown(`${capitalize(crop.name)} (${crop.stage}, ${crop.season})`)}`,
    `*Urgency:* ${alert.urgency.toUpperCase()}`,
    "",
    escapeTelegramMarkdown(alert.message),
    "",
    "*Advice:*",
    ...alert.actionItems.map((action) => `• ${escapeTelegramMarkdown(capitalize(humanizeCode(action)))}`),
    "",
    `_Valid until ${alert.validUntil}_`
  ];

  return {
    text: lines.join("\n"),
    parseMode: "Markdown",
    replyMarkup: {
      inlineKeyboard: [
        [
          { text: "✅ Acknowledge", callbackData: `ack:${record.alertId}` },
          { text: "💡 Advice", callbackData: `advice:${record.alertId}` }
        ]
      ]
    }
  };
}

export function parseTelegramCallbackData(data: string): TelegramCallback | undefined {
  const match = /^(ack|advice):(.+)$/.exec(data.trim());
  if (!match?.[2]) {
    return undefined;
  }
  return { action: match[1] === "ack" ? "ack" : "advice", alertId: match[2] };
}
