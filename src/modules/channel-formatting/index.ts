import type { AlertRecord } from "../alerting/types.js";
import { formatIvrScript } from "./ivr.js";
import { formatSms } from "./sms.js";
import { formatTelegram } from "./telegram.js";
import type { Channel, ChannelOutputs } from "./types.js";
import { formatUssdMenu } from "./ussd.js";
import { formatWhatsApp } from "./whatsapp.js";

export function formatAllChannels(record: AlertRecord): ChannelOutputs {
  return {
    sms: formatSms(record),
    whatsapp: formatWhatsApp(record),
    ussd: formatUssdMenu(record),
    ivr: formatIvrScript(record),
    telegram: formatTelegram(record)
  };
}

export function formatChannel(
  channel: Channel,
  record: AlertRecord
): ChannelOutputs[Channel] {
  switch (channel) {
    case "sms":
      return formatSms(record);
    case "whatsapp":
      return formatWhatsApp(record);
    case "ussd":
      return formatUssdMenu(record);
    case "ivr":
      return formatIvrScript(record);
    case "telegram":
      return formatTelegram(record);
  }
}

export { CSV_RESPONSE_MAX_LENGTH, exportAlertCsv } from "./csv-export.js";
export { formatIvrScript, ivrSubmenuScript } from "./ivr.js";
export { SMS_MAX_LENGTH, formatSms, toHindi } from "./sms.js";
export { escapeTelegramMarkdown, formatTelegram, parseTelegramCallbackData } from "./telegram.js";
export type { TelegramCallback, TelegramCallbackAction } from "./telegram.js";
export { Channels, VALID_CHANNELS } from "./types.js";
export type {
  Channel,
  ChannelOutputs,
  IvrLine,
  TelegramInlineButton,
  TelegramMessage,
  WhatsAppButton,
  WhatsAppMessage
} from "./types.js";
export { USSD_INVALID_CHOICE, formatUssdMenu, ussdSubmenu } from "./ussd.js";
export { formatWhatsApp, parseWhatsAppButtonPayload } from "./whatsapp.js";
export type { WhatsAppButtonAction, WhatsAppButtonPayload } from "./whatsapp.js";
