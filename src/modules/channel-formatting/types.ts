export const Channels = Object.freeze({
  SMS: "sms",
  WHATSAPP: "whatsapp",
  USSD: "ussd",
  IVR: "ivr",
  TELEGRAM: "telegram"
});

export type Channel = (typeof Channels)[keyof typeof Channels];

export const VALID_CHANNELS: ReadonlySet<string> = new Set<string>(Object.values(Channels));

export interface WhatsAppButton {
  title: string;
  payload: string;
}

export interface WhatsAppMessage {
  text: string;
  buttons: WhatsAppButton[];
}

export interface IvrLine {
  text: string;
  delayAfterSeconds: number;
}

export interface TelegramInlineButton {
  text: string;
  callbackData: string;
}

export interface TelegramMessage {
  text: string;
  parseMode: "Markdown";
  replyMarkup: {
    inlineKeyboard: TelegramInlineButton[][];
  };
}

export interface ChannelOutputs {
  sms: string;
  whatsapp: WhatsAppMessage;
  ussd: string;
  ivr: IvrLine[];
  telegram: TelegramMessage;
}
