import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { Language, MessageFormatter, NoticeKind } from "../tracking/types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const MESSAGES_FILE = path.resolve(__dirname, "../../data/messages.json");

const LanguageMessagesSchema = z.object({
  fact: z.string(),
  failure: z.string(),
  nearYou: z.string(),
  expired: z.string(),
  silent: z.string(),
  stopped: z.string(),
});

const MessagesFileSchema = z.object({
  en: LanguageMessagesSchema,
  ru: LanguageMessagesSchema,
  fr: LanguageMessagesSchema,
});

export type MessageTable = z.infer<typeof MessagesFileSchema>;

/** Replace `{name}` placeholders; unknown placeholders are left as-is. */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match
  );
}

/** User-facing texts for live sessions, per language. */
export class MessageCatalog implements MessageFormatter {
  private readonly table: MessageTable;

  constructor(table: MessageTable) {
    this.table = table;
  }

  static fromFile(filePath = MESSAGES_FILE): MessageCatalog {
    const raw = fs.readFileSync(filePath, "utf-8");
    return new MessageCatalog(MessagesFileSchema.parse(JSON.parse(raw)));
  }

  fact(language: Language, number: number, place: string, summary: string): string {
    return fillTemplate(this.table[language].fact, { number, place, fact: summary });
  }

  failure(language: Language, number: number): string {
    return fillTemplate(this.table[language].failure, { number });
  }

  nearYou(language: Language): string {
    return this.table[language].nearYou;
  }

  notice(language: Language, kind: NoticeKind): string {
    return this.table[language][kind];
  }
}
