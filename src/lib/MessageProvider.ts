/**
 * Message provider backed by the bundled locale tables
 */

import en from "../locales/en.json";
import zh from "../locales/zh.json";
import {
  IMessageProvider,
  Locale,
  MessageParams,
} from "../interfaces/IMessageProvider";

type MessageTable = Record<string, string>;

const TABLES: Record<Locale, MessageTable> = { en, zh };

export class MessageProvider implements IMessageProvider {
  constructor(private tables: Record<Locale, MessageTable> = TABLES) {}

  resolve(key: string, locale: Locale): string {
    return this.tables[locale][key] ?? this.tables.en[key] ?? key;
  }

  format(key: string, locale: Locale, params: MessageParams = {}): string {
    return this.resolve(key, locale).replace(
      /\{(\w+)\}/g,
      (placeholder: string, name: string) =>
        name in params ? String(params[name]) : placeholder
    );
  }
}
