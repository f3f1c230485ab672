/**
 * Message provider interface
 */

export type Locale = "en" | "zh";

export type MessageParams = Record<string, string | number>;

export interface IMessageProvider {
  /**
   * Template for a key, falling back to English and then to the key itself
   */
  resolve(key: string, locale: Locale): string;

  /**
   * Resolve a key and substitute `{name}` placeholders
   */
  format(key: string, locale: Locale, params?: MessageParams): string;
}
