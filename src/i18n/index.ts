import i18next from "i18next";
import type { SupportedLanguage, TranslationNamespace, NestedKeyOf, PathValue } from "./types.js";

export type { SupportedLanguage, TranslationNamespace, NestedKeyOf, PathValue };

import enCommon from "./locales/en/common.json";
import enCommands from "./locales/en/commands.json";
import enErrors from "./locales/en/errors.json";

// ============================================================================
// JSON-inferred types for type-safe translation access
// ============================================================================

export type CommonJSON = typeof enCommon;
export type CommandsJSON = typeof enCommands;
export type ErrorsJSON = typeof enErrors;

/**
 * Type-safe keys for each namespace.
 *
 * Usage:
 *   const key: CommandsKey = 'degrees.description';
 *   t(`commands:${key}`);
 */
export type CommonKey = NestedKeyOf<CommonJSON>;
export type CommandsKey = NestedKeyOf<CommandsJSON>;
export type ErrorsKey = NestedKeyOf<ErrorsJSON>;

// ============================================================================
// i18next initialization
// ============================================================================

export async function initI18n(language: SupportedLanguage = "en") {
  if (i18next.isInitialized) {
    await i18next.changeLanguage(language);
    return i18next;
  }
  await i18next.init({
    lng: language,
    fallbackLng: "en",
    ns: ["common", "commands", "errors"],
    defaultNS: "common",
    resources: {
      en: {
        common: enCommon,
        commands: enCommands,
        errors: enErrors,
      },
    },
    interpolation: {
      // Output is plain terminal text or JSON, never HTML
      escapeValue: false,
    },
  });
  return i18next;
}

/**
 * Translation function.
 *
 * Usage examples:
 *   t('commands:communities.description')
 *   t('errors:codes.unknown.minimal')
 *   t('common:report.more', { count: 5 })
 */
export const t = i18next.t.bind(i18next);

export function getCurrentLanguage(): SupportedLanguage {
  return "en";
}
