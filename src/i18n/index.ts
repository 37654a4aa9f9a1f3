import i18next from 'i18next';
import type { SupportedLanguage } from '../utils/config.js';
import type { TranslationNamespace, NestedKeyOf } from './types.js';

import enCommon from './locales/en/common.json';
import enCommands from './locales/en/commands.json';
import enErrors from './locales/en/errors.json';

export type { TranslationNamespace, NestedKeyOf };

/** JSON-inferred type for common.json translations */
export type CommonJSON = typeof enCommon;
/** JSON-inferred type for commands.json translations */
export type CommandsJSON = typeof enCommands;
/** JSON-inferred type for errors.json translations */
export type ErrorsJSON = typeof enErrors;

export type CommonKey = NestedKeyOf<CommonJSON>;
export type CommandsKey = NestedKeyOf<CommandsJSON>;
export type ErrorsKey = NestedKeyOf<ErrorsJSON>;

const NAMESPACES: TranslationNamespace[] = ['common', 'commands', 'errors'];

export async function initI18n(language: SupportedLanguage = 'en') {
  await i18next.init({
    lng: language,
    fallbackLng: 'en',
    ns: NAMESPACES,
    defaultNS: 'common',
    interpolation: {
      // Ink renders plain text; file paths must not be HTML-escaped
      escapeValue: false,
    },
    resources: {
      en: {
        common: enCommon,
        commands: enCommands,
        errors: enErrors,
      },
    },
  });
  return i18next;
}

/**
 * Translation function.
 *
 * Usage examples:
 *   t('common:time.just_now')
 *   t('errors:codes.project_not_selected')
 *   t('commands:sync.synced_to_remote', { count: 5 })
 */
export const t = i18next.t.bind(i18next);


export async function changeLanguage(language: SupportedLanguage): Promise<void> {
  await i18next.changeLanguage(language);
}
